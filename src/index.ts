// src/index.ts
// Package entry — theme values, resolver, platform hosts and React bindings.

export { AppTheme } from './components/AppTheme';
export type { ResolvedTheme, ThemeProviderProps } from './contexts/ThemeContext';
export { ThemeProvider, useColorScheme, useStatusColors, useTheme, useTypography } from './contexts/ThemeContext';
export * from './platform';
export { useSystemDarkTheme } from './shared/hooks/useSystemDarkTheme';
export type { AppearanceMode } from './stores/appearanceStore';
export { darkThemeForMode, useAppearanceStore } from './stores/appearanceStore';
export * from './theme';
