// src/contexts/ThemeContext.tsx
/**
 * Theme Context
 * =============
 * Resolves the colour scheme (dynamic / dark / light) for the subtree,
 * binds it with typography and status colours, and syncs the status bar
 * after each commit. Also mirrors the scheme onto the document root as
 * `data-theme` and CSS custom properties.
 */
import { createContext, type ReactNode, useContext, useEffect } from 'react';
import { getBrowserHost, type PlatformHost } from '@/platform';
import { env } from '@/shared/config/env';
import { useSystemDarkTheme } from '@/shared/hooks/useSystemDarkTheme';
import {
  applyCssVariables,
  type ColorScheme,
  resolveColorScheme,
  resolveStatusBarStyle,
  STATUS_COLORS,
  type StatusColors,
  TYPOGRAPHY,
  type Typography,
} from '@/theme';

// ============================================
// CONTEXT TYPE
// ============================================

export interface ResolvedTheme {
  /** Scheme chosen for this render */
  colorScheme: ColorScheme;
  typography: Typography;
  statusColors: StatusColors;
  /** Whether the dark variant was requested (drives status bar icons) */
  darkTheme: boolean;
}

const ThemeContext = createContext<ResolvedTheme | undefined>(undefined);

// ============================================
// PROVIDER
// ============================================

export interface ThemeProviderProps {
  children: ReactNode;
  /** Defaults to the host's system dark-mode setting. */
  darkTheme?: boolean;
  /** Prefer the platform's wallpaper-derived palette where supported. */
  dynamicColor?: boolean;
  host?: PlatformHost;
}

export function ThemeProvider({ children, darkTheme, dynamicColor = env.VITE_DYNAMIC_COLOR, host }: ThemeProviderProps) {
  const platform = host ?? getBrowserHost();
  const systemDarkTheme = useSystemDarkTheme(platform);
  const isDark = darkTheme ?? systemDarkTheme;

  // Resolved on every render so a dynamic palette follows the wallpaper
  const colorScheme = resolveColorScheme({ darkTheme: isDark, dynamicColor, host: platform });
  const { backgroundColor, iconAppearance } = resolveStatusBarStyle(colorScheme, isDark);

  // Status bar sync after every commit; the shell or another screen may have
  // restyled the bar since the last one
  useEffect(() => {
    if (platform.isPreview) return;

    const chrome = platform.getWindowChrome();
    if (!chrome) {
      console.warn('[theme] Window chrome unavailable; status bar left unchanged');
      return;
    }
    chrome.setStatusBarColor(backgroundColor);
    chrome.setStatusBarIconAppearance(iconAppearance);
  });

  // Apply theme to document for stylesheet consumers
  useEffect(() => {
    if (typeof document === 'undefined') return;
    const root = document.documentElement;
    const mode = isDark ? 'dark' : 'light';

    root.setAttribute('data-theme', mode);
    root.classList.remove('light', 'dark');
    root.classList.add(mode);
    applyCssVariables(root, colorScheme);
  }, [isDark, colorScheme]);

  const value: ResolvedTheme = {
    colorScheme,
    typography: TYPOGRAPHY,
    statusColors: STATUS_COLORS,
    darkTheme: isDark,
  };

  return <ThemeContext.Provider value={value}>{children}</ThemeContext.Provider>;
}

// ============================================
// HOOKS
// ============================================

export function useTheme(): ResolvedTheme {
  const context = useContext(ThemeContext);

  if (context === undefined) {
    throw new Error('useTheme must be used within a ThemeProvider');
  }

  return context;
}

export function useColorScheme(): ColorScheme {
  return useTheme().colorScheme;
}

export function useTypography(): Typography {
  return useTheme().typography;
}

export function useStatusColors(): StatusColors {
  return useTheme().statusColors;
}

