// src/theme/resolveColorScheme.ts
/**
 * Theme Resolver (pure part)
 * ==========================
 * Picks exactly one colour scheme from (darkTheme, dynamicColor, host) and
 * derives the status bar style from it. No side effects; ThemeProvider
 * applies the result.
 */

import { type ColorScheme, copyColorScheme, DARK_COLOR_SCHEME, LIGHT_COLOR_SCHEME } from './colorScheme';

// ============================================
// TYPES
// ============================================

/** First platform API level that can extract a wallpaper-derived palette. */
export const DYNAMIC_COLOR_MIN_API_LEVEL = 31;

export interface DynamicColorSource {
  /** Platform API level reported by the host shell. */
  apiLevel: number;
  /** Wallpaper/accent-derived palette, or `null` when the host cannot provide one. */
  getDynamicColorScheme: (dark: boolean) => ColorScheme | null;
}

export interface ColorSchemeRequest {
  darkTheme: boolean;
  dynamicColor: boolean;
  host: DynamicColorSource;
}

export type StatusBarIconAppearance = 'light' | 'dark';

export interface StatusBarStyle {
  backgroundColor: string;
  iconAppearance: StatusBarIconAppearance;
}

// ============================================
// RESOLUTION
// ============================================

export function supportsDynamicColor(host: DynamicColorSource): boolean {
  return host.apiLevel >= DYNAMIC_COLOR_MIN_API_LEVEL;
}

export function resolveColorScheme({ darkTheme, dynamicColor, host }: ColorSchemeRequest): ColorScheme {
  if (dynamicColor && supportsDynamicColor(host)) {
    const dynamic = host.getDynamicColorScheme(darkTheme);
    if (dynamic) {
      return copyColorScheme(dynamic);
    }
    console.warn(
      `[theme] Dynamic ${darkTheme ? 'dark' : 'light'} scheme unavailable at API level ${host.apiLevel}; using static scheme`,
    );
  }
  return copyColorScheme(darkTheme ? DARK_COLOR_SCHEME : LIGHT_COLOR_SCHEME);
}

/** Light icons sit on dark bars, dark icons on light ones. */
export function resolveStatusBarStyle(scheme: ColorScheme, darkTheme: boolean): StatusBarStyle {
  return {
    backgroundColor: scheme.background,
    iconAppearance: darkTheme ? 'light' : 'dark',
  };
}
