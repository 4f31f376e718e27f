// src/platform/types.ts
/**
 * Contracts for the host the UI runs in (browser, WebView shell, test fake).
 * ThemeProvider only talks to the platform through these.
 */

import type { DynamicColorSource, StatusBarIconAppearance } from '@/theme';

/** Status bar controls of the current window. */
export interface WindowChrome {
  setStatusBarColor: (color: string) => void;
  setStatusBarIconAppearance: (appearance: StatusBarIconAppearance) => void;
}

export interface PlatformHost extends DynamicColorSource {
  /** Design-preview rendering; window chrome must not be touched. */
  isPreview: boolean;
  getSystemDarkTheme: () => boolean;
  subscribeSystemDarkTheme: (onChange: () => void) => () => void;
  /** `null` when the current embedding has no window to style. */
  getWindowChrome: () => WindowChrome | null;
}
