// src/stores/appearanceStore.ts
/**
 * Zustand Appearance Store
 * ========================
 * Session-level appearance choice: follow the system, or force light/dark,
 * plus the dynamic colour toggle. Kept in memory only.
 */

import { create } from 'zustand';
import { env } from '@/shared/config/env';

// ============================================================================
// TYPES
// ============================================================================

export type AppearanceMode = 'system' | 'light' | 'dark';

interface AppearanceStoreState {
  mode: AppearanceMode;
  dynamicColor: boolean;

  setMode: (mode: AppearanceMode) => void;
  setDynamicColor: (enabled: boolean) => void;
  /** Flip the effective darkness; `systemDark` resolves the `system` mode. */
  toggleDarkTheme: (systemDark: boolean) => void;
}

// ============================================================================
// HELPERS
// ============================================================================

/** `undefined` lets ThemeProvider fall back to the system setting. */
export function darkThemeForMode(mode: AppearanceMode): boolean | undefined {
  if (mode === 'system') return undefined;
  return mode === 'dark';
}

// ============================================================================
// STORE
// ============================================================================

export const useAppearanceStore = create<AppearanceStoreState>()((set, get) => ({
  mode: 'system',
  dynamicColor: env.VITE_DYNAMIC_COLOR,

  setMode: (mode) => set({ mode }),

  setDynamicColor: (enabled) => set({ dynamicColor: enabled }),

  toggleDarkTheme: (systemDark) => {
    const isDark = darkThemeForMode(get().mode) ?? systemDark;
    set({ mode: isDark ? 'light' : 'dark' });
  },
}));
