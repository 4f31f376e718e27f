import { vi } from 'vitest';
import type { PlatformHost, WindowChrome } from '@/platform';
import type { ColorScheme, StatusBarIconAppearance } from '@/theme';

// ============================================================================
// In-process PlatformHost for provider tests
// ============================================================================

export const DYNAMIC_LIGHT: ColorScheme = {
  primary: '#6750A4',
  onPrimary: '#FFFFFF',
  background: '#FFFBFE',
  surface: '#FFFBFE',
  onSurface: '#1C1B1F',
  onSurfaceVariant: '#49454F',
  outline: '#79747E',
  error: '#B3261E',
  errorContainer: '#F9DEDC',
  onErrorContainer: '#410E0B',
};

export const DYNAMIC_DARK: ColorScheme = {
  primary: '#D0BCFF',
  onPrimary: '#381E72',
  background: '#1C1B1F',
  surface: '#1C1B1F',
  onSurface: '#E6E1E5',
  onSurfaceVariant: '#CAC4D0',
  outline: '#938F99',
  error: '#F2B8B5',
  errorContainer: '#8C1D18',
  onErrorContainer: '#F9DEDC',
};

export function createFakeChrome() {
  return {
    setStatusBarColor: vi.fn<(color: string) => void>(),
    setStatusBarIconAppearance: vi.fn<(appearance: StatusBarIconAppearance) => void>(),
  };
}

interface FakeHostOptions {
  apiLevel?: number;
  systemDark?: boolean;
  isPreview?: boolean;
  dynamic?: { light: ColorScheme; dark: ColorScheme } | null;
  chrome?: WindowChrome | null;
}

export function createFakeHost({
  apiLevel = 34,
  systemDark = false,
  isPreview = false,
  dynamic = { light: DYNAMIC_LIGHT, dark: DYNAMIC_DARK },
  chrome = createFakeChrome(),
}: FakeHostOptions = {}) {
  let dark = systemDark;
  const listeners = new Set<() => void>();

  const host = {
    apiLevel,
    isPreview,
    getSystemDarkTheme: () => dark,
    subscribeSystemDarkTheme: (onChange: () => void) => {
      listeners.add(onChange);
      return () => {
        listeners.delete(onChange);
      };
    },
    getDynamicColorScheme: vi.fn((wantDark: boolean) => {
      if (!dynamic) return null;
      return wantDark ? dynamic.dark : dynamic.light;
    }),
    getWindowChrome: vi.fn(() => chrome),
    /** Simulates the OS flipping its dark-mode setting. */
    setSystemDark: (value: boolean) => {
      dark = value;
      for (const listener of listeners) listener();
    },
  } satisfies PlatformHost & { setSystemDark: (value: boolean) => void };

  return host;
}
