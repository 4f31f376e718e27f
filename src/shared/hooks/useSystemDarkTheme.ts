// src/shared/hooks/useSystemDarkTheme.ts
/**
 * useSystemDarkTheme — system-level dark mode of the given host.
 * Re-renders when the OS setting flips.
 */

import { useSyncExternalStore } from 'react';
import type { PlatformHost } from '@/platform';

export function useSystemDarkTheme(host: PlatformHost): boolean {
  return useSyncExternalStore(
    host.subscribeSystemDarkTheme,
    host.getSystemDarkTheme,
    () => false, // Server snapshot renders light
  );
}

export default useSystemDarkTheme;
