// src/components/AppTheme.tsx
/**
 * App-root theme: ThemeProvider driven by the appearance store.
 */

import type { ReactNode } from 'react';
import { ThemeProvider } from '@/contexts/ThemeContext';
import type { PlatformHost } from '@/platform';
import { darkThemeForMode, useAppearanceStore } from '@/stores/appearanceStore';

interface AppThemeProps {
  children: ReactNode;
  host?: PlatformHost;
}

export function AppTheme({ children, host }: AppThemeProps) {
  const mode = useAppearanceStore((s) => s.mode);
  const dynamicColor = useAppearanceStore((s) => s.dynamicColor);

  return (
    <ThemeProvider darkTheme={darkThemeForMode(mode)} dynamicColor={dynamicColor} host={host}>
      {children}
    </ThemeProvider>
  );
}

export default AppTheme;
