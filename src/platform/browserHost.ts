// src/platform/browserHost.ts
/**
 * Browser Host
 * ============
 * Default PlatformHost for the browser / WebView shell.
 *  - System dark mode from `prefers-color-scheme`
 *  - API level and dynamic palettes from the native bridge (0 / none without one)
 *  - Status bar through the bridge, else through `<meta>` tags
 */

import { env } from '@/shared/config/env';
import { createMetaTagChrome } from './metaTagChrome';
import { type BridgeTarget, readNativeBridge } from './nativeBridge';
import type { PlatformHost, WindowChrome } from './types';

// ============================================
// TYPES
// ============================================

/** The part of `MediaQueryList` the host relies on. */
export interface MediaQuerySource {
  matches: boolean;
  addEventListener: (type: 'change', listener: () => void) => void;
  removeEventListener: (type: 'change', listener: () => void) => void;
}

export interface BrowserHostTarget extends BridgeTarget {
  matchMedia?: (query: string) => MediaQuerySource;
  document?: Document;
}

export interface BrowserHostOptions {
  /** Global object to read from. Defaults to `window` when there is one. */
  target?: BrowserHostTarget;
  /** Defaults to `VITE_PREVIEW_MODE`. */
  isPreview?: boolean;
}

// ============================================
// CONSTANTS
// ============================================

export const DARK_SCHEME_QUERY = '(prefers-color-scheme: dark)';

const noop = (): void => {};

// ============================================
// FACTORY
// ============================================

export function createBrowserHost({ target, isPreview }: BrowserHostOptions = {}): PlatformHost {
  const scope: BrowserHostTarget = target ?? (typeof window === 'undefined' ? {} : window);

  return {
    get apiLevel() {
      return readNativeBridge(scope)?.apiLevel ?? 0;
    },

    isPreview: isPreview ?? env.VITE_PREVIEW_MODE,

    getSystemDarkTheme: () => scope.matchMedia?.(DARK_SCHEME_QUERY).matches ?? false,

    subscribeSystemDarkTheme: (onChange) => {
      if (!scope.matchMedia) return noop;
      const mediaQuery = scope.matchMedia(DARK_SCHEME_QUERY);
      mediaQuery.addEventListener('change', onChange);
      return () => mediaQuery.removeEventListener('change', onChange);
    },

    getDynamicColorScheme: (dark) => {
      const colors = readNativeBridge(scope)?.dynamicColors;
      if (!colors) return null;
      return dark ? colors.dark : colors.light;
    },

    getWindowChrome: (): WindowChrome | null => {
      const statusBar = readNativeBridge(scope)?.statusBar;
      if (statusBar) {
        return {
          setStatusBarColor: statusBar.setColor,
          setStatusBarIconAppearance: statusBar.setIconAppearance,
        };
      }
      return scope.document ? createMetaTagChrome(scope.document) : null;
    },
  };
}

let sharedHost: PlatformHost | null = null;

/** Lazily created host for the current page. */
export function getBrowserHost(): PlatformHost {
  if (!sharedHost) {
    sharedHost = createBrowserHost();
  }
  return sharedHost;
}
