// src/platform/metaTagChrome.ts
/**
 * Window chrome for plain browsers / installed PWAs: the status bar is
 * styled through `<meta>` tags in the document head.
 */

import type { StatusBarIconAppearance } from '@/theme';
import type { WindowChrome } from './types';

export const THEME_COLOR_META = 'theme-color';
export const STATUS_BAR_STYLE_META = 'apple-mobile-web-app-status-bar-style';

/** `black` draws white status bar text, `default` draws black text. */
const STATUS_BAR_STYLE: Record<StatusBarIconAppearance, string> = {
  light: 'black',
  dark: 'default',
};

function upsertMeta(document: Document, name: string, content: string): void {
  let meta = document.querySelector(`meta[name="${name}"]`);
  if (!meta) {
    meta = document.createElement('meta');
    meta.setAttribute('name', name);
    document.head.appendChild(meta);
  }
  meta.setAttribute('content', content);
}

export function createMetaTagChrome(document: Document): WindowChrome {
  return {
    setStatusBarColor: (color) => upsertMeta(document, THEME_COLOR_META, color),
    setStatusBarIconAppearance: (appearance) => upsertMeta(document, STATUS_BAR_STYLE_META, STATUS_BAR_STYLE[appearance]),
  };
}
