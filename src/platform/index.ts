// src/platform/index.ts
// Barrel file — platform host contracts and the browser implementation.

export type { BrowserHostOptions, BrowserHostTarget, MediaQuerySource } from './browserHost';
export { createBrowserHost, DARK_SCHEME_QUERY, getBrowserHost } from './browserHost';
export { createMetaTagChrome, STATUS_BAR_STYLE_META, THEME_COLOR_META } from './metaTagChrome';
export type { BridgeTarget, NativeBridge } from './nativeBridge';
export { readNativeBridge } from './nativeBridge';
export type { PlatformHost, WindowChrome } from './types';
