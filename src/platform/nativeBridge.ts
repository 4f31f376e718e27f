// src/platform/nativeBridge.ts
/**
 * Native Bridge
 * =============
 * The WebView shell injects `platformBridge` onto the page's global object.
 * Its shape is not under our control, so it is validated before use.
 * Each section is validated on its own: a bad palette must not cost us the
 * status bar. Bridge functions are called unbound.
 */

import { z } from 'zod';
import { colorSchemeSchema, type StatusBarIconAppearance } from '@/theme';

const isFunction = (value: unknown): boolean => typeof value === 'function';

/** Logs the rejected section and substitutes `fallback` for it. */
function ignoreInvalid<T>(field: string, fallback: T) {
  return ({ error }: { error: z.ZodError }): T => {
    console.warn(`[platform] Ignoring invalid native bridge field "${field}":`, error.flatten().fieldErrors);
    return fallback;
  };
}

const statusBarBridgeSchema = z.object({
  setColor: z.custom<(color: string) => void>(isFunction, 'Expected a function'),
  setIconAppearance: z.custom<(appearance: StatusBarIconAppearance) => void>(isFunction, 'Expected a function'),
});

const dynamicColorsSchema = z.object({
  light: colorSchemeSchema,
  dark: colorSchemeSchema,
});

const nativeBridgeSchema = z.object({
  apiLevel: z.number().int().nonnegative().catch(ignoreInvalid('apiLevel', 0)),
  dynamicColors: dynamicColorsSchema.optional().catch(ignoreInvalid('dynamicColors', undefined)),
  statusBar: statusBarBridgeSchema.optional().catch(ignoreInvalid('statusBar', undefined)),
});

export type NativeBridge = z.infer<typeof nativeBridgeSchema>;

export interface BridgeTarget {
  platformBridge?: unknown;
}

// One parse per bridge object, so a bad payload warns once rather than on every read
const parsedBridges = new WeakMap<object, NativeBridge | null>();

function parseNativeBridge(raw: unknown): NativeBridge | null {
  const result = nativeBridgeSchema.safeParse(raw);
  if (!result.success) {
    console.warn('[platform] Invalid native bridge:', result.error.flatten().formErrors);
    return null;
  }
  return result.data;
}

/**
 * Looks the bridge up on every call. The shell swaps in a new bridge object when
 * the wallpaper changes; edits made in place to an already-read object are not picked up.
 */
export function readNativeBridge(target: BridgeTarget): NativeBridge | null {
  const raw = target.platformBridge;
  if (raw === undefined || raw === null) return null;
  if (typeof raw !== 'object') return parseNativeBridge(raw);

  const cached = parsedBridges.get(raw);
  if (cached !== undefined) return cached;

  const bridge = parseNativeBridge(raw);
  parsedBridges.set(raw, bridge);
  return bridge;
}
