// src/theme/colorScheme.ts
/**
 * Color Schemes
 * =============
 * Semantic colour roles and the two static palettes (light / dark).
 * The schema also validates palettes handed over by the platform at runtime,
 * so the `ColorScheme` type is inferred from it.
 */

import { z } from 'zod';
import {
  APP_BLUE,
  GRAY_200,
  GRAY_400,
  GRAY_50,
  GRAY_600,
  GRAY_800,
  GRAY_900,
  STATUS_RED,
  STATUS_RED_CONTAINER,
  WHITE,
} from './colors';

// ============================================
// SCHEMA
// ============================================

const colorValueSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, 'Expected #RRGGBB or #RRGGBBAA');

export const colorSchemeSchema = z.object({
  primary: colorValueSchema,
  onPrimary: colorValueSchema,
  background: colorValueSchema,
  surface: colorValueSchema,
  onSurface: colorValueSchema,
  onSurfaceVariant: colorValueSchema,
  outline: colorValueSchema,
  error: colorValueSchema,
  errorContainer: colorValueSchema,
  onErrorContainer: colorValueSchema,
});

export type ColorScheme = Readonly<z.infer<typeof colorSchemeSchema>>;

export type ColorRole = keyof ColorScheme;

/** Role order used wherever a scheme is enumerated. */
export const COLOR_ROLES: readonly ColorRole[] = [
  'primary',
  'onPrimary',
  'background',
  'surface',
  'onSurface',
  'onSurfaceVariant',
  'outline',
  'error',
  'errorContainer',
  'onErrorContainer',
];

// ============================================
// STATIC SCHEMES
// ============================================

export const LIGHT_COLOR_SCHEME: ColorScheme = Object.freeze({
  primary: APP_BLUE,
  onPrimary: WHITE,
  background: GRAY_50,
  surface: WHITE,
  onSurface: GRAY_900,
  onSurfaceVariant: GRAY_600,
  outline: GRAY_200,
  error: STATUS_RED,
  errorContainer: STATUS_RED_CONTAINER,
  onErrorContainer: STATUS_RED,
});

export const DARK_COLOR_SCHEME: ColorScheme = Object.freeze({
  primary: APP_BLUE,
  onPrimary: WHITE,
  background: GRAY_900, // dark blue-gray
  surface: GRAY_800, // cards sit one step lighter
  onSurface: GRAY_50,
  onSurfaceVariant: GRAY_400,
  outline: GRAY_600,
  error: STATUS_RED,
  errorContainer: STATUS_RED_CONTAINER,
  onErrorContainer: STATUS_RED,
});

// ============================================
// HELPERS
// ============================================

/** Fresh frozen copy, so every resolution hands out its own reference. */
export function copyColorScheme(scheme: ColorScheme): ColorScheme {
  return Object.freeze({ ...scheme });
}

export function isSameColorScheme(a: ColorScheme, b: ColorScheme): boolean {
  return COLOR_ROLES.every((role) => a[role] === b[role]);
}
