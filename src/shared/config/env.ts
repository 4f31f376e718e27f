// src/shared/config/env.ts
/**
 * Environment Variable Validation
 * ===============================
 * Zod-based validation for the VITE_* flags the theme reads.
 * Warns on invalid values but does not throw — falls back to defaults.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

const envSchema = z.object({
  /** Default for ThemeProvider's `dynamicColor` prop. */
  VITE_DYNAMIC_COLOR: booleanFlag,
  /** Design-preview builds: status bar sync is skipped. */
  VITE_PREVIEW_MODE: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

const DEFAULT_ENV: Env = {
  VITE_DYNAMIC_COLOR: false,
  VITE_PREVIEW_MODE: false,
};

export function parseEnv(raw: Record<string, unknown>): Env {
  const result = envSchema.safeParse({
    VITE_DYNAMIC_COLOR: raw.VITE_DYNAMIC_COLOR,
    VITE_PREVIEW_MODE: raw.VITE_PREVIEW_MODE,
  });
  if (!result.success) {
    console.warn('[env] Invalid environment variables:', result.error.flatten().fieldErrors);
    // Don't throw — run with defaults
    return DEFAULT_ENV;
  }
  return result.data;
}

export const env = parseEnv({
  VITE_DYNAMIC_COLOR: import.meta.env.VITE_DYNAMIC_COLOR,
  VITE_PREVIEW_MODE: import.meta.env.VITE_PREVIEW_MODE,
});
