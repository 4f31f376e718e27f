import { describe, expect, it } from 'vitest';
import {
  COLOR_ROLES,
  colorSchemeSchema,
  copyColorScheme,
  DARK_COLOR_SCHEME,
  isSameColorScheme,
  LIGHT_COLOR_SCHEME,
} from '@/theme/colorScheme';

describe('static color schemes', () => {
  it('light scheme carries the exact literal values', () => {
    expect(LIGHT_COLOR_SCHEME).toEqual({
      primary: '#2563EB',
      onPrimary: '#FFFFFF',
      background: '#F9FAFB',
      surface: '#FFFFFF',
      onSurface: '#111827',
      onSurfaceVariant: '#4B5563',
      outline: '#E5E7EB',
      error: '#DC2626',
      errorContainer: '#FEF2F2',
      onErrorContainer: '#DC2626',
    });
  });

  it('dark scheme carries the exact literal values', () => {
    expect(DARK_COLOR_SCHEME).toEqual({
      primary: '#2563EB',
      onPrimary: '#FFFFFF',
      background: '#111827',
      surface: '#1F2937',
      onSurface: '#F9FAFB',
      onSurfaceVariant: '#9CA3AF',
      outline: '#4B5563',
      error: '#DC2626',
      errorContainer: '#FEF2F2',
      onErrorContainer: '#DC2626',
    });
  });

  it('light and dark differ', () => {
    expect(isSameColorScheme(LIGHT_COLOR_SCHEME, DARK_COLOR_SCHEME)).toBe(false);
  });

  it('static schemes are frozen', () => {
    expect(Object.isFrozen(LIGHT_COLOR_SCHEME)).toBe(true);
    expect(Object.isFrozen(DARK_COLOR_SCHEME)).toBe(true);
  });

  it('lists every role once', () => {
    expect(COLOR_ROLES).toHaveLength(10);
    expect(new Set(COLOR_ROLES).size).toBe(10);
    expect([...COLOR_ROLES].sort()).toEqual(Object.keys(LIGHT_COLOR_SCHEME).sort());
  });
});

describe('colorSchemeSchema', () => {
  it('accepts both static schemes', () => {
    expect(colorSchemeSchema.safeParse(LIGHT_COLOR_SCHEME).success).toBe(true);
    expect(colorSchemeSchema.safeParse(DARK_COLOR_SCHEME).success).toBe(true);
  });

  it('accepts 8-digit hex with alpha', () => {
    const result = colorSchemeSchema.safeParse({ ...LIGHT_COLOR_SCHEME, outline: '#E5E7EB80' });
    expect(result.success).toBe(true);
  });

  it('rejects named colours', () => {
    const result = colorSchemeSchema.safeParse({ ...LIGHT_COLOR_SCHEME, primary: 'blue' });
    expect(result.success).toBe(false);
  });

  it('rejects a scheme missing a role', () => {
    const { outline: _outline, ...partial } = LIGHT_COLOR_SCHEME;
    expect(colorSchemeSchema.safeParse(partial).success).toBe(false);
  });
});

describe('copyColorScheme', () => {
  it('returns a new frozen object equal by value', () => {
    const copy = copyColorScheme(DARK_COLOR_SCHEME);
    expect(copy).not.toBe(DARK_COLOR_SCHEME);
    expect(copy).toEqual(DARK_COLOR_SCHEME);
    expect(Object.isFrozen(copy)).toBe(true);
  });
});
