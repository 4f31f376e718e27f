// src/theme/index.ts
// Barrel file — re-exports the theme values and the pure resolver.

export { APP_BLUE, WHITE } from './colors';
export type { ColorRole, ColorScheme } from './colorScheme';
export {
  COLOR_ROLES,
  colorSchemeSchema,
  copyColorScheme,
  DARK_COLOR_SCHEME,
  isSameColorScheme,
  LIGHT_COLOR_SCHEME,
} from './colorScheme';
export { applyCssVariables, colorSchemeToCssVariables, cssVariableName } from './cssVariables';
export type {
  ColorSchemeRequest,
  DynamicColorSource,
  StatusBarIconAppearance,
  StatusBarStyle,
} from './resolveColorScheme';
export {
  DYNAMIC_COLOR_MIN_API_LEVEL,
  resolveColorScheme,
  resolveStatusBarStyle,
  supportsDynamicColor,
} from './resolveColorScheme';
export type { StatusColors, StatusTone, StatusToneColors } from './statusColors';
export { STATUS_COLORS, statusToneFor } from './statusColors';
export type { TextStyle, Typography } from './typography';
export { FONT_FAMILY, TYPOGRAPHY } from './typography';
