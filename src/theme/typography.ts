// src/theme/typography.ts
/**
 * Text styles bound next to the colour scheme. Sizes are in px.
 */

export interface TextStyle {
  fontFamily: string;
  fontWeight: 400 | 500 | 600 | 700;
  fontSize: number;
  lineHeight: number;
  letterSpacing: number;
}

export interface Typography {
  displayLarge: TextStyle;
  headlineMedium: TextStyle;
  titleLarge: TextStyle;
  titleMedium: TextStyle;
  bodyLarge: TextStyle;
  bodyMedium: TextStyle;
  labelLarge: TextStyle;
  labelSmall: TextStyle;
}

export const FONT_FAMILY = "system-ui, -apple-system, 'Segoe UI', Roboto, sans-serif";

function style(fontWeight: TextStyle['fontWeight'], fontSize: number, lineHeight: number, letterSpacing: number): TextStyle {
  return Object.freeze({ fontFamily: FONT_FAMILY, fontWeight, fontSize, lineHeight, letterSpacing });
}

export const TYPOGRAPHY: Readonly<Typography> = Object.freeze({
  displayLarge: style(400, 57, 64, -0.25),
  headlineMedium: style(400, 28, 36, 0),
  titleLarge: style(600, 22, 28, 0),
  titleMedium: style(500, 16, 24, 0.15),
  bodyLarge: style(400, 16, 24, 0.5),
  bodyMedium: style(400, 14, 20, 0.25),
  labelLarge: style(500, 14, 20, 0.1),
  labelSmall: style(500, 11, 16, 0.5),
});
