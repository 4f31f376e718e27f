// src/theme/cssVariables.ts
import { COLOR_ROLES, type ColorRole, type ColorScheme } from './colorScheme';

/** `onSurfaceVariant` → `--color-on-surface-variant` */
export function cssVariableName(role: ColorRole): string {
  return `--color-${role.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

export function colorSchemeToCssVariables(scheme: ColorScheme): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const role of COLOR_ROLES) {
    variables[cssVariableName(role)] = scheme[role];
  }
  return variables;
}

/** Writes the scheme onto an element's inline style (usually `<html>`). */
export function applyCssVariables(element: HTMLElement, scheme: ColorScheme): void {
  for (const [name, value] of Object.entries(colorSchemeToCssVariables(scheme))) {
    element.style.setProperty(name, value);
  }
}
