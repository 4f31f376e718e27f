// src/theme/statusColors.ts
/**
 * Status tones for permission / health cards. Same in light and dark mode.
 */

import {
  STATUS_GREEN,
  STATUS_GREEN_BORDER,
  STATUS_GREEN_CONTAINER,
  STATUS_RED,
  STATUS_RED_BORDER,
  STATUS_RED_CONTAINER,
  STATUS_YELLOW,
  STATUS_YELLOW_BORDER,
  STATUS_YELLOW_CONTAINER,
} from './colors';

export type StatusTone = 'success' | 'warning' | 'error';

export interface StatusToneColors {
  content: string;
  container: string;
  border: string;
}

export type StatusColors = Readonly<Record<StatusTone, Readonly<StatusToneColors>>>;

export const STATUS_COLORS: StatusColors = Object.freeze({
  success: Object.freeze({ content: STATUS_GREEN, container: STATUS_GREEN_CONTAINER, border: STATUS_GREEN_BORDER }),
  warning: Object.freeze({ content: STATUS_YELLOW, container: STATUS_YELLOW_CONTAINER, border: STATUS_YELLOW_BORDER }),
  error: Object.freeze({ content: STATUS_RED, container: STATUS_RED_CONTAINER, border: STATUS_RED_BORDER }),
});

/** Maps a granted/denied flag to its tone; `null` means pending. */
export function statusToneFor(granted: boolean | null): StatusTone {
  if (granted === null) return 'warning';
  return granted ? 'success' : 'error';
}
