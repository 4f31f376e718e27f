/**
 * Raw colour tokens. Schemes and palettes are built from these.
 * Gray/blue/status values follow the Tailwind scale the mock-ups were drawn with.
 */

export const WHITE = '#FFFFFF';

// Brand
export const APP_BLUE = '#2563EB'; // blue-600

// Neutrals
export const GRAY_50 = '#F9FAFB';
export const GRAY_200 = '#E5E7EB';
export const GRAY_400 = '#9CA3AF';
export const GRAY_600 = '#4B5563';
export const GRAY_800 = '#1F2937';
export const GRAY_900 = '#111827';

// Status
export const STATUS_GREEN = '#16A34A';
export const STATUS_GREEN_CONTAINER = '#F0FDF4';
export const STATUS_GREEN_BORDER = '#BBF7D0';

export const STATUS_YELLOW = '#CA8A04';
export const STATUS_YELLOW_CONTAINER = '#FEFCE8';
export const STATUS_YELLOW_BORDER = '#FDE047';

export const STATUS_RED = '#DC2626';
export const STATUS_RED_CONTAINER = '#FEF2F2';
export const STATUS_RED_BORDER = '#FECACA';
