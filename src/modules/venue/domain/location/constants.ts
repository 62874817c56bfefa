export const MAX_LATITUDE = 90;
export const MAX_LONGITUDE = 180;

/** Horizontal accuracy is clamped to `[0, MAX_HORIZONTAL_ACCURACY]` meters. */
export const MAX_HORIZONTAL_ACCURACY = 1500;

/**
 * Highest latitude the Web Mercator tile projection can draw.
 * Points above it are valid on the wire but cannot be shown on a map.
 */
export const MAX_VALID_MAP_LATITUDE = 85.05112877;
