/** Upper bound, in Unicode code points, for every cleaned string. */
export const MAX_STRING_LENGTH = 35_000;

export const SPACE = 0x20;
export const CARRIAGE_RETURN = 0x0d;
export const DELETE = 0x7f;

/** `E2 80 xx` lead of U+2028..U+202E (line/paragraph separators, bidi embeddings). */
export const SEPARATOR_LEAD = 0xe2;
export const SEPARATOR_SECOND = 0x80;
export const SEPARATOR_TRAIL_MIN = 0xa8;
export const SEPARATOR_TRAIL_MAX = 0xae;

/** `CC xx` lead of the stripped combining marks U+030A, U+0333 and U+033F. */
export const COMBINING_MARK_LEAD = 0xcc;
export const COMBINING_MARK_TRAILS: ReadonlySet<number> = new Set([0x8a, 0xb3, 0xbf]);

// Unicode White_Space. Everything here is in the BMP.
export const WHITE_SPACE_CODE_UNITS: ReadonlySet<number> = new Set([
  0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x20, 0x85, 0xa0, 0x1680, 0x2000, 0x2001, 0x2002, 0x2003,
  0x2004, 0x2005, 0x2006, 0x2007, 0x2008, 0x2009, 0x200a, 0x2028, 0x2029, 0x202f, 0x205f,
  0x3000,
]);
