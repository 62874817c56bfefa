import {
  CARRIAGE_RETURN,
  COMBINING_MARK_LEAD,
  COMBINING_MARK_TRAILS,
  DELETE,
  MAX_STRING_LENGTH,
  SEPARATOR_LEAD,
  SEPARATOR_SECOND,
  SEPARATOR_TRAIL_MAX,
  SEPARATOR_TRAIL_MIN,
  SPACE,
} from './constants';
import { trimWhiteSpace, truncateCodePoints } from './text-bounds';
import { toUtf8Bytes, utf8SequenceLength } from './utf8';

/**
 * Pure domain utility: turns untrusted text into a string that is safe to put on the wire.
 *
 * - rejects the whole input with `InvalidUtf8Error` when it is not well-formed UTF-8
 * - replaces C0 controls (except `\t` and `\n`) and DEL with a space, drops `\r`
 * - drops U+2028..U+202E and the combining marks U+030A, U+0333, U+033F
 * - keeps at most `MAX_STRING_LENGTH` code points, then trims Unicode white space
 *
 * The removed sequences are a fixed byte table shared with other clients; do not
 * replace it with Unicode normalization.
 */
export function cleanInputString(input: Uint8Array | string): string {
  const bytes = toUtf8Bytes(input);
  // Output is never longer than the input: every rule keeps or shrinks the byte count.
  const output = Buffer.allocUnsafe(bytes.length);
  let written = 0;
  let index = 0;

  while (index < bytes.length) {
    const byte = bytes[index];

    if (isReplacedControl(byte)) {
      output[written] = SPACE;
      written += 1;
      index += 1;
      continue;
    }

    if (byte === CARRIAGE_RETURN) {
      index += 1;
      continue;
    }

    if (isSeparatorAt(bytes, index)) {
      index += 3;
      continue;
    }

    if (isCombiningMarkAt(bytes, index)) {
      index += 2;
      continue;
    }

    const end = Math.min(index + utf8SequenceLength(byte), bytes.length);
    output.set(bytes.subarray(index, end), written);
    written += end - index;
    index = end;
  }

  const decoded = output.toString('utf8', 0, written);
  return trimWhiteSpace(truncateCodePoints(decoded, MAX_STRING_LENGTH));
}

export function isReplacedControl(byte: number): boolean {
  return (
    byte <= 0x08 ||
    byte === 0x0b ||
    byte === 0x0c ||
    (byte >= 0x0e && byte <= 0x1f) ||
    byte === DELETE
  );
}

function isSeparatorAt(bytes: Uint8Array, index: number): boolean {
  if (bytes[index] !== SEPARATOR_LEAD || index + 2 >= bytes.length) {
    return false;
  }

  const trail = bytes[index + 2];
  return (
    bytes[index + 1] === SEPARATOR_SECOND &&
    trail >= SEPARATOR_TRAIL_MIN &&
    trail <= SEPARATOR_TRAIL_MAX
  );
}

function isCombiningMarkAt(bytes: Uint8Array, index: number): boolean {
  if (bytes[index] !== COMBINING_MARK_LEAD || index + 1 >= bytes.length) {
    return false;
  }

  return COMBINING_MARK_TRAILS.has(bytes[index + 1]);
}
