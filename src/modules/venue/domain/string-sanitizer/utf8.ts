import { isUtf8 } from 'node:buffer';
import { InvalidUtf8Error } from '../errors';

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Length of the UTF-8 sequence introduced by `leadByte`.
 * Bytes that cannot start a sequence count as 1.
 */
export function utf8SequenceLength(leadByte: number): 1 | 2 | 3 | 4 {
  if (leadByte < 0x80) {
    return 1;
  }
  if ((leadByte & 0xe0) === 0xc0) {
    return 2;
  }
  if ((leadByte & 0xf0) === 0xe0) {
    return 3;
  }
  if ((leadByte & 0xf8) === 0xf0) {
    return 4;
  }

  return 1;
}

export function hasUnpairedSurrogate(text: string): boolean {
  return UNPAIRED_SURROGATE.test(text);
}

/**
 * Returns the UTF-8 bytes of `input`, or throws `InvalidUtf8Error`.
 * A JS string is only encodable when every surrogate is paired.
 */
export function toUtf8Bytes(input: Uint8Array | string): Uint8Array {
  if (typeof input === 'string') {
    if (hasUnpairedSurrogate(input)) {
      throw new InvalidUtf8Error();
    }

    return Buffer.from(input, 'utf8');
  }

  if (!isUtf8(input)) {
    throw new InvalidUtf8Error();
  }

  return input;
}
