import { WHITE_SPACE_CODE_UNITS } from './constants';

/** Keeps at most `limit` code points; surrogate pairs are never split. */
export function truncateCodePoints(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  let count = 0;
  let index = 0;
  while (index < text.length) {
    if (count === limit) {
      return text.slice(0, index);
    }

    const codePoint = text.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
    count += 1;
  }

  return text;
}

export function countCodePoints(text: string): number {
  return Array.from(text).length;
}

export function isWhiteSpace(codeUnit: number): boolean {
  return WHITE_SPACE_CODE_UNITS.has(codeUnit);
}

/** Trims Unicode White_Space from both ends. Unlike `String#trim`, U+FEFF is kept and U+0085 is removed. */
export function trimWhiteSpace(text: string): string {
  let start = 0;
  let end = text.length;

  while (start < end && isWhiteSpace(text.charCodeAt(start))) {
    start += 1;
  }
  while (end > start && isWhiteSpace(text.charCodeAt(end - 1))) {
    end -= 1;
  }

  return text.slice(start, end);
}
