import { BadRequestException } from '@nestjs/common';

const DECIMAL_INTEGER_PATTERN = /^-?\d+$/;

/** Parses a decimal int64 string. Missing values default to `0n`. */
export function parseAccessHash(value: string | undefined): bigint {
  if (value === undefined) {
    return 0n;
  }

  if (!DECIMAL_INTEGER_PATTERN.test(value)) {
    throw new BadRequestException('Invalid accessHash: must be a decimal integer');
  }

  const parsed = BigInt(value);

  if (BigInt.asIntN(64, parsed) !== parsed) {
    throw new BadRequestException('Invalid accessHash: out of 64-bit range');
  }

  return parsed;
}
