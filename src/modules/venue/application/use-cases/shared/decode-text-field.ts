import { BadRequestException } from '@nestjs/common';
import type { VenueTextInput } from '../../../domain/venue';
import type { TextEncoding } from '../../../dto/validate-venue-request.dto';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * `utf8` fields are passed through as JS strings; `base64` fields are decoded to
 * raw bytes without any UTF-8 interpretation, so the cleaner sees them untouched.
 */
export function decodeTextField(
  fieldName: string,
  value: string,
  encoding: TextEncoding,
): VenueTextInput {
  if (encoding === 'utf8') {
    return value;
  }

  if (!BASE64_PATTERN.test(value)) {
    throw new BadRequestException(`Invalid ${fieldName}: must be base64 encoded`);
  }

  return Buffer.from(value, 'base64');
}
