import { Injectable } from '@nestjs/common';
import { VenueValidationError, type VenueValidationErrorCode } from '../../../domain/errors';
import { Location } from '../../../domain/location';
import { cleanInputString } from '../../../domain/string-sanitizer';
import { Venue } from '../../../domain/venue';
import type {
  CompareVenuesRequestDto,
  VenueIdentityDto,
} from '../../../dto/compare-venues-request.dto';
import type { CompareVenuesResponseDto } from '../../../dto/venue-response.dto';
import { mapVenueValidationError } from '../validate-venue';

/**
 * Tells whether two venue reports name the same real-world place.
 * Identity is compared after cleaning, the same way stored venues are.
 */
@Injectable()
export class CompareVenuesUseCase {
  execute(payload: CompareVenuesRequestDto): CompareVenuesResponseDto {
    try {
      const left = toIdentityVenue(payload.left);
      const right = toIdentityVenue(payload.right);
      return { ok: true, sameProviderId: left.isSameProviderId(right) };
    } catch (error: unknown) {
      return mapVenueValidationError(error);
    }
  }
}

function toIdentityVenue(identity: VenueIdentityDto): Venue {
  return Venue.create(Location.empty(), {
    title: '',
    address: '',
    provider: cleanIdentityField(identity.provider, 'INVALID_PROVIDER'),
    id: cleanIdentityField(identity.id, 'INVALID_ID'),
    type: '',
  });
}

function cleanIdentityField(value: string, code: VenueValidationErrorCode): string {
  try {
    return cleanInputString(value);
  } catch (error: unknown) {
    throw new VenueValidationError(code, { cause: error });
  }
}
