import { Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { VenueValidationError } from '../../../domain/errors';
import { Venue, type VenueInput, type VenueObject } from '../../../domain/venue';
import { toInputMediaVenue } from '../../../domain/wire';
import type { ValidateVenueRequestDto } from '../../../dto/validate-venue-request.dto';
import type { ValidateVenueSuccessResponseDto } from '../../../dto/venue-response.dto';
import { buildLocation } from '../normalize-location';
import { decodeTextField } from '../shared';
import { mapVenueValidationError } from './error-mapper';

@Injectable()
export class ValidateVenueUseCase {
  private readonly logger = createLogger(ValidateVenueUseCase.name);

  execute(input: {
    requestId: string;
    payload: ValidateVenueRequestDto;
  }): ValidateVenueSuccessResponseDto {
    const { payload } = input;
    const encoding = payload.encoding ?? 'utf8';
    const location = buildLocation(payload.location);
    const fields: VenueInput = {
      title: decodeTextField('title', payload.title, encoding),
      address: decodeTextField('address', payload.address, encoding),
      provider: decodeTextField('provider', payload.provider, encoding),
      id: decodeTextField('id', payload.id, encoding),
      type: decodeTextField('type', payload.type, encoding),
    };

    let venue: Venue;
    try {
      venue = Venue.validateAndCreate(location, fields);
    } catch (error: unknown) {
      if (error instanceof VenueValidationError) {
        this.logger.warn('venue_validation_rejected', {
          event: 'venue_validation_rejected',
          request_id: input.requestId,
          code: error.code,
          field: error.field,
          encoding,
        });
      }
      return mapVenueValidationError(error);
    }

    this.logger.debug('venue_validated', {
      event: 'venue_validated',
      request_id: input.requestId,
      provider: venue.provider,
      is_valid_map_point: venue.location.isValidMapPoint(),
    });

    return {
      ok: true,
      venue: toVenueObjectOrThrow(venue),
      inputMediaVenue: toInputMediaVenue(venue),
    };
  }
}

function toVenueObjectOrThrow(venue: Venue): VenueObject {
  const venueObject = venue.toVenueObject();
  if (venueObject === null) {
    // validateAndCreate rejects empty locations.
    throw new VenueValidationError('INVALID_LOCATION');
  }

  return venueObject;
}
