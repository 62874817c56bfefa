import { Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { Location } from '../../../domain/location';
import { toInputGeoPoint } from '../../../domain/wire';
import type { LocationInputDto } from '../../../dto/location-input.dto';
import type { NormalizeLocationResponseDto } from '../../../dto/venue-response.dto';
import { parseAccessHash } from '../shared';

/** Builds a location from raw coordinates. Bad coordinates degrade to the empty sentinel. */
export function buildLocation(input: LocationInputDto): Location {
  return Location.fromComponents(
    input.latitude,
    input.longitude,
    input.horizontalAccuracy ?? 0,
    parseAccessHash(input.accessHash),
  );
}

@Injectable()
export class NormalizeLocationUseCase {
  private readonly logger = createLogger(NormalizeLocationUseCase.name);

  execute(input: { requestId: string; payload: LocationInputDto }): NormalizeLocationResponseDto {
    const location = buildLocation(input.payload);

    if (location.isEmpty()) {
      this.logger.debug('location_degraded_to_empty', {
        event: 'location_degraded_to_empty',
        request_id: input.requestId,
        latitude: input.payload.latitude,
        longitude: input.payload.longitude,
      });
    }

    return {
      ok: true,
      isEmpty: location.isEmpty(),
      isValidMapPoint: location.isValidMapPoint(),
      location: location.toLocationObject(),
      accessHash: location.accessHash.toString(),
      geoPoint: toInputGeoPoint(location),
    };
  }
}
