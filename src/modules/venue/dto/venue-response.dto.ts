import type { LocationObject } from '../domain/location';
import type { VenueObject } from '../domain/venue';
import type { InputGeoPoint, InputMediaVenue } from '../domain/wire';

export class NormalizeLocationResponseDto {
  ok!: true;
  isEmpty!: boolean;
  isValidMapPoint!: boolean;
  location!: LocationObject | null;
  accessHash!: string;
  geoPoint!: InputGeoPoint;
}

export class ValidateVenueSuccessResponseDto {
  ok!: true;
  venue!: VenueObject;
  inputMediaVenue!: InputMediaVenue;
}

export class CompareVenuesResponseDto {
  ok!: true;
  sameProviderId!: boolean;
}
