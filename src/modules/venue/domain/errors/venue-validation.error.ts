export const VENUE_VALIDATION_ERROR_CODES = [
  'INVALID_LOCATION',
  'INVALID_TITLE',
  'INVALID_ADDRESS',
  'INVALID_PROVIDER',
  'INVALID_ID',
  'INVALID_TYPE',
] as const;

export type VenueValidationErrorCode = (typeof VENUE_VALIDATION_ERROR_CODES)[number];

export type VenueField = 'location' | 'title' | 'address' | 'provider' | 'id' | 'type';

const FIELD_BY_CODE: Record<VenueValidationErrorCode, VenueField> = {
  INVALID_LOCATION: 'location',
  INVALID_TITLE: 'title',
  INVALID_ADDRESS: 'address',
  INVALID_PROVIDER: 'provider',
  INVALID_ID: 'id',
  INVALID_TYPE: 'type',
};

const MESSAGE_BY_CODE: Record<VenueValidationErrorCode, string> = {
  INVALID_LOCATION: 'Wrong venue location specified',
  INVALID_TITLE: 'Venue title must be encoded in UTF-8',
  INVALID_ADDRESS: 'Venue address must be encoded in UTF-8',
  INVALID_PROVIDER: 'Venue provider must be encoded in UTF-8',
  INVALID_ID: 'Venue identifier must be encoded in UTF-8',
  INVALID_TYPE: 'Venue type must be encoded in UTF-8',
};

/**
 * Raised by `Venue.validateAndCreate` for the first field that fails validation.
 * No partially built venue is ever returned alongside it.
 */
export class VenueValidationError extends Error {
  public readonly field: VenueField;

  constructor(
    public readonly code: VenueValidationErrorCode,
    options?: { cause?: unknown },
  ) {
    super(MESSAGE_BY_CODE[code], options);
    this.name = 'VenueValidationError';
    this.field = FIELD_BY_CODE[code];
  }
}
