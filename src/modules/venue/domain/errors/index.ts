export { InvalidUtf8Error } from './invalid-utf8.error';
export {
  VENUE_VALIDATION_ERROR_CODES,
  VenueValidationError,
  type VenueField,
  type VenueValidationErrorCode,
} from './venue-validation.error';
