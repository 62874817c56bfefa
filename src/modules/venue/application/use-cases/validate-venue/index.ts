export { ValidateVenueUseCase } from './validate-venue.use-case';
export { mapVenueValidationError } from './error-mapper';
