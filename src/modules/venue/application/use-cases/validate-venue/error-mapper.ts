import { UnprocessableEntityException } from '@nestjs/common';
import { VenueValidationError } from '../../../domain/errors';

/**
 * Maps domain validation failures to a 422 carrying the machine-readable code.
 * Anything else is rethrown untouched.
 */
export function mapVenueValidationError(error: unknown): never {
  if (error instanceof VenueValidationError) {
    throw new UnprocessableEntityException({ message: error.message, code: error.code });
  }

  throw error;
}
