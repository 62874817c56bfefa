import { VenueValidationError, type VenueValidationErrorCode } from '../errors';
import { Location } from '../location';
import { cleanInputString } from '../string-sanitizer';
import type { VenueFields, VenueInput, VenueObject, VenueTextInput } from './types';

const FIELD_ERROR_CODES: ReadonlyArray<[keyof VenueFields, VenueValidationErrorCode]> = [
  ['title', 'INVALID_TITLE'],
  ['address', 'INVALID_ADDRESS'],
  ['provider', 'INVALID_PROVIDER'],
  ['id', 'INVALID_ID'],
  ['type', 'INVALID_TYPE'],
];

function cleanField(value: VenueTextInput, code: VenueValidationErrorCode): string {
  try {
    return cleanInputString(value);
  } catch (error: unknown) {
    throw new VenueValidationError(code, { cause: error });
  }
}

/**
 * A named place anchored to a location.
 *
 * `validateAndCreate` is the entry point for untrusted input. `create` skips
 * validation and is meant for data that already went through it.
 */
export class Venue {
  private constructor(
    readonly location: Location,
    readonly title: string,
    readonly address: string,
    readonly provider: string,
    readonly id: string,
    readonly type: string,
  ) {
    Object.freeze(this);
  }

  static create(location: Location, fields: VenueFields): Venue {
    return new Venue(location, fields.title, fields.address, fields.provider, fields.id, fields.type);
  }

  /**
   * Cleans every text field and checks the location.
   * Throws `VenueValidationError` for the first failure, in the order
   * location, title, address, provider, id, type.
   */
  static validateAndCreate(location: Location, input: VenueInput): Venue {
    if (location.isEmpty()) {
      throw new VenueValidationError('INVALID_LOCATION');
    }

    const cleaned: VenueFields = { title: '', address: '', provider: '', id: '', type: '' };
    for (const [field, code] of FIELD_ERROR_CODES) {
      cleaned[field] = cleanField(input[field], code);
    }

    return Venue.create(location, cleaned);
  }

  isEmpty(): boolean {
    return this.location.isEmpty();
  }

  /** Same real-world place: provider and id match exactly, other fields are ignored. */
  isSameProviderId(other: Venue): boolean;
  isSameProviderId(provider: string, id: string): boolean;
  isSameProviderId(otherOrProvider: Venue | string, id?: string): boolean {
    if (otherOrProvider instanceof Venue) {
      return this.provider === otherOrProvider.provider && this.id === otherOrProvider.id;
    }

    return this.provider === otherOrProvider && this.id === id;
  }

  equals(other: Venue): boolean {
    return (
      this.location.equals(other.location) &&
      this.title === other.title &&
      this.address === other.address &&
      this.provider === other.provider &&
      this.id === other.id &&
      this.type === other.type
    );
  }

  toVenueObject(): VenueObject | null {
    const location = this.location.toLocationObject();
    if (location === null) {
      return null;
    }

    return {
      location,
      title: this.title,
      address: this.address,
      provider: this.provider,
      id: this.id,
      type: this.type,
    };
  }
}
