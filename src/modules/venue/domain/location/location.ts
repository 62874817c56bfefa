import {
  MAX_HORIZONTAL_ACCURACY,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MAX_VALID_MAP_LATITUDE,
} from './constants';
import type { LocationObject } from './types';

/**
 * Clamps a reported accuracy radius into `[0, MAX_HORIZONTAL_ACCURACY]`.
 * Non-finite and non-positive values become 0.
 */
export function fixHorizontalAccuracy(accuracy: number): number {
  if (!Number.isFinite(accuracy) || accuracy <= 0) {
    return 0;
  }
  if (accuracy >= MAX_HORIZONTAL_ACCURACY) {
    return MAX_HORIZONTAL_ACCURACY;
  }

  return accuracy;
}

export function isValidCoordinatePair(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= MAX_LATITUDE &&
    Math.abs(longitude) <= MAX_LONGITUDE
  );
}

/**
 * Immutable geographic point.
 *
 * Built only through the factories: invalid coordinates never throw, they produce
 * the empty sentinel (`isEmpty() === true`, every other field zeroed).
 */
export class Location {
  private static readonly EMPTY = new Location(true, 0, 0, 0, 0n);

  private constructor(
    private readonly emptyFlag: boolean,
    readonly latitude: number,
    readonly longitude: number,
    readonly horizontalAccuracy: number,
    readonly accessHash: bigint,
  ) {
    Object.freeze(this);
  }

  static empty(): Location {
    return Location.EMPTY;
  }

  static fromComponents(
    latitude: number,
    longitude: number,
    horizontalAccuracy: number,
    accessHash: bigint,
  ): Location {
    if (!isValidCoordinatePair(latitude, longitude)) {
      return Location.EMPTY;
    }

    return new Location(
      false,
      latitude,
      longitude,
      fixHorizontalAccuracy(horizontalAccuracy),
      accessHash,
    );
  }

  /** Client points carry no access hash. */
  static fromPoint(point: LocationObject): Location {
    return Location.fromComponents(point.latitude, point.longitude, point.horizontalAccuracy, 0n);
  }

  isEmpty(): boolean {
    return this.emptyFlag;
  }

  isValidMapPoint(): boolean {
    return !this.emptyFlag && Math.abs(this.latitude) <= MAX_VALID_MAP_LATITUDE;
  }

  withAccessHash(accessHash: bigint): Location {
    if (this.emptyFlag) {
      return this;
    }

    return new Location(false, this.latitude, this.longitude, this.horizontalAccuracy, accessHash);
  }

  equals(other: Location): boolean {
    return (
      this.emptyFlag === other.emptyFlag &&
      this.latitude === other.latitude &&
      this.longitude === other.longitude &&
      this.horizontalAccuracy === other.horizontalAccuracy &&
      this.accessHash === other.accessHash
    );
  }

  toLocationObject(): LocationObject | null {
    if (this.emptyFlag) {
      return null;
    }

    return {
      latitude: this.latitude,
      longitude: this.longitude,
      horizontalAccuracy: this.horizontalAccuracy,
    };
  }
}
