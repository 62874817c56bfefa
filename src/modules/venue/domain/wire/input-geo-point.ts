import type { Location } from '../location';
import { ACCURACY_RADIUS_FLAG, type InputGeoPoint } from './types';

/**
 * Wire form of a location. Accuracy travels as whole meters rounded up and is
 * omitted, with its flag cleared, when it is 0.
 */
export function toInputGeoPoint(location: Location): InputGeoPoint {
  if (location.isEmpty()) {
    return { _: 'inputGeoPointEmpty' };
  }

  if (location.horizontalAccuracy > 0) {
    return {
      _: 'inputGeoPoint',
      flags: ACCURACY_RADIUS_FLAG,
      lat: location.latitude,
      long: location.longitude,
      accuracyRadius: Math.ceil(location.horizontalAccuracy),
    };
  }

  return {
    _: 'inputGeoPoint',
    flags: 0,
    lat: location.latitude,
    long: location.longitude,
  };
}
