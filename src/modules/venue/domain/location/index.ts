export {
  MAX_HORIZONTAL_ACCURACY,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MAX_VALID_MAP_LATITUDE,
} from './constants';
export { Location, fixHorizontalAccuracy, isValidCoordinatePair } from './location';
export type { LocationObject } from './types';
