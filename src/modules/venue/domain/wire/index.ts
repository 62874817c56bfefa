export { toInputGeoPoint } from './input-geo-point';
export { toInputMediaVenue } from './input-media-venue';
export {
  ACCURACY_RADIUS_FLAG,
  type InputGeoPoint,
  type InputGeoPointData,
  type InputGeoPointEmpty,
  type InputMediaVenue,
} from './types';
