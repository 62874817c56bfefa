/** Set in `InputGeoPointData.flags` when `accuracyRadius` is present. */
export const ACCURACY_RADIUS_FLAG = 1 << 0;

export interface InputGeoPointEmpty {
  _: 'inputGeoPointEmpty';
}

export interface InputGeoPointData {
  _: 'inputGeoPoint';
  flags: number;
  lat: number;
  long: number;
  accuracyRadius?: number;
}

export type InputGeoPoint = InputGeoPointEmpty | InputGeoPointData;

export interface InputMediaVenue {
  _: 'inputMediaVenue';
  geoPoint: InputGeoPoint;
  title: string;
  address: string;
  provider: string;
  venueId: string;
  venueType: string;
}
