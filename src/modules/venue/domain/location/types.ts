/** Client-facing point, without the access hash. */
export interface LocationObject {
  latitude: number;
  longitude: number;
  horizontalAccuracy: number;
}
