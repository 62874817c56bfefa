import type { LocationObject } from '../location';

export interface VenueFields<TText = string> {
  title: TText;
  address: TText;
  provider: TText;
  id: TText;
  type: TText;
}

/** Raw text as it arrives from the decoding layer: a JS string or undecoded bytes. */
export type VenueTextInput = Uint8Array | string;

export type VenueInput = VenueFields<VenueTextInput>;

/** Client-facing venue. */
export interface VenueObject extends VenueFields {
  location: LocationObject;
}
