import type { Venue } from '../venue';
import { toInputGeoPoint } from './input-geo-point';
import type { InputMediaVenue } from './types';

export function toInputMediaVenue(venue: Venue): InputMediaVenue {
  return {
    _: 'inputMediaVenue',
    geoPoint: toInputGeoPoint(venue.location),
    title: venue.title,
    address: venue.address,
    provider: venue.provider,
    venueId: venue.id,
    venueType: venue.type,
  };
}
