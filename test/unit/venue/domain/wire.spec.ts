import { Location } from '@/modules/venue/domain/location';
import { Venue } from '@/modules/venue/domain/venue';
import { ACCURACY_RADIUS_FLAG, toInputGeoPoint, toInputMediaVenue } from '@/modules/venue/domain/wire';

describe('toInputGeoPoint', () => {
  it('encodes the empty location as inputGeoPointEmpty', () => {
    expect(toInputGeoPoint(Location.empty())).toEqual({ _: 'inputGeoPointEmpty' });
  });

  it('sets the accuracy flag and rounds the radius up', () => {
    expect(toInputGeoPoint(Location.fromComponents(55.7558, 37.6173, 10.2, 0n))).toEqual({
      _: 'inputGeoPoint',
      flags: ACCURACY_RADIUS_FLAG,
      lat: 55.7558,
      long: 37.6173,
      accuracyRadius: 11,
    });
  });

  it('keeps a whole radius as is', () => {
    const point = toInputGeoPoint(Location.fromComponents(1, 2, 1500, 0n));

    expect(point).toMatchObject({ flags: 1, accuracyRadius: 1500 });
  });

  it('omits the radius when accuracy is 0', () => {
    const point = toInputGeoPoint(Location.fromComponents(86, 10, -5, 0n));

    expect(point).toEqual({ _: 'inputGeoPoint', flags: 0, lat: 86, long: 10 });
    expect(point).not.toHaveProperty('accuracyRadius');
  });
});

describe('toInputMediaVenue', () => {
  it('maps venue fields onto the wire names', () => {
    const venue = Venue.create(Location.fromComponents(55.7558, 37.6173, 10, 0n), {
      title: 'Cafe Pushkin',
      address: 'Pushkin Square, Moscow',
      provider: 'foursquare',
      id: '4b5f',
      type: 'Restaurant',
    });

    expect(toInputMediaVenue(venue)).toEqual({
      _: 'inputMediaVenue',
      geoPoint: {
        _: 'inputGeoPoint',
        flags: 1,
        lat: 55.7558,
        long: 37.6173,
        accuracyRadius: 10,
      },
      title: 'Cafe Pushkin',
      address: 'Pushkin Square, Moscow',
      provider: 'foursquare',
      venueId: '4b5f',
      venueType: 'Restaurant',
    });
  });
});
