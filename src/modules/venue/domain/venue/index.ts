export { Venue } from './venue';
export type { VenueFields, VenueInput, VenueObject, VenueTextInput } from './types';
