import abbreviations from './data/venueAbbreviations.json';

/** Lookup key: case, periods and spacing ignored */
export function venueKey(venue: string): string {
  return venue.toLowerCase().replace(/\./g, ' ').replace(/\s+/g, ' ').trim();
}

const FULL_NAMES = new Map<string, string>(
  Object.entries(abbreviations).map(([abbr, full]) => [venueKey(abbr), full])
);

/**
 * Expand a known journal abbreviation ("Phys. Rev. Lett.") to its full
 * name; anything else comes back unchanged
 */
export function resolveVenue(venue: string): string {
  return FULL_NAMES.get(venueKey(venue)) ?? venue;
}
