import type { CityCollection } from '../../entities/city.js';

/**
 * Produces a collection of cities with unique ids from a named source
 * (a file path, a key, …). Implementations fail with distinct errors for an
 * unreadable source and a malformed one.
 */
export interface CitySourcePort {
  loadCities(source: string): Promise<CityCollection>;
}
