import type { City, CityCollection, CityId } from '../entities/city.js';
import { EmptyCityCollectionError, UnknownStartCityError } from '../errors/tour-errors.js';

/**
 * What to do when the requested start id is not in the collection.
 *   reject — throw UnknownStartCityError (default)
 *   first  — start from the first city of the collection
 */
export type MissingStartPolicy = 'reject' | 'first';

export interface ResolveStartOptions {
  onMissingStart?: MissingStartPolicy;
}

export function resolveStartCity(
  cities: CityCollection,
  startId: CityId,
  options: ResolveStartOptions = {},
): City {
  const [first] = cities;
  if (first === undefined) throw new EmptyCityCollectionError();

  const match = cities.find((city) => city.id === startId);
  if (match) return match;

  if ((options.onMissingStart ?? 'reject') === 'first') return first;
  throw new UnknownStartCityError(startId);
}
