import { copyCity, distance } from '../entities/city.js';
import type { City, CityCollection, CityId } from '../entities/city.js';
import type { Tour } from '../entities/tour.js';
import { DuplicateCityIdError, EmptyCityCollectionError } from '../errors/tour-errors.js';
import { resolveStartCity } from './city-accessor.js';
import type { ResolveStartOptions } from './city-accessor.js';

export type NearestNeighborOptions = ResolveStartOptions;

function assertUniqueIds(cities: CityCollection): void {
  const seen = new Set<CityId>();
  for (const city of cities) {
    if (seen.has(city.id)) throw new DuplicateCityIdError(city.id);
    seen.add(city.id);
  }
}

/**
 * Greedy tour: from the current city always move to the closest city not yet
 * visited, then return to the start. Ties go to the city that comes first in
 * `cities`. O(n²).
 */
export function buildNearestNeighborTour(
  cities: CityCollection,
  startId: CityId,
  options: NearestNeighborOptions = {},
): Tour {
  if (cities.length === 0) throw new EmptyCityCollectionError();
  assertUniqueIds(cities);

  const start = copyCity(resolveStartCity(cities, startId, options));
  const path: City[] = [start];
  const weights: number[] = [0];
  let totalDistance = 0;

  const visited = new Set<CityId>([start.id]);
  let current = start;

  while (visited.size < cities.length) {
    let next: City | undefined;
    let best = Number.POSITIVE_INFINITY;

    for (const candidate of cities) {
      if (visited.has(candidate.id)) continue;
      const d = distance(current, candidate);
      if (next === undefined || d < best) {
        next = candidate;
        best = d;
      }
    }
    // unique ids guarantee an unvisited city while visited.size < length
    if (next === undefined) break;

    const step = copyCity(next);
    path.push(step);
    weights.push(best);
    totalDistance += best;
    visited.add(step.id);
    current = step;
  }

  const closing = distance(current, start);
  path.push(start);
  weights.push(closing);
  totalDistance += closing;

  return Object.freeze({
    path: Object.freeze(path),
    weights: Object.freeze(weights),
    totalDistance,
  });
}
