import type { City, CityId } from './city.js';

/**
 * Closed tour. `path` starts and ends on the same city; `weights[i]` is the
 * length of the edge arriving at `path[i]`, so `weights[0]` is always 0.
 */
export interface Tour {
  readonly path: readonly City[];
  readonly weights: readonly number[];
  readonly totalDistance: number;
}

export interface TourEdge {
  readonly from: CityId;
  readonly to: CityId;
  readonly weight: number;
}

export function tourEdges(tour: Tour): TourEdge[] {
  const edges: TourEdge[] = [];
  for (let i = 1; i < tour.path.length; i++) {
    const from = tour.path[i - 1];
    const to = tour.path[i];
    const weight = tour.weights[i];
    if (from === undefined || to === undefined || weight === undefined) break;
    edges.push({ from: from.id, to: to.id, weight });
  }
  return edges;
}
