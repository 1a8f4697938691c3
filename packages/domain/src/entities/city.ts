import { InvalidCityError } from '../errors/tour-errors.js';

/**
 * A city on the plane. Identity is the `id` alone; two cities with equal ids
 * are the same city whatever their coordinates.
 */
export interface City {
  readonly id: number;
  readonly x: number;
  readonly y: number;
}

export type CityId = City['id'];

/** Ordered collection of cities with unique ids, owned by the caller. */
export type CityCollection = readonly City[];

export function createCity(id: number, x: number, y: number): City {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new InvalidCityError(`city id must be a non-negative integer, got ${id}`);
  }
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidCityError(`city ${id} has a non-finite coordinate (${x}, ${y})`);
  }
  return Object.freeze({ id, x, y });
}

/** Frozen copy, detached from the caller's object. */
export function copyCity(city: City): City {
  return Object.freeze({ id: city.id, x: city.x, y: city.y });
}

/** Straight-line distance. Real-valued; never rounded. */
export function distance(a: City, b: City): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function sameCity(a: City, b: City): boolean {
  return a.id === b.id;
}
