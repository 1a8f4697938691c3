/**
 * City / Tour value tests and start-city resolution.
 */

import { describe, it, expect } from '@jest/globals';

import {
  copyCity,
  createCity,
  distance,
  EmptyCityCollectionError,
  InvalidCityError,
  resolveStartCity,
  sameCity,
  tourEdges,
  TourDomainError,
  UnknownStartCityError,
} from '../index.js';
import type { Tour } from '../index.js';

describe('createCity', () => {
  it('builds a frozen city', () => {
    const city = createCity(3, 1.5, -2);
    expect(city).toEqual({ id: 3, x: 1.5, y: -2 });
    expect(Object.isFrozen(city)).toBe(true);
  });

  it('accepts id 0', () => {
    expect(createCity(0, 0, 0).id).toBe(0);
  });

  it.each([-1, 1.5, Number.NaN])('rejects id %p', (id) => {
    expect(() => createCity(id, 0, 0)).toThrow(InvalidCityError);
  });

  it('rejects non-finite coordinates', () => {
    expect(() => createCity(1, Number.POSITIVE_INFINITY, 0)).toThrow(InvalidCityError);
    expect(() => createCity(1, 0, Number.NaN)).toThrow(InvalidCityError);
  });

  it('errors carry a stable code', () => {
    let caught: unknown;
    try {
      createCity(-4, 0, 0);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TourDomainError);
    expect(caught).toMatchObject({ code: 'invalid_city', name: 'InvalidCityError' });
  });
});

describe('distance', () => {
  it('is the Euclidean length of the segment', () => {
    expect(distance(createCity(1, 0, 0), createCity(2, 3, 4))).toBe(5);
    expect(distance(createCity(1, -1, -1), createCity(2, 2, 3))).toBe(5);
  });

  it('is symmetric and zero to itself', () => {
    const a = createCity(1, 2.5, 7);
    const b = createCity(2, -3, 0.25);
    expect(distance(a, b)).toBe(distance(b, a));
    expect(distance(a, a)).toBe(0);
  });

  it('keeps the fractional part', () => {
    expect(distance(createCity(1, 0, 0), createCity(2, 1, 1))).toBe(Math.SQRT2);
  });
});

describe('sameCity / copyCity', () => {
  it('compares by id only', () => {
    expect(sameCity(createCity(1, 0, 0), createCity(1, 9, 9))).toBe(true);
    expect(sameCity(createCity(1, 0, 0), createCity(2, 0, 0))).toBe(false);
  });

  it('copies into a new frozen object', () => {
    const source = { id: 4, x: 1, y: 2 };
    const copy = copyCity(source);
    expect(copy).toEqual(source);
    expect(copy).not.toBe(source);
    expect(Object.isFrozen(copy)).toBe(true);
  });
});

describe('resolveStartCity', () => {
  const cities = [createCity(10, 0, 0), createCity(20, 1, 1), createCity(30, 2, 2)];

  it('returns the city with the requested id', () => {
    expect(resolveStartCity(cities, 20)).toBe(cities[1]);
  });

  it('throws UnknownStartCityError for a missing id by default', () => {
    expect(() => resolveStartCity(cities, 99)).toThrow(UnknownStartCityError);
    expect(() => resolveStartCity(cities, 99, { onMissingStart: 'reject' })).toThrow(
      'no city with id 99',
    );
  });

  it('returns the first city for a missing id under the "first" policy', () => {
    expect(resolveStartCity(cities, 99, { onMissingStart: 'first' })).toBe(cities[0]);
  });

  it('throws EmptyCityCollectionError for an empty collection', () => {
    expect(() => resolveStartCity([], 1)).toThrow(EmptyCityCollectionError);
    expect(() => resolveStartCity([], 1, { onMissingStart: 'first' })).toThrow(
      EmptyCityCollectionError,
    );
  });
});

describe('tourEdges', () => {
  it('pairs consecutive path entries with the arriving weight', () => {
    const a = createCity(1, 0, 0);
    const b = createCity(2, 3, 4);
    const tour: Tour = { path: [a, b, a], weights: [0, 5, 5], totalDistance: 10 };
    expect(tourEdges(tour)).toEqual([
      { from: 1, to: 2, weight: 5 },
      { from: 2, to: 1, weight: 5 },
    ]);
  });

  it('yields a single zero-length edge for a one-city tour', () => {
    const a = createCity(1, 0, 0);
    const tour: Tour = { path: [a, a], weights: [0, 0], totalDistance: 0 };
    expect(tourEdges(tour)).toEqual([{ from: 1, to: 1, weight: 0 }]);
  });
});
