import type { CityCollection, CitySourcePort } from '@nn-tour/domain';
import { CitySourceUnreadableError } from '../tsplib/city-source-errors.js';

/** Named collections held in memory; useful for tests and embedding. */
export class InMemoryCitySource implements CitySourcePort {
  private readonly collections = new Map<string, CityCollection>();

  constructor(initial: Record<string, CityCollection> = {}) {
    for (const [name, cities] of Object.entries(initial)) {
      this.collections.set(name, cities);
    }
  }

  set(name: string, cities: CityCollection): void {
    this.collections.set(name, cities);
  }

  async loadCities(name: string): Promise<CityCollection> {
    const cities = this.collections.get(name);
    if (!cities) {
      throw new CitySourceUnreadableError(`no city collection named "${name}"`, name);
    }
    return cities;
  }
}
