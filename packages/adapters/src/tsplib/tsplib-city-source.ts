import { readFile } from 'node:fs/promises';
import type { CityCollection, CitySourcePort } from '@nn-tour/domain';
import { CitySourceUnreadableError } from './city-source-errors.js';
import { parseTsplib } from './tsplib-parser.js';
import type { TsplibDocument } from './tsplib-parser.js';

/** Loads cities from a TSPLIB `.tsp` file on disk. */
export class TsplibCitySource implements CitySourcePort {
  async loadDocument(path: string): Promise<TsplibDocument> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      throw new CitySourceUnreadableError(
        `could not read ${path}: ${err instanceof Error ? err.message : String(err)}`,
        path,
        { cause: err },
      );
    }
    return parseTsplib(text, path);
  }

  async loadCities(path: string): Promise<CityCollection> {
    const { cities } = await this.loadDocument(path);
    return cities;
  }
}
