import { createCity, InvalidCityError } from '@nn-tour/domain';
import type { City } from '@nn-tour/domain';
import { CitySourceMalformedError } from './city-source-errors.js';

export interface TsplibHeader {
  name?: string;
  type?: string;
  comment?: string;
  dimension?: number;
  edgeWeightType?: string;
}

export interface TsplibDocument {
  header: TsplibHeader;
  cities: City[];
}

const COORD_SECTION = 'NODE_COORD_SECTION';
const SUPPORTED_WEIGHT_TYPE = 'EUC_2D';

function applyHeaderField(
  header: TsplibHeader,
  key: string,
  value: string,
  source: string,
  line: number,
): void {
  switch (key) {
    case 'NAME':
      header.name = value;
      break;
    case 'TYPE':
      header.type = value;
      break;
    case 'COMMENT':
      header.comment = header.comment === undefined ? value : `${header.comment}\n${value}`;
      break;
    case 'DIMENSION': {
      const dimension = Number(value);
      if (!Number.isInteger(dimension) || dimension < 1) {
        throw new CitySourceMalformedError(`invalid DIMENSION "${value}"`, source, line);
      }
      header.dimension = dimension;
      break;
    }
    case 'EDGE_WEIGHT_TYPE':
      if (value !== SUPPORTED_WEIGHT_TYPE) {
        throw new CitySourceMalformedError(
          `unsupported EDGE_WEIGHT_TYPE "${value}", expected ${SUPPORTED_WEIGHT_TYPE}`,
          source,
          line,
        );
      }
      header.edgeWeightType = value;
      break;
    default:
      // other TSPLIB keywords carry nothing a coordinate tour needs
      break;
  }
}

function parseNumber(token: string): number {
  // Number('') is 0, so guard against blanks explicitly
  return token.trim() === '' ? Number.NaN : Number(token);
}

/**
 * Parses a TSPLIB document: `KEY : VALUE` header lines, then
 * `NODE_COORD_SECTION` followed by `id x y` lines up to `EOF` or end of text.
 */
export function parseTsplib(text: string, source = '<inline>'): TsplibDocument {
  const lines = text.split(/\r?\n/);
  const header: TsplibHeader = {};
  let index = 0;

  // ─── Header ───────────────────────────────────────────────────────────────
  for (; index < lines.length; index++) {
    const raw = (lines[index] ?? '').trim();
    if (raw === '') continue;
    if (raw.startsWith(COORD_SECTION)) break;
    if (raw === 'EOF') {
      throw new CitySourceMalformedError(`reached EOF before ${COORD_SECTION}`, source, index + 1);
    }
    const sep = raw.indexOf(':');
    if (sep === -1) {
      throw new CitySourceMalformedError(`expected "KEY : VALUE", got "${raw}"`, source, index + 1);
    }
    applyHeaderField(
      header,
      raw.slice(0, sep).trim().toUpperCase(),
      raw.slice(sep + 1).trim(),
      source,
      index + 1,
    );
  }
  if (index >= lines.length) {
    throw new CitySourceMalformedError(`missing ${COORD_SECTION}`, source);
  }

  // ─── Coordinates ──────────────────────────────────────────────────────────
  const cities: City[] = [];
  const seen = new Set<number>();
  for (index += 1; index < lines.length; index++) {
    const raw = (lines[index] ?? '').trim();
    if (raw === '') continue;
    if (raw === 'EOF') break;

    const lineNo = index + 1;
    const tokens = raw.split(/\s+/);
    if (tokens.length !== 3) {
      throw new CitySourceMalformedError(`expected "id x y", got "${raw}"`, source, lineNo);
    }
    const [id, x, y] = tokens.map(parseNumber);
    if (id === undefined || x === undefined || y === undefined) continue;

    let city: City;
    try {
      city = createCity(id, x, y);
    } catch (err) {
      if (err instanceof InvalidCityError) {
        throw new CitySourceMalformedError(err.message, source, lineNo);
      }
      throw err;
    }
    if (seen.has(city.id)) {
      throw new CitySourceMalformedError(`duplicate city id ${city.id}`, source, lineNo);
    }
    seen.add(city.id);
    cities.push(city);
  }

  if (cities.length === 0) {
    throw new CitySourceMalformedError(`no cities after ${COORD_SECTION}`, source);
  }
  if (header.dimension !== undefined && header.dimension !== cities.length) {
    throw new CitySourceMalformedError(
      `DIMENSION is ${header.dimension} but ${cities.length} cities were listed`,
      source,
    );
  }

  return { header, cities };
}
