// ─── TSPLIB City Source ───────────────────────────────────────────────────────
export {
  CitySourceError,
  CitySourceUnreadableError,
  CitySourceMalformedError,
} from './tsplib/city-source-errors.js';
export type { CitySourceErrorCode } from './tsplib/city-source-errors.js';
export { parseTsplib } from './tsplib/tsplib-parser.js';
export type { TsplibDocument, TsplibHeader } from './tsplib/tsplib-parser.js';
export { TsplibCitySource } from './tsplib/tsplib-city-source.js';

// ─── In-memory City Source ────────────────────────────────────────────────────
export { InMemoryCitySource } from './memory/in-memory-city-source.js';

// ─── Rendering ────────────────────────────────────────────────────────────────
export { renderTourText, TextTourRenderer } from './render/text-tour-renderer.js';
export type { TextRenderOptions } from './render/text-tour-renderer.js';
