import { tourEdges } from '@nn-tour/domain';
import type { Tour, TourRendererPort } from '@nn-tour/domain';

export interface TextRenderOptions {
  /** Fixed number of decimals for weights and total; default prints the raw number. */
  precision?: number;
}

function formatNumber(value: number, precision: number | undefined): string {
  return precision === undefined ? String(value) : value.toFixed(precision);
}

/**
 * One `EDGE a -> b | WEIGHT : w` line per edge, then `TOTAL DISTANCE: t`.
 */
export function renderTourText(tour: Tour, options: TextRenderOptions = {}): string {
  const lines = tourEdges(tour).map(
    (edge) =>
      `EDGE ${edge.from} -> ${edge.to} | WEIGHT : ${formatNumber(edge.weight, options.precision)}`,
  );
  lines.push(`TOTAL DISTANCE: ${formatNumber(tour.totalDistance, options.precision)}`);
  return lines.join('\n');
}

export class TextTourRenderer implements TourRendererPort {
  constructor(private readonly options: TextRenderOptions = {}) {}

  render(tour: Tour): string {
    return renderTourText(tour, this.options);
  }
}
