import type { Tour } from '../../entities/tour.js';

export interface TourRendererPort {
  render(tour: Tour): string;
}
