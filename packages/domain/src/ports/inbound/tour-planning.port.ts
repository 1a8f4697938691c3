import type { CityCollection, CityId } from '../../entities/city.js';
import type { Tour } from '../../entities/tour.js';
import type { MissingStartPolicy } from '../../services/city-accessor.js';

export interface TourRequest {
  cities: CityCollection;
  startId: CityId;
  onMissingStart?: MissingStartPolicy;
}

export interface TourPlanningPort {
  planTour(request: TourRequest): Tour;
}
