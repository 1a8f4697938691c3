import type { Tour } from '../entities/tour.js';
import type { TourPlanningPort, TourRequest } from '../ports/inbound/tour-planning.port.js';
import { buildNearestNeighborTour } from './nearest-neighbor.js';

export class NearestNeighborTourPlanner implements TourPlanningPort {
  planTour(request: TourRequest): Tour {
    return buildNearestNeighborTour(request.cities, request.startId, {
      onMissingStart: request.onMissingStart,
    });
  }
}
