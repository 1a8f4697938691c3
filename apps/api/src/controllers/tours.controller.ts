import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { createCity, tourEdges } from '@nn-tour/domain';
import type { Tour, TourPlanningPort, TourRendererPort } from '@nn-tour/domain';
import { parseTsplib } from '@nn-tour/adapters';

export interface ToursRouterDeps {
  planner: TourPlanningPort;
  renderer: TourRendererPort;
  maxCities: number;
}

const missingStartSchema = z.enum(['reject', 'first']);
const formatSchema = z.enum(['json', 'text']);

const citySchema = z.object({
  id: z.number().int().min(0),
  x: z.number().finite(),
  y: z.number().finite(),
});

const tourQuerySchema = z.object({
  format: formatSchema.default('json'),
});

const tsplibQuerySchema = z.object({
  startId: z.coerce.number().int().min(0),
  onMissingStart: missingStartSchema.default('reject'),
  format: formatSchema.default('json'),
});

function tourBodySchema(maxCities: number) {
  return z.object({
    cities: z.array(citySchema).min(1).max(maxCities),
    startId: z.number().int().min(0),
    onMissingStart: missingStartSchema.default('reject'),
  });
}

function sendTour(
  res: Response,
  tour: Tour,
  format: z.infer<typeof formatSchema>,
  renderer: TourRendererPort,
): void {
  if (format === 'text') {
    res.type('text/plain').send(renderer.render(tour));
    return;
  }
  res.json({
    path: tour.path.map((city) => city.id),
    weights: tour.weights,
    totalDistance: tour.totalDistance,
    edges: tourEdges(tour),
  });
}

export function createToursRouter(deps: ToursRouterDeps): Router {
  const router = Router();
  const bodySchema = tourBodySchema(deps.maxCities);

  /** POST /api/tours — cities as JSON */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { format } = tourQuerySchema.parse(req.query);
      const body = bodySchema.parse(req.body);
      const tour = deps.planner.planTour({
        cities: body.cities.map((c) => createCity(c.id, c.x, c.y)),
        startId: body.startId,
        onMissingStart: body.onMissingStart,
      });
      sendTour(res, tour, format, deps.renderer);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/tours/tsplib — a TSPLIB document as text/plain */
  router.post(
    '/tsplib',
    express.text({ type: 'text/plain', limit: '1mb' }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = tsplibQuerySchema.parse(req.query);
        const text = z.string().min(1, 'expected a TSPLIB document as text/plain').parse(req.body);
        const { cities } = parseTsplib(text, 'request body');
        if (cities.length > deps.maxCities) {
          res.status(413).json({
            error: 'too_many_cities',
            message: `at most ${deps.maxCities} cities per request`,
          });
          return;
        }
        const tour = deps.planner.planTour({
          cities,
          startId: query.startId,
          onMissingStart: query.onMissingStart,
        });
        sendTour(res, tour, query.format, deps.renderer);
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
