import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { NearestNeighborTourPlanner } from '@nn-tour/domain';
import type { TourPlanningPort, TourRendererPort } from '@nn-tour/domain';
import { TextTourRenderer } from '@nn-tour/adapters';

import { loadApiConfig } from './config/env.js';
import type { ApiConfig } from './config/env.js';
import { createToursRouter } from './controllers/tours.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  config: ApiConfig;
  planner: TourPlanningPort;
  renderer: TourRendererPort;
}

export function buildApp(overrides: Partial<AppDeps> = {}): ReturnType<typeof express> {
  const config = overrides.config ?? loadApiConfig();
  const planner = overrides.planner ?? new NearestNeighborTourPlanner();
  const renderer = overrides.renderer ?? new TextTourRenderer();

  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  if (config.httpLogFormat) app.use(morgan(config.httpLogFormat));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/tours', createToursRouter({ planner, renderer, maxCities: config.maxCities }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
