import { Router } from 'express';
import { DatasetSource } from '../services/dataset.js';
import { createManufacturersRouter } from './manufacturers.js';
import { createMetricsRouter } from './metrics.js';
import { createViewsRouter } from './views.js';

export const createApiRouter = (source: DatasetSource) => {
  const apiRouter = Router();

  apiRouter.use('/metrics', createMetricsRouter(source));
  apiRouter.use('/manufacturers', createManufacturersRouter(source));
  apiRouter.use('/views', createViewsRouter(source));

  return apiRouter;
};
