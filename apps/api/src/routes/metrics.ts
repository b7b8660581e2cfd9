import { Router } from 'express';
import { DatasetSource } from '../services/dataset.js';
import { summaryMetrics } from '../services/queries.js';

export const createMetricsRouter = (source: DatasetSource) => {
  const metricsRouter = Router();

  metricsRouter.get('/summary', async (_req, res, next) => {
    try {
      const dataset = await source();
      res.json({ ...summaryMetrics(dataset), loadedAt: dataset.loadedAt, loadError: dataset.error });
    } catch (error) {
      next(error);
    }
  });

  return metricsRouter;
};
