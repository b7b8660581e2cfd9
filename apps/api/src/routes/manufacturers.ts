import { Router } from 'express';
import { DatasetSource } from '../services/dataset.js';
import { listManufacturers } from '../services/queries.js';

export const createManufacturersRouter = (source: DatasetSource) => {
  const manufacturersRouter = Router();

  manufacturersRouter.get('/', async (_req, res, next) => {
    try {
      res.json({ data: listManufacturers(await source()) });
    } catch (error) {
      next(error);
    }
  });

  return manufacturersRouter;
};
