import { Router } from 'express';
import { z } from 'zod';
import { UnknownPageError } from '../errors.js';
import { DatasetSource } from '../services/dataset.js';
import { renderView, resolvePage } from '../services/views.js';

const viewQuerySchema = z.object({
  manufacturer: z.string().min(1).optional(),
  search: z.string().optional(),
  limit: z.coerce.number().int().positive().max(100).optional()
});

export const createViewsRouter = (source: DatasetSource) => {
  const viewsRouter = Router();

  viewsRouter.get('/:page', async (req, res, next) => {
    try {
      const page = resolvePage(req.params.page);
      const query = viewQuerySchema.safeParse(req.query);

      if (!query.success) {
        res.status(400).json({ message: query.error.issues.map((issue) => issue.message).join('; ') });
        return;
      }

      const dataset = await source();
      res.json({ ...renderView(page, dataset, query.data), loadError: dataset.error });
    } catch (error) {
      if (error instanceof UnknownPageError) {
        res.status(404).json({ message: error.message });
        return;
      }

      next(error);
    }
  });

  return viewsRouter;
};
