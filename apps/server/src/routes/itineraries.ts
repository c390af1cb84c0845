import { Router } from 'express';
import { weekdaySelectionSchema, type ErrorResponse } from '@commute-dashboard/core';
import { toSummary, type CommuteDataService } from '../services/commuteData.js';

/**
 * `GET /` lists itinerary tabs; `GET /:id?days=1,2,3` returns their charts.
 */
export function itinerariesRouter(commuteData: CommuteDataService): Router {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      const itineraries = await commuteData.listItineraries();
      res.json(itineraries.map(toSummary));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req, res, next) => {
    const days = weekdaySelectionSchema.safeParse(req.query.days);
    if (!days.success) {
      const body: ErrorResponse = { error: days.error.issues[0].message };
      res.status(400).json(body);
      return;
    }

    try {
      const charts = await commuteData.getItineraryCharts(req.params.id, days.data);
      if (!charts) {
        const body: ErrorResponse = { error: `unknown itinerary: ${req.params.id}` };
        res.status(404).json(body);
        return;
      }
      res.json(charts);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
