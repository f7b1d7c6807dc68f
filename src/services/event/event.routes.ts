import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';
import { SummaryService } from '../summary/summary.service';
import { EventController } from './event.controller';
import { EventService } from './event.service';
import { createEventValidation, eventIdValidation, selectEventValidation } from './event.validation';

export const createEventRoutes = (events: EventService, summary: SummaryService): Router => {
  const router = Router();
  const controller = new EventController(events, summary);

  // GET /events - List events and the current selection
  router.get('/', (req: Request, res: Response, next: NextFunction) =>
    controller.list(req, res, next)
  );

  // POST /events - Create and select an event
  router.post(
    '/',
    createEventValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next)
  );

  // PUT /events/selected - Change the selected event
  router.put(
    '/selected',
    selectEventValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.select(req, res, next)
  );

  // GET /events/:id/summary - Sales figures for an event
  router.get(
    '/:id/summary',
    eventIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getSummary(req, res, next)
  );

  return router;
};
