import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { SummaryService } from '../summary/summary.service';
import { EventService } from './event.service';

export class EventController {
  constructor(
    private readonly events: EventService,
    private readonly summary: SummaryService
  ) {}

  /**
   * GET /events
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(200).json({
        success: true,
        data: {
          events: this.events.listEvents(),
          selectedId: this.events.getSelectedId(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Create an event; it becomes the selected one
   * POST /events
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const event = await this.events.addEvent(req.body.name);

      res.status(201).json({
        success: true,
        data: { event, selectedId: this.events.getSelectedId() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /events/selected
   */
  async select(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const selected = await this.events.selectEvent(req.body.eventId);
      if (!selected) {
        throw ApiError.notFound('Event');
      }

      res.status(200).json({
        success: true,
        data: { event: this.events.getSelectedEvent(), selectedId: this.events.getSelectedId() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Per-product figures for one event
   * GET /events/:id/summary
   */
  async getSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const event = this.events.findEvent(req.params.id);
      if (!event) {
        throw ApiError.notFound('Event');
      }

      res.status(200).json({
        success: true,
        data: {
          event,
          rows: this.summary.summarize(event.id),
          total: this.summary.eventTotal(event.id),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
