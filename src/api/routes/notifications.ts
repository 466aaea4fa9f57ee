/**
 * Notifications API Routes
 *
 * Endpoints:
 *   GET  /v1/notifications/:country/options      Selection list (?limit=)
 *   GET  /v1/notifications/:country/stats        Summary coverage counts
 *   GET  /v1/notifications/:country/items/:id          Full notification
 *   POST /v1/notifications/:country/items/:id/summary  Generate and persist a summary
 *
 * Notifications sit under `items/` so that ids such as `stats` never shadow
 * the listing routes.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseCountry } from '../../core/notification-normalizer';
import { AppError, ErrorCode, asyncHandler } from '../../middleware/error-handler';
import type { NotificationService } from '../../services/notification-service';
import type { Country } from '../../types/notification';
import { logger } from '../../utils/logger';

const optionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).optional(),
});

const summarizeBodySchema = z.object({
  force: z.boolean().optional(),
}).optional();

function countryParam(req: Request): Country {
  const country = parseCountry(req.params.country ?? '');
  if (!country) {
    throw AppError.badRequest(`Unknown country '${req.params.country}'`);
  }
  return country;
}

export function createNotificationsRouter(service: NotificationService): Router {
  const router = Router();

  router.get('/:country/options', asyncHandler(async (req: Request, res: Response) => {
    const country = countryParam(req);
    const { limit } = optionsQuerySchema.parse(req.query);

    const options = await service.listOptions(country, limit);
    res.json({ country, options, count: options.length });
  }));

  router.get('/:country/stats', asyncHandler(async (req: Request, res: Response) => {
    const country = countryParam(req);
    const stats = await service.getStats(country);
    res.json({ country, ...stats });
  }));

  router.get('/:country/items/:id', asyncHandler(async (req: Request, res: Response) => {
    const country = countryParam(req);
    const { id } = req.params;

    const notification = await service.getNotification(country, id);
    if (!notification) {
      throw AppError.notFound(`Notification '${id}' not found in ${country}`);
    }

    res.json({ country, notification });
  }));

  router.post('/:country/items/:id/summary', asyncHandler(async (req: Request, res: Response) => {
    const country = countryParam(req);
    const { id } = req.params;
    const body = summarizeBodySchema.parse(req.body);

    const result = await service.summarize(country, id, { force: body?.force });

    switch (result.status) {
      case 'generated':
        logger.info('Summary generated via API', { country, id });
        res.status(201).json({ status: result.status, notification: result.notification });
        return;
      case 'existing':
        res.json({ status: result.status, notification: result.notification });
        return;
      case 'not_found':
        throw AppError.notFound(`Notification '${id}' not found in ${country}`);
      case 'store_unavailable':
        throw AppError.unavailable('Notification store is not connected');
      case 'summarizer_unavailable':
        throw AppError.unavailable('Summary generation is disabled');
      case 'generation_failed':
        throw AppError.dependency(result.message);
      case 'save_failed':
        throw new AppError(
          ErrorCode.INTERNAL_ERROR,
          'Summary was generated but could not be saved; retry to persist it',
          500,
          { summary: result.summary }
        );
    }
  }));

  return router;
}
