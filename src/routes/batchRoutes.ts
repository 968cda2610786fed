import { Router, type Request, type Response } from 'express';
import type { TrendSwapService } from '../service/trendSwapService';
import { toBatchItem } from '../service/batchPayload';
import { wrapErrorResponse } from '../utils/userErrors';
import { logger } from '../utils/logger';

/**
 * Signal that fires when the client goes away before the response is sent.
 */
function requestSignal(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      logger.debug(`Client disconnected from ${req.method} ${req.originalUrl}`);
      controller.abort();
    }
  });
  return controller.signal;
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function createBatchRoutes(service: TrendSwapService): Router {
  const router = Router();

  /**
   * GET /api/batch
   */
  router.get('/batch', async (req: Request, res: Response) => {
    try {
      const view = await service.getCurrentBatch(requestSignal(req, res));
      if (res.writableEnded || req.destroyed) return;
      res.status(view.status === 'unavailable' ? 503 : 200).json({
        status: view.status,
        items: view.items,
        ...(view.status === 'fresh' || view.status === 'stale' ? { generatedAt: view.generatedAt, ageMs: view.ageMs } : {}),
        ...(view.status === 'fresh' ? {} : { message: view.message }),
      });
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'batch');
    }
  });

  /**
   * POST /api/batch/regenerate
   */
  router.post('/batch/regenerate', async (_req: Request, res: Response) => {
    try {
      const view = await service.forceRegenerate();
      res.status(view.status === 'unavailable' ? 503 : 200).json(view.status === 'unavailable'
        ? { status: view.status, items: [], message: view.message }
        : view);
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'regenerate');
    }
  });

  /**
   * DELETE /api/cache
   */
  router.delete('/cache', async (_req: Request, res: Response) => {
    try {
      await service.invalidate();
      res.json({ success: true, message: 'Cache cleared' });
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'cache-clear');
    }
  });

  /**
   * GET /api/cache/status
   */
  router.get('/cache/status', async (_req: Request, res: Response) => {
    try {
      res.json(await service.cacheStatus());
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'cache-status');
    }
  });

  /**
   * GET /api/swap?url=
   */
  router.get('/swap', async (req: Request, res: Response) => {
    try {
      const result = await service.transformSingle(queryString(req.query.url), requestSignal(req, res));
      if (result.outcome === 'success') {
        res.json({ success: true, outcome: result.outcome, item: toBatchItem(result) });
      } else {
        res.status(422).json({ success: false, outcome: result.outcome, error: result.reason });
      }
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'swap');
    }
  });

  /**
   * POST /api/custom { query }
   */
  router.post('/custom', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const query = body && typeof body === 'object' && 'query' in body ? queryString(body.query) : '';
      const result = await service.customSearch(query, requestSignal(req, res));
      res.status(result.item ? 200 : 404).json({ success: result.item !== null, ...result });
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'custom');
    }
  });

  /**
   * GET /api/celebrity?name=
   */
  router.get('/celebrity', async (req: Request, res: Response) => {
    try {
      const result = await service.celebritySwap(queryString(req.query.name), requestSignal(req, res));
      res.status(result.item ? 200 : 404).json({ success: result.item !== null, ...result });
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'celebrity');
    }
  });

  /**
   * GET /api/trends?limit=20
   */
  router.get('/trends', async (req: Request, res: Response) => {
    try {
      const parsed = parseInt(queryString(req.query.limit) || '20', 10);
      const limit = Number.isInteger(parsed) && parsed > 0 ? Math.min(parsed, 100) : 20;
      const trends = await service.getTrends(limit, requestSignal(req, res));
      res.json({ count: trends.length, trends });
    } catch (error) {
      wrapErrorResponse(res, error, undefined, 'trends');
    }
  });

  return router;
}
