import { Router, type NextFunction, type Request, type Response } from 'express';
import { ValidationError } from '../errors';
import type { SyncService } from '../services/syncService';
import type { QueueStatusFilter, RetryResult, SyncReport, SyncStatus } from '../types';
import { isRecord } from '../utils/guards';

interface SyncResponse extends SyncReport {
  message: string;
}

interface SyncStatusResponse extends SyncStatus {
  status: 'ok';
  connectivity: boolean;
  failedCount: number;
  timestamp: string;
}

function readInteger(value: unknown, name: string, fallback: number, min: number, max: number): number {
  if (value === undefined) return fallback;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

function readStatusFilter(value: unknown): QueueStatusFilter | undefined {
  if (value === undefined) return undefined;
  if (value === 'pending' || value === 'failed') return value;
  throw new ValidationError('status must be "pending" or "failed"');
}

function readIds(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const ids: number[] = [];
  for (const id of value) {
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new ValidationError('ids must be an array of queue entry ids');
    }
    ids.push(id);
  }
  return ids;
}

export function createSyncRouter(syncService: SyncService): Router {
  const router = Router();

  // Trigger manual sync
  router.post('/sync', async (_req: Request, res: Response<SyncResponse>, next: NextFunction) => {
    try {
      const report = await syncService.triggerSync();
      res.json({
        ...report,
        message: report.success ? 'Sync completed successfully' : 'Sync completed with errors',
      });
    } catch (error) {
      next(error);
    }
  });

  // Check sync status
  router.get('/status', async (_req: Request, res: Response<SyncStatusResponse>, next: NextFunction) => {
    try {
      const [status, connectivity, failedCount] = await Promise.all([
        syncService.getStatus(),
        syncService.checkConnectivity(),
        syncService.getFailedSyncCount(),
      ]);

      res.json({
        status: 'ok',
        ...status,
        connectivity,
        failedCount,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // Process the queue and report the resulting status in one call
  router.post('/batch', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await syncService.processQueue();
      const status = await syncService.getStatus();
      res.json({ message: 'Batch sync completed', report, status });
    } catch (error) {
      next(error);
    }
  });

  // Inspect queued operations
  router.get('/queue', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = readInteger(req.query.limit, 'limit', 50, 1, 500);
      const offset = readInteger(req.query.offset, 'offset', 0, 0, Number.MAX_SAFE_INTEGER);
      const status = readStatusFilter(req.query.status);

      const items = await syncService.listQueue({ limit, offset, status });
      res.json({ items, total: items.length, limit, offset });
    } catch (error) {
      next(error);
    }
  });

  // Give exhausted operations a fresh retry budget
  router.post('/retry', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const all = isRecord(body) && body.all === true;
      const ids = isRecord(body) ? readIds(body.ids) : null;

      let result: RetryResult;
      if (all) {
        result = await syncService.retryAllFailed();
      } else if (ids) {
        result = await syncService.retryFailed(ids);
      } else {
        res.status(400).json({ error: 'Either provide an array of ids or set all=true' });
        return;
      }

      res.json({
        success: true,
        ...result,
        message: `Retried ${result.retried} items, ${result.failed} failed`,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return router;
}
