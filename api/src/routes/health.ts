import { Router, Request, Response } from 'express';

export const healthRouter = Router();

const startedAt = Date.now();

// GET /health
healthRouter.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    service: 'subject-line-scorer',
    uptime_ms: Date.now() - startedAt,
    timestamp: new Date().toISOString(),
  });
});
