import { Router } from 'express';
import type { AppConfig } from '../config';
import { healthRouter } from './health';
import { createSubjectLinesRouter } from './subjectLines';
import { createToolsRouter } from './tools';

export function createApiRouter(config: Pick<AppConfig, 'maxSubjectLines'>): Router {
  const apiRouter = Router();

  apiRouter.use('/health', healthRouter);
  apiRouter.use('/subject-line-scorer', createSubjectLinesRouter(config.maxSubjectLines));
  // Opal discovery + tool endpoints
  apiRouter.use('/', createToolsRouter(config.maxSubjectLines));

  return apiRouter;
}
