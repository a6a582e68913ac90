import { Router, Request, Response } from 'express';
import { logger } from '../logger';
import { parseSubjectLines } from '../middleware/subjectLines';
import { scoreSubjectLines } from '../services/scoringService';

export function createSubjectLinesRouter(maxSubjectLines: number): Router {
  const router = Router();

  // POST /subject-line-scorer
  router.post('/', (req: Request, res: Response) => {
    const parsed = parseSubjectLines(req.body, maxSubjectLines);
    if (!parsed.ok) {
      logger.warn({ module: 'routes.subjectLines', validation_errors: [parsed.message], request_id: req.id }, 'Validation error');
      return res.status(parsed.status).json({ error: { message: parsed.message } });
    }

    const result = scoreSubjectLines(parsed.lines);

    logger.info({
      module: 'routes.subjectLines',
      request_id: req.id,
      line_count: result.results.length,
      high_risk_count: result.results.filter((r) => r.spam_risk === 'High').length,
    }, 'Subject lines scored');

    return res.json(result);
  });

  return router;
}
