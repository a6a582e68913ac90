import { Router, Request, Response } from 'express';
import { logger } from '../logger';
import { parseSubjectLines, unwrapToolParameters } from '../middleware/subjectLines';
import { scoreSubjectLines } from '../services/scoringService';
import type { DiscoveryDocument, ToolDescriptor } from '../types';

export const SUBJECT_LINE_SCORER_ENDPOINT = '/tools/subject-line-scorer';

export const subjectLineScorerTool: ToolDescriptor = {
  name: 'subject_line_scorer',
  description:
    'Scores email subject lines for length, spam terms, punctuation and ALL CAPS words, and picks the best one.',
  parameters: [
    {
      name: 'subject_lines',
      type: 'array',
      description: 'List of email subject lines to score',
      required: true,
    },
  ],
  endpoint: SUBJECT_LINE_SCORER_ENDPOINT,
  http_method: 'POST',
};

export function createToolsRouter(maxSubjectLines: number): Router {
  const router = Router();

  // GET /discovery
  router.get('/discovery', (_req: Request, res: Response) => {
    const doc: DiscoveryDocument = { functions: [subjectLineScorerTool] };
    res.json(doc);
  });

  // POST /tools/subject-line-scorer
  router.post(SUBJECT_LINE_SCORER_ENDPOINT, (req: Request, res: Response) => {
    const parsed = parseSubjectLines(unwrapToolParameters(req.body), maxSubjectLines);
    if (!parsed.ok) {
      logger.warn({
        module: 'routes.tools',
        tool: subjectLineScorerTool.name,
        validation_errors: [parsed.message],
        request_id: req.id,
      }, 'Validation error');
      return res.status(parsed.status).json({ error: { message: parsed.message } });
    }

    const result = scoreSubjectLines(parsed.lines);

    logger.info({
      module: 'routes.tools',
      tool: subjectLineScorerTool.name,
      request_id: req.id,
      line_count: result.results.length,
    }, 'Tool invoked');

    return res.json(result);
  });

  return router;
}
