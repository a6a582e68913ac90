import express, { Express } from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from './config';
import { logger } from './logger';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export function createApp(config: AppConfig): Express {
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));

  // Request logging; an upstream x-request-id is kept so logs line up across hops
  app.use(pinoHttp({
    logger,
    genReqId: (req, res) => {
      const incoming = req.headers['x-request-id'];
      const id = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();
      res.setHeader('x-request-id', id);
      return id;
    },
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  // Body parsing; after pino-http so parse failures still carry a request id
  app.use(express.json({ limit: config.bodyLimit }));

  app.use('/', createApiRouter(config));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
