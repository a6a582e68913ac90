import { createApp } from './app';
import { loadConfig } from './config';
import { logger } from './logger';
import { createShutdownHandler } from './shutdown';

const config = loadConfig();
const app = createApp(config);

const server = app.listen(config.port, () => {
  logger.info({
    module: 'index',
    port: config.port,
    max_subject_lines: config.maxSubjectLines,
    node_version: process.version,
  }, 'API server started');
});

const shutdown = createShutdownHandler(server, (code) => process.exit(code));

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
