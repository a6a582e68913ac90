import pino from 'pino';

export const logger = pino({
  name: 'subject-line-scorer',
  level: process.env.LOG_LEVEL || 'info',
});
