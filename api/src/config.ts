export interface AppConfig {
  port: number;
  corsOrigin: string;
  bodyLimit: string;
  maxSubjectLines: number;
}

const DEFAULTS = {
  PORT: 8000,
  CORS_ORIGIN: '*',
  BODY_LIMIT: '1mb',
  MAX_SUBJECT_LINES: 1000,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env, 'PORT', DEFAULTS.PORT),
    corsOrigin: env.CORS_ORIGIN || DEFAULTS.CORS_ORIGIN,
    bodyLimit: env.BODY_LIMIT || DEFAULTS.BODY_LIMIT,
    maxSubjectLines: positiveInt(env, 'MAX_SUBJECT_LINES', DEFAULTS.MAX_SUBJECT_LINES),
  };
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
}
