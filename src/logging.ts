// src/logging.ts
// What: The search engine's pino logger, shared by the server, the ingestion pipeline and the migration runner.
// How: Level comes from LOG_LEVEL, else from NODE_ENV (debug while developing, silent under test, info in
//      production). Development output goes through pino-pretty; everything else is one JSON line per event,
//      tagged with the service name.

import pino, { Logger, LoggerOptions } from 'pino';

export const SERVICE_NAME = 'document-search';

export function resolveLogLevel(env: { NODE_ENV?: string; LOG_LEVEL?: string }): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  const nodeEnv = env.NODE_ENV ?? 'development';
  if (nodeEnv === 'development') return 'debug';
  return nodeEnv === 'test' ? 'silent' : 'info';
}

const isDev = (process.env.NODE_ENV ?? 'development') === 'development';

const options: LoggerOptions = {
  name: SERVICE_NAME,
  level: resolveLogLevel(process.env),
};

const logger: Logger = isDev
  ? pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } },
    })
  : pino(options);

export default logger;
