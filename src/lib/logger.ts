import { pino } from 'pino';

type LogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

/** Logging surface the engine uses; pino loggers and fastify's request.log both fit. */
export interface EngineLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
}

/** Starts at info; `buildApp` moves it to the validated LOG_LEVEL. */
export const logger = pino({
  name: 'pipeline-sim',
  level: 'info',
});
