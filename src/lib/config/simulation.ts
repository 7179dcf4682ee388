import { z } from 'zod';
import { ValidationError } from '../errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FRONTEND_URL: z.string().min(1).default('http://localhost:5173'),
  SIMULATION_DEFAULT_HORIZON_DAYS: z.coerce.number().int().positive().default(180),
  SIMULATION_MAX_HORIZON_DAYS: z.coerce.number().int().positive().default(3650),
  CALENDAR_SCAN_LIMIT_DAYS: z.coerce.number().int().positive().default(3660),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  frontendUrl: string;
  defaultHorizonDays: number;
  maxHorizonDays: number;
  calendarScanLimitDays: number;
}

let cachedConfig: AppConfig | undefined;

/**
 * Validate the environment and return a typed config.
 * Throws ValidationError listing every offending variable.
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  // Empty strings mean "unset" so that defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(
      `Invalid environment configuration: ${invalid.join(', ')}`,
      { invalid },
    );
  }

  const data = parsed.data;
  if (data.SIMULATION_DEFAULT_HORIZON_DAYS > data.SIMULATION_MAX_HORIZON_DAYS) {
    throw new ValidationError(
      'SIMULATION_DEFAULT_HORIZON_DAYS must not exceed SIMULATION_MAX_HORIZON_DAYS',
    );
  }

  cachedConfig = {
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    frontendUrl: data.FRONTEND_URL,
    defaultHorizonDays: data.SIMULATION_DEFAULT_HORIZON_DAYS,
    maxHorizonDays: data.SIMULATION_MAX_HORIZON_DAYS,
    calendarScanLimitDays: data.CALENDAR_SCAN_LIMIT_DAYS,
  };
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetAppConfigCache(): void {
  cachedConfig = undefined;
}
