import { ValidationError } from '../errors.js';

export interface PlannerConfig {
  port: number;
  host: string;
  logLevel: string;
  solverTimeLimitMs: number;
  defaultHorizonDays: number;
  defaultCommitmentTermDays: number;
}

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

let cachedConfig: PlannerConfig | undefined;

function readPositiveNumber(name: string, fallback: number, problems: string[]): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    problems.push(`${name} must be a positive number (got '${raw}')`);
    return fallback;
  }
  return value;
}

/**
 * Read and validate planner settings from the environment.
 * Throws ValidationError listing every malformed variable.
 */
export function getPlannerConfig(): PlannerConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const problems: string[] = [];

  const port = readPositiveNumber('PORT', 3000, problems);
  if (!Number.isInteger(port) || port > 65535) {
    problems.push(`PORT must be an integer between 1 and 65535 (got '${process.env.PORT}')`);
  }

  const logLevel = process.env.LOG_LEVEL || 'info';
  if (!LOG_LEVELS.has(logLevel)) {
    problems.push(`LOG_LEVEL must be one of ${[...LOG_LEVELS].join(', ')} (got '${logLevel}')`);
  }

  const config: PlannerConfig = {
    port,
    host: process.env.HOST || '0.0.0.0',
    logLevel,
    solverTimeLimitMs: readPositiveNumber('SOLVER_TIME_LIMIT_MS', 30_000, problems),
    defaultHorizonDays: readPositiveNumber('DEFAULT_HORIZON_DAYS', 1, problems),
    defaultCommitmentTermDays: readPositiveNumber('DEFAULT_COMMITMENT_TERM_DAYS', 365, problems),
  };

  if (problems.length > 0) {
    throw new ValidationError(`Invalid planner configuration: ${problems.join('; ')}`, { problems });
  }

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetPlannerConfigCache(): void {
  cachedConfig = undefined;
}
