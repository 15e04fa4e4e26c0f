import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getPlannerConfig, resetPlannerConfigCache } from '../lib/config/planner.js';
import { ValidationError } from '../lib/errors.js';
import { toPlanningInputs } from '../schemas/provisioning.schema.js';

const PLANNER_ENV = [
  'PORT',
  'HOST',
  'LOG_LEVEL',
  'SOLVER_TIME_LIMIT_MS',
  'DEFAULT_HORIZON_DAYS',
  'DEFAULT_COMMITMENT_TERM_DAYS',
] as const;

function clearPlannerEnv() {
  for (const name of PLANNER_ENV) {
    delete process.env[name];
  }
}

describe('Planner Config', () => {
  beforeEach(() => {
    clearPlannerEnv();
    resetPlannerConfigCache();
  });

  afterEach(() => {
    clearPlannerEnv();
    resetPlannerConfigCache();
  });

  describe('getPlannerConfig', () => {
    it('falls back to defaults when nothing is set', () => {
      expect(getPlannerConfig()).toEqual({
        port: 3000,
        host: '0.0.0.0',
        logLevel: 'info',
        solverTimeLimitMs: 30000,
        defaultHorizonDays: 1,
        defaultCommitmentTermDays: 365,
      });
    });

    it('reads values from the environment', () => {
      process.env.PORT = '8080';
      process.env.HOST = '127.0.0.1';
      process.env.LOG_LEVEL = 'debug';
      process.env.SOLVER_TIME_LIMIT_MS = '2500';
      process.env.DEFAULT_HORIZON_DAYS = '30';
      process.env.DEFAULT_COMMITMENT_TERM_DAYS = '1095';

      expect(getPlannerConfig()).toEqual({
        port: 8080,
        host: '127.0.0.1',
        logLevel: 'debug',
        solverTimeLimitMs: 2500,
        defaultHorizonDays: 30,
        defaultCommitmentTermDays: 1095,
      });
    });

    it('caches the first result until reset', () => {
      process.env.SOLVER_TIME_LIMIT_MS = '1000';
      expect(getPlannerConfig().solverTimeLimitMs).toBe(1000);

      process.env.SOLVER_TIME_LIMIT_MS = '2000';
      expect(getPlannerConfig().solverTimeLimitMs).toBe(1000);

      resetPlannerConfigCache();
      expect(getPlannerConfig().solverTimeLimitMs).toBe(2000);
    });

    it('rejects a non-positive time limit', () => {
      process.env.SOLVER_TIME_LIMIT_MS = '0';

      expect(() => getPlannerConfig()).toThrow(
        "Invalid planner configuration: SOLVER_TIME_LIMIT_MS must be a positive number (got '0')",
      );
    });

    it('lists every malformed variable at once', () => {
      process.env.PORT = '70000';
      process.env.LOG_LEVEL = 'loud';
      process.env.DEFAULT_COMMITMENT_TERM_DAYS = 'forever';

      let caught: unknown;
      try {
        getPlannerConfig();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        details: {
          problems: [
            "PORT must be an integer between 1 and 65535 (got '70000')",
            "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent (got 'loud')",
            "DEFAULT_COMMITMENT_TERM_DAYS must be a positive number (got 'forever')",
          ],
        },
      });
    });
  });

  describe('toPlanningInputs', () => {
    const config = { defaultHorizonDays: 1, defaultCommitmentTermDays: 365 };

    it('fills missing horizon and term from config', () => {
      const { schedule, catalog } = toPlanningInputs(
        { schedule: { periods: [] }, catalog: { onDemandRate: 1, tiers: [] } },
        config,
      );

      expect(schedule.horizonDays).toBe(1);
      expect(catalog.commitmentTermDays).toBe(365);
    });

    it('keeps values the request supplies', () => {
      const { schedule, catalog } = toPlanningInputs(
        {
          schedule: { periods: [], horizonDays: 7 },
          catalog: { onDemandRate: 1, tiers: [], commitmentTermDays: 1095 },
        },
        config,
      );

      expect(schedule.horizonDays).toBe(7);
      expect(catalog.commitmentTermDays).toBe(1095);
    });
  });
});
