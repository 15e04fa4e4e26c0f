/**
 * Provisioning Service
 *
 * Runs one planning request end to end: builds the model from the schedule
 * and catalog, hands it to the solver adapter, decodes and checks the plan.
 * Solver outcomes come back as values; only input errors and internal
 * faults are thrown.
 */

import type { FastifyBaseLogger } from 'fastify';
import { getPlannerConfig } from '../lib/config/planner.js';
import { DecodeError, SolverInvariantError } from '../lib/errors.js';
import {
  buildProvisioningModel,
  costPlan,
  decodeProvisioningPlan,
  describeVariableKey,
  findPlanViolations,
  modelStats,
} from '../engine/provisioning/index.js';
import type {
  DemandSchedule,
  ModelStats,
  PlanCost,
  PricingCatalog,
  ProvisioningPlan,
} from '../engine/provisioning/index.js';
import { HighsSolverAdapter } from '../engine/solver/highs-adapter.js';
import { toLpFormat } from '../engine/solver/lp-format.js';
import type { SolverAdapter, SolverErrorReason } from '../engine/solver/types.js';

export type PlanningLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error' | 'fatal'>;

export interface PlanContext {
  logger: PlanningLogger;
  signal?: AbortSignal;
}

interface OutcomeBase {
  solver: string;
  stats: ModelStats;
}

export interface OptimalOutcome extends OutcomeBase {
  status: 'optimal';
  objectiveValue: number;
  plan: ProvisioningPlan;
  costs: PlanCost;
}

export interface InfeasibleOutcome extends OutcomeBase {
  status: 'infeasible';
  detail: string;
}

export interface SolverErrorOutcome extends OutcomeBase {
  status: 'error';
  reason: SolverErrorReason;
  detail: string;
}

export type PlanningOutcome = OptimalOutcome | InfeasibleOutcome | SolverErrorOutcome;

export interface ModelExport {
  stats: ModelStats;
  variables: Array<{ id: string; name: string }>;
  constraints: Array<{ name: string; kind: string; bound: number }>;
  lp: string;
}

export interface ProvisioningServiceOptions {
  /** Defaults to `SOLVER_TIME_LIMIT_MS` from the planner config. */
  timeLimitMs?: number;
}

// Objective value and recomputed plan cost may differ by float noise only.
const COST_TOLERANCE = 1e-6;

export class ProvisioningService {
  constructor(
    private readonly solver: SolverAdapter,
    private readonly options: ProvisioningServiceOptions = {},
  ) {}

  async plan(
    schedule: DemandSchedule,
    catalog: PricingCatalog,
    context: PlanContext,
  ): Promise<PlanningOutcome> {
    const { logger, signal } = context;

    const model = buildProvisioningModel(schedule, catalog);
    const stats = modelStats(model);
    logger.debug({ ...stats, solver: this.solver.name }, 'Provisioning model built');

    const timeLimitMs = this.options.timeLimitMs ?? getPlannerConfig().solverTimeLimitMs;
    const solution = await this.solver.solve(model, { timeLimitMs, signal });
    const base: OutcomeBase = { solver: this.solver.name, stats };

    switch (solution.status) {
      case 'optimal': {
        let plan: ProvisioningPlan;
        try {
          plan = decodeProvisioningPlan(model.index, solution);
        } catch (error) {
          if (error instanceof DecodeError) {
            logger.error({ err: error, ...base }, 'Solver assignment does not match the model');
          }
          throw error;
        }

        const violations = findPlanViolations(plan, schedule);
        if (violations.length > 0) {
          logger.error({ violations, ...base }, 'Optimal plan violates model constraints');
          throw new SolverInvariantError(
            `Solver returned a plan with ${violations.length} constraint violation(s)`,
          );
        }

        const costs = costPlan(plan, schedule, catalog);
        const drift = Math.abs(costs.total - solution.objectiveValue);
        if (drift > COST_TOLERANCE * Math.max(1, Math.abs(costs.total))) {
          logger.warn(
            { objectiveValue: solution.objectiveValue, recomputed: costs.total },
            'Solver objective differs from recomputed plan cost',
          );
        }

        logger.info(
          { objectiveValue: solution.objectiveValue, ...base },
          'Provisioning plan solved',
        );
        return { status: 'optimal', objectiveValue: solution.objectiveValue, plan, costs, ...base };
      }

      case 'infeasible':
        // Unreachable for valid input while on-demand capacity is unlimited
        logger.error({ detail: solution.detail, ...base }, 'Provisioning model reported infeasible');
        return { status: 'infeasible', detail: solution.detail, ...base };

      case 'unbounded':
        logger.fatal({ detail: solution.detail, ...base }, 'Provisioning model reported unbounded');
        throw new SolverInvariantError(
          `Solver reported an unbounded model, which non-negative costs rule out: ${solution.detail}`,
        );

      case 'error':
        logger.warn(
          { reason: solution.reason, detail: solution.detail, ...base },
          'Solver failed to produce a plan',
        );
        return { status: 'error', reason: solution.reason, detail: solution.detail, ...base };
    }
  }

  /** The model a request would be solved with, for inspection. */
  exportModel(schedule: DemandSchedule, catalog: PricingCatalog): ModelExport {
    const model = buildProvisioningModel(schedule, catalog);

    return {
      stats: modelStats(model),
      variables: model.variables.map((v) => ({ id: v.id, name: describeVariableKey(v.key) })),
      constraints: model.constraints.map((c) => ({
        name:
          c.origin.kind === 'capacity'
            ? `capacity[${c.origin.periodId}]`
            : `reservation[${c.origin.tierId},${c.origin.periodId}]`,
        kind: c.origin.kind,
        bound: c.bound,
      })),
      lp: toLpFormat(model),
    };
  }
}

export const provisioningService = new ProvisioningService(new HighsSolverAdapter());
