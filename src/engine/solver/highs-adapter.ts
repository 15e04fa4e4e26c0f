/**
 * Solver adapter backed by HiGHS (WebAssembly, in process).
 *
 * The model is handed over as CPLEX LP text; results are mapped back through
 * the positional column names produced by `columnNames`.
 */

import highsLoader from 'highs';
import type { Model } from '../provisioning/model.js';
import type { VariableId } from '../provisioning/variable-index.js';
import { columnNames, toLpFormat } from './lp-format.js';
import type { Solution, SolveOptions, SolverAdapter } from './types.js';

type Highs = Awaited<ReturnType<typeof highsLoader>>;

/** Integer-domain primals this close to an integer are reported as that integer. */
const INTEGRALITY_TOLERANCE = 1e-6;

// ─── HiGHS singleton ─────────────────────────────────────────────────────────

let highsLoadPromise: Promise<Highs> | null = null;

function getHighsInstance(): Promise<Highs> {
  if (!highsLoadPromise) {
    highsLoadPromise = highsLoader().catch((error: unknown) => {
      // Allow a later call to retry the load
      highsLoadPromise = null;
      throw error;
    });
  }
  return highsLoadPromise;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function snapToInteger(value: number): number {
  const nearest = Math.round(value);
  return Math.abs(value - nearest) <= INTEGRALITY_TOLERANCE ? nearest : value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── Adapter ─────────────────────────────────────────────────────────────────

export class HighsSolverAdapter implements SolverAdapter {
  readonly name = 'highs';

  async solve(model: Model, options: SolveOptions = {}): Promise<Solution> {
    if (options.signal?.aborted) {
      return { status: 'error', reason: 'cancelled', detail: 'Solve was cancelled before it started' };
    }

    // Nothing to decide: HiGHS rejects an empty LP, so answer directly.
    if (model.variables.length === 0) {
      return { status: 'optimal', objectiveValue: 0, assignment: new Map() };
    }

    let highs: Highs;
    try {
      highs = await getHighsInstance();
    } catch (error) {
      return {
        status: 'error',
        reason: 'unavailable',
        detail: `HiGHS failed to load: ${describeError(error)}`,
      };
    }

    if (options.signal?.aborted) {
      return { status: 'error', reason: 'cancelled', detail: 'Solve was cancelled before it started' };
    }

    const lp = toLpFormat(model);
    const { variableOf } = columnNames(model);

    let result: ReturnType<Highs['solve']>;
    try {
      result = highs.solve(lp, {
        mip_rel_gap: 0,
        ...(options.timeLimitMs !== undefined ? { time_limit: options.timeLimitMs / 1000 } : {}),
      });
    } catch (error) {
      return { status: 'error', reason: 'internal', detail: `HiGHS failed: ${describeError(error)}` };
    }

    const status: string = result.Status;
    switch (status) {
      case 'Optimal': {
        const assignment = new Map<VariableId, number>();
        for (const [column, variableId] of variableOf) {
          const entry = result.Columns[column];
          const primal = entry && 'Primal' in entry ? entry.Primal : undefined;
          if (typeof primal === 'number') {
            assignment.set(variableId, snapToInteger(primal));
          }
        }
        return { status: 'optimal', objectiveValue: result.ObjectiveValue, assignment };
      }
      case 'Infeasible':
      case 'Primal infeasible or unbounded':
        return { status: 'infeasible', detail: `HiGHS reported: ${status}` };
      case 'Unbounded':
        return { status: 'unbounded', detail: `HiGHS reported: ${status}` };
      case 'Time limit reached':
        return {
          status: 'error',
          reason: 'timeout',
          detail: `No optimal solution within ${options.timeLimitMs ?? 0} ms`,
        };
      default:
        return { status: 'error', reason: 'internal', detail: `HiGHS reported: ${status}` };
    }
  }
}
