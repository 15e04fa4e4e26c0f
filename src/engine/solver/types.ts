import type { Model } from '../provisioning/model.js';
import type { VariableId } from '../provisioning/variable-index.js';

export type SolutionStatus = 'optimal' | 'infeasible' | 'unbounded' | 'error';

export type SolverErrorReason = 'timeout' | 'cancelled' | 'unavailable' | 'internal';

export interface OptimalSolution {
  status: 'optimal';
  objectiveValue: number;
  assignment: ReadonlyMap<VariableId, number>;
}

export interface InfeasibleSolution {
  status: 'infeasible';
  detail: string;
}

export interface UnboundedSolution {
  status: 'unbounded';
  detail: string;
}

export interface ErrorSolution {
  status: 'error';
  reason: SolverErrorReason;
  detail: string;
}

export type Solution = OptimalSolution | InfeasibleSolution | UnboundedSolution | ErrorSolution;

export interface SolveOptions {
  /** Give up after this long and report an `error` solution with reason `timeout`. */
  timeLimitMs?: number;
  signal?: AbortSignal;
}

/**
 * Boundary to a mixed-integer linear solver.
 *
 * Implementations never reject for solver conditions: infeasibility,
 * timeouts and faults all come back as a Solution status.
 */
export interface SolverAdapter {
  readonly name: string;
  solve(model: Model, options?: SolveOptions): Promise<Solution>;
}
