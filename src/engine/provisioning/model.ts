import type { VariableId, VariableIndex, VariableKey } from './variable-index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type VariableDomain = 'nonNegativeInteger';

export interface ModelVariable {
  readonly id: VariableId;
  readonly key: VariableKey;
  readonly domain: VariableDomain;
}

export interface LinearTerm {
  readonly coefficient: number;
  readonly variableId: VariableId;
}

/** A sum of terms; order carries no meaning. */
export type LinearExpression = readonly LinearTerm[];

/** Where a constraint came from, for diagnostics and reports. */
export type ConstraintOrigin =
  | { readonly kind: 'capacity'; readonly periodId: string }
  | { readonly kind: 'reservation'; readonly tierId: string; readonly periodId: string };

export interface ModelConstraint {
  readonly origin: ConstraintOrigin;
  readonly expression: LinearExpression;
  readonly relation: '>=';
  readonly bound: number;
}

export interface Objective {
  readonly direction: 'minimize';
  readonly expression: LinearExpression;
}

export interface Model {
  readonly index: VariableIndex;
  readonly variables: readonly ModelVariable[];
  readonly objective: Objective;
  readonly constraints: readonly ModelConstraint[];
}

export interface ModelStats {
  variables: number;
  constraints: number;
  objectiveTerms: number;
}

// ─── ModelDraft ──────────────────────────────────────────────────────────────

/** Persistent list, newest entry first; drafts share their tails. */
type Chain<T> = { readonly head: T; readonly tail: Chain<T> } | null;

function chainToArray<T>(chain: Chain<T>): T[] {
  const items: T[] = [];
  let node = chain;
  while (node !== null) {
    items.push(node.head);
    node = node.tail;
  }
  return items.reverse();
}

/**
 * Accumulates objective terms and constraints for one model.
 *
 * Every method returns a *new* draft in constant time; `finish()` yields a
 * frozen Model with terms and constraints in the order they were added.
 */
export class ModelDraft {
  private constructor(
    readonly index: VariableIndex,
    private readonly objectiveTerms: Chain<LinearTerm>,
    private readonly constraintList: Chain<ModelConstraint>,
  ) {}

  static start(index: VariableIndex): ModelDraft {
    return new ModelDraft(index, null, null);
  }

  /** Add `coefficient · key` to the objective. */
  withObjectiveTerm(coefficient: number, key: VariableKey): ModelDraft {
    const term = Object.freeze({ coefficient, variableId: this.index.idOf(key) });
    return new ModelDraft(this.index, { head: term, tail: this.objectiveTerms }, this.constraintList);
  }

  /** Add `Σ coefficient · key >= bound`. */
  withConstraint(
    origin: ConstraintOrigin,
    terms: ReadonlyArray<{ coefficient: number; key: VariableKey }>,
    bound: number,
  ): ModelDraft {
    const expression = Object.freeze(
      terms.map((t) => Object.freeze({ coefficient: t.coefficient, variableId: this.index.idOf(t.key) })),
    );
    const constraint: ModelConstraint = Object.freeze({
      origin: Object.freeze({ ...origin }),
      expression,
      relation: '>=' as const,
      bound,
    });
    return new ModelDraft(this.index, this.objectiveTerms, { head: constraint, tail: this.constraintList });
  }

  finish(): Model {
    const variables = this.index
      .variables()
      .map((v) => Object.freeze({ id: v.id, key: v.key, domain: 'nonNegativeInteger' as const }));

    return Object.freeze({
      index: this.index,
      variables: Object.freeze(variables),
      objective: Object.freeze({
        direction: 'minimize' as const,
        expression: Object.freeze(chainToArray(this.objectiveTerms)),
      }),
      constraints: Object.freeze(chainToArray(this.constraintList)),
    });
  }
}

export function modelStats(model: Model): ModelStats {
  return {
    variables: model.variables.length,
    constraints: model.constraints.length,
    objectiveTerms: model.objective.expression.length,
  };
}
