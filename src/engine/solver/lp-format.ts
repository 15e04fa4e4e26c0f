/**
 * CPLEX LP text for a provisioning model.
 *
 * Columns are named by variable position (`x0`, `x1`, ...) and rows by
 * constraint position (`c0`, ...). Tier and period names never reach the
 * solver text, so no name can collide with LP syntax.
 */

import type { LinearExpression, Model, ModelConstraint } from '../provisioning/model.js';
import type { VariableId } from '../provisioning/variable-index.js';

const TERMS_PER_LINE = 8;

export interface ColumnNames {
  columnOf: ReadonlyMap<VariableId, string>;
  variableOf: ReadonlyMap<string, VariableId>;
}

export function columnNames(model: Model): ColumnNames {
  const columnOf = new Map<VariableId, string>();
  const variableOf = new Map<string, VariableId>();
  model.variables.forEach((variable, position) => {
    const column = `x${position}`;
    columnOf.set(variable.id, column);
    variableOf.set(column, variable.id);
  });
  return { columnOf, variableOf };
}

/** Shortest round-tripping decimal; `-0` is written as `0`. */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

function formatExpression(expression: LinearExpression, columnOf: ReadonlyMap<VariableId, string>): string {
  let text = '';
  expression.forEach((term, i) => {
    const column = columnOf.get(term.variableId);
    if (column === undefined) {
      throw new Error(`Expression references unknown variable ${term.variableId}`);
    }
    const sign = term.coefficient < 0 ? '-' : '+';
    const magnitude = formatNumber(Math.abs(term.coefficient));
    if (i === 0) {
      text = `${sign === '-' ? '- ' : ''}${magnitude} ${column}`;
    } else {
      const separator = i % TERMS_PER_LINE === 0 ? '\n   ' : ' ';
      text += `${separator}${sign} ${magnitude} ${column}`;
    }
  });
  return text;
}

/**
 * Right-hand side handed to the solver for `constraint`.
 *
 * When every term has an integer coefficient on an integer variable the left
 * side only takes integer values, so `>= b` and `>= ceil(b)` admit the same
 * points. Writing the ceiling keeps fractional or float-noisy demand from
 * being met only within the solver's feasibility tolerance.
 */
export function solverBound(
  constraint: ModelConstraint,
  integerIds: ReadonlySet<VariableId>,
): number {
  const integral = constraint.expression.every(
    (term) => Number.isInteger(term.coefficient) && integerIds.has(term.variableId),
  );
  return integral ? Math.ceil(constraint.bound) : constraint.bound;
}

function integerVariableIds(model: Model): Set<VariableId> {
  return new Set(
    model.variables.filter((v) => v.domain === 'nonNegativeInteger').map((v) => v.id),
  );
}

export function toLpFormat(model: Model): string {
  const { columnOf } = columnNames(model);
  const integerIds = integerVariableIds(model);
  const lines: string[] = [];

  lines.push('Minimize');
  lines.push(` obj: ${formatExpression(model.objective.expression, columnOf)}`);

  lines.push('Subject To');
  model.constraints.forEach((constraint, i) => {
    lines.push(
      ` c${i}: ${formatExpression(constraint.expression, columnOf)} >= ${formatNumber(solverBound(constraint, integerIds))}`,
    );
  });

  lines.push('Bounds');
  for (const variable of model.variables) {
    lines.push(` ${columnOf.get(variable.id)} >= 0`);
  }

  const integers = model.variables
    .filter((v) => v.domain === 'nonNegativeInteger')
    .map((v) => columnOf.get(v.id));
  if (integers.length > 0) {
    lines.push('General');
    for (let i = 0; i < integers.length; i += TERMS_PER_LINE) {
      lines.push(` ${integers.slice(i, i + TERMS_PER_LINE).join(' ')}`);
    }
  }

  lines.push('End');
  return `${lines.join('\n')}\n`;
}
