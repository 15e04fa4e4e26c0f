import type { PlanningOutcome } from './provisioning.service.js';

function money(value: number): string {
  return value.toFixed(2);
}

/**
 * Plain-text summary of a planning outcome.
 *
 *   Status: optimal
 *   Total cost: 289.92
 *   Reservations:
 *     heavy: 26
 *   Periods:
 *     night: on-demand 0, heavy 13
 */
export function renderPlanReport(outcome: PlanningOutcome): string {
  const lines: string[] = [`Status: ${outcome.status}`];

  switch (outcome.status) {
    case 'infeasible':
      lines.push(`Detail: ${outcome.detail}`);
      break;

    case 'error':
      lines.push(`Reason: ${outcome.reason}`);
      lines.push(`Detail: ${outcome.detail}`);
      break;

    case 'optimal': {
      const { plan, costs } = outcome;
      lines.push(`Total cost: ${money(outcome.objectiveValue)}`);
      lines.push(
        `  commitments ${money(costs.reservationCost)}, reserved usage ${money(costs.reservedUsageCost)}, on-demand ${money(costs.onDemandCost)}`,
      );

      lines.push('Reservations:');
      if (plan.reservations.length === 0) {
        lines.push('  (none)');
      }
      for (const reservation of plan.reservations) {
        lines.push(`  ${reservation.tierId}: ${reservation.count}`);
      }

      lines.push('Periods:');
      for (const period of plan.periods) {
        const parts = [
          `on-demand ${period.onDemand}`,
          ...period.reserved.map((r) => `${r.tierId} ${r.count}`),
        ];
        lines.push(`  ${period.periodId}: ${parts.join(', ')}`);
      }
      break;
    }
  }

  lines.push(`Solver: ${outcome.solver} (${outcome.stats.variables} variables, ${outcome.stats.constraints} constraints)`);
  return `${lines.join('\n')}\n`;
}
