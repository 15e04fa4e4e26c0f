import { amortizedFixedCost } from './pricing.js';
import type { DemandSchedule, PricingCatalog, ProvisioningPlan, TierCount } from './types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type PlanViolation =
  | {
      kind: 'capacity';
      periodId: string;
      demand: number;
      provided: number;
    }
  | {
      kind: 'reservationBound';
      tierId: string;
      periodId: string;
      running: number;
      reserved: number;
    }
  | {
      kind: 'missingPeriod';
      periodId: string;
    };

export interface TierCost {
  tierId: string;
  reservations: number;
  reservationCost: number;
  usageCost: number;
}

export interface PlanCost {
  reservationCost: number;
  reservedUsageCost: number;
  onDemandCost: number;
  total: number;
  byTier: TierCost[];
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function countFor(counts: readonly TierCount[], tierId: string): number {
  return counts.find((c) => c.tierId === tierId)?.count ?? 0;
}

// ─── Checks ──────────────────────────────────────────────────────────────────

/**
 * Every way `plan` fails to cover `schedule`: uncovered demand, a tier running
 * more capacity in some period than it reserved, or a period with no allocation.
 */
export function findPlanViolations(plan: ProvisioningPlan, schedule: DemandSchedule): PlanViolation[] {
  const violations: PlanViolation[] = [];
  const allocations = new Map(plan.periods.map((p) => [p.periodId, p]));

  for (const period of schedule.periods) {
    const allocation = allocations.get(period.id);
    if (!allocation) {
      violations.push({ kind: 'missingPeriod', periodId: period.id });
      continue;
    }

    const provided =
      allocation.onDemand + allocation.reserved.reduce((sum, r) => sum + r.count, 0);
    if (provided < period.demand) {
      violations.push({ kind: 'capacity', periodId: period.id, demand: period.demand, provided });
    }

    for (const running of allocation.reserved) {
      const reserved = countFor(plan.reservations, running.tierId);
      if (running.count > reserved) {
        violations.push({
          kind: 'reservationBound',
          tierId: running.tierId,
          periodId: period.id,
          running: running.count,
          reserved,
        });
      }
    }
  }

  return violations;
}

/** Cost of one planning horizon under `plan`, priced the way the model prices it. */
export function costPlan(
  plan: ProvisioningPlan,
  schedule: DemandSchedule,
  catalog: PricingCatalog,
): PlanCost {
  const durations = new Map(schedule.periods.map((p) => [p.id, p.durationHours]));
  const hoursOf = (periodId: string): number => durations.get(periodId) ?? 0;

  const byTier = catalog.tiers.map((tier): TierCost => {
    const reservations = countFor(plan.reservations, tier.id);
    const usageCost = plan.periods.reduce(
      (sum, p) => sum + tier.hourlyCost * hoursOf(p.periodId) * countFor(p.reserved, tier.id),
      0,
    );
    return {
      tierId: tier.id,
      reservations,
      reservationCost: amortizedFixedCost(tier, schedule, catalog) * reservations,
      usageCost,
    };
  });

  const onDemandCost = plan.periods.reduce(
    (sum, p) => sum + catalog.onDemandRate * hoursOf(p.periodId) * p.onDemand,
    0,
  );
  const reservationCost = byTier.reduce((sum, t) => sum + t.reservationCost, 0);
  const reservedUsageCost = byTier.reduce((sum, t) => sum + t.usageCost, 0);

  return {
    reservationCost,
    reservedUsageCost,
    onDemandCost,
    total: reservationCost + reservedUsageCost + onDemandCost,
    byTier,
  };
}
