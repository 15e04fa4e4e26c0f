import { ModelDraft } from './model.js';
import type { Model } from './model.js';
import { amortizedFixedCost } from './pricing.js';
import type { DemandSchedule, PricingCatalog } from './types.js';
import { validatePlanningInputs } from './validate-inputs.js';
import {
  VariableIndex,
  onDemandKey,
  reservationKey,
  reservedKey,
} from './variable-index.js';

/** The naming scheme for a schedule/catalog pair. */
export function indexFor(schedule: DemandSchedule, catalog: PricingCatalog): VariableIndex {
  return new VariableIndex(
    schedule.periods.map((p) => p.id),
    catalog.tiers.map((t) => t.id),
  );
}

/**
 * Translate a demand schedule and pricing catalog into a mixed-integer model.
 *
 * Minimises amortised commitment cost plus hourly running cost, subject to
 *   onDemand[p] + Σ_k reserved[k,p] >= demand[p]       for every period
 *   reservation[k] - reserved[k,p]  >= 0               for every tier/period
 * with every variable a non-negative integer.
 *
 * Throws ConfigError for malformed input; otherwise pure and deterministic.
 */
export function buildProvisioningModel(
  schedule: DemandSchedule,
  catalog: PricingCatalog,
): Model {
  validatePlanningInputs(schedule, catalog);

  let draft = ModelDraft.start(indexFor(schedule, catalog));

  // Objective
  for (const tier of catalog.tiers) {
    draft = draft.withObjectiveTerm(
      amortizedFixedCost(tier, schedule, catalog),
      reservationKey(tier.id),
    );
  }
  for (const tier of catalog.tiers) {
    for (const period of schedule.periods) {
      draft = draft.withObjectiveTerm(
        tier.hourlyCost * period.durationHours,
        reservedKey(tier.id, period.id),
      );
    }
  }
  for (const period of schedule.periods) {
    draft = draft.withObjectiveTerm(
      catalog.onDemandRate * period.durationHours,
      onDemandKey(period.id),
    );
  }

  // Capacity: each period's demand is covered
  for (const period of schedule.periods) {
    draft = draft.withConstraint(
      { kind: 'capacity', periodId: period.id },
      [
        { coefficient: 1, key: onDemandKey(period.id) },
        ...catalog.tiers.map((tier) => ({ coefficient: 1, key: reservedKey(tier.id, period.id) })),
      ],
      period.demand,
    );
  }

  // Reservation: running usage never exceeds the reusable pool
  for (const tier of catalog.tiers) {
    for (const period of schedule.periods) {
      draft = draft.withConstraint(
        { kind: 'reservation', tierId: tier.id, periodId: period.id },
        [
          { coefficient: 1, key: reservationKey(tier.id) },
          { coefficient: -1, key: reservedKey(tier.id, period.id) },
        ],
        0,
      );
    }
  }

  return draft.finish();
}
