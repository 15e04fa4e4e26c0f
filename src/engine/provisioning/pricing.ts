import type { DemandSchedule, PricingCatalog, PricingTier } from './types.js';

/**
 * Share of a tier's fixed commitment cost charged to one planning horizon.
 * With a 1-day horizon and a 365-day term this is `fixedCost / 365`.
 */
export function amortizedFixedCost(
  tier: PricingTier,
  schedule: DemandSchedule,
  catalog: PricingCatalog,
): number {
  return (tier.fixedCost * schedule.horizonDays) / catalog.commitmentTermDays;
}
