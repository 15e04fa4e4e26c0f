import { ConfigError } from '../../lib/errors.js';
import { amortizedFixedCost } from './pricing.js';
import type { DemandSchedule, PricingCatalog } from './types.js';

/**
 * Largest demand or objective coefficient accepted. Doubles stop holding every
 * integer above 2^53, and HiGHS reads anything from 1e20 up as infinite.
 */
export const MAX_MODEL_MAGNITUDE = 1e15;

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Collect every problem with a schedule/catalog pair.
 * Returns an empty list when the inputs are valid.
 */
export function findInputIssues(schedule: DemandSchedule, catalog: PricingCatalog): string[] {
  const issues: string[] = [];

  if (!isPositive(schedule.horizonDays)) {
    issues.push(`horizonDays must be a positive number (got ${schedule.horizonDays})`);
  }
  if (!isPositive(catalog.commitmentTermDays)) {
    issues.push(`commitmentTermDays must be a positive number (got ${catalog.commitmentTermDays})`);
  }
  if (!isNonNegative(catalog.onDemandRate)) {
    issues.push(`onDemandRate must be a non-negative number (got ${catalog.onDemandRate})`);
  }

  const periodIds = new Set<string>();
  for (const period of schedule.periods) {
    if (period.id.length === 0) {
      issues.push('period id must not be empty');
    } else if (periodIds.has(period.id)) {
      issues.push(`duplicate period id: ${period.id}`);
    }
    periodIds.add(period.id);

    if (!isNonNegative(period.demand)) {
      issues.push(`period ${period.id}: demand must be a non-negative number (got ${period.demand})`);
    }
    if (!isPositive(period.durationHours)) {
      issues.push(
        `period ${period.id}: durationHours must be a positive number (got ${period.durationHours})`,
      );
    }
  }

  const tierIds = new Set<string>();
  for (const tier of catalog.tiers) {
    if (tier.id.length === 0) {
      issues.push('tier id must not be empty');
    } else if (tierIds.has(tier.id)) {
      issues.push(`duplicate tier id: ${tier.id}`);
    }
    tierIds.add(tier.id);

    if (!isNonNegative(tier.fixedCost)) {
      issues.push(`tier ${tier.id}: fixedCost must be a non-negative number (got ${tier.fixedCost})`);
    }
    if (!isNonNegative(tier.hourlyCost)) {
      issues.push(`tier ${tier.id}: hourlyCost must be a non-negative number (got ${tier.hourlyCost})`);
    }
  }

  // Coefficients are only meaningful once every field is in range
  if (issues.length === 0) {
    issues.push(...findMagnitudeIssues(schedule, catalog));
  }

  return issues;
}

function findMagnitudeIssues(schedule: DemandSchedule, catalog: PricingCatalog): string[] {
  const issues: string[] = [];
  const tooLarge = (value: number): boolean => value > MAX_MODEL_MAGNITUDE;
  const longestPeriod = schedule.periods.reduce((max, p) => Math.max(max, p.durationHours), 0);

  for (const period of schedule.periods) {
    if (tooLarge(period.demand)) {
      issues.push(`period ${period.id}: demand must not exceed ${MAX_MODEL_MAGNITUDE} (got ${period.demand})`);
    }
  }

  const onDemandPerPeriod = catalog.onDemandRate * longestPeriod;
  if (tooLarge(onDemandPerPeriod)) {
    issues.push(
      `onDemandRate: cost per period must not exceed ${MAX_MODEL_MAGNITUDE} (got ${onDemandPerPeriod})`,
    );
  }

  for (const tier of catalog.tiers) {
    const fixedPerHorizon = amortizedFixedCost(tier, schedule, catalog);
    if (tooLarge(fixedPerHorizon)) {
      issues.push(
        `tier ${tier.id}: fixed cost per horizon must not exceed ${MAX_MODEL_MAGNITUDE} (got ${fixedPerHorizon})`,
      );
    }
    const usagePerPeriod = tier.hourlyCost * longestPeriod;
    if (tooLarge(usagePerPeriod)) {
      issues.push(
        `tier ${tier.id}: usage cost per period must not exceed ${MAX_MODEL_MAGNITUDE} (got ${usagePerPeriod})`,
      );
    }
  }

  return issues;
}

/** Throws a ConfigError listing every issue, if any. */
export function validatePlanningInputs(schedule: DemandSchedule, catalog: PricingCatalog): void {
  const issues = findInputIssues(schedule, catalog);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}
