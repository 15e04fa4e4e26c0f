import { z } from 'zod';
import type { PlannerConfig } from '../lib/config/planner.js';
import type { DemandSchedule, PricingCatalog } from '../engine/provisioning/types.js';

// Range checks (non-negative costs, unique ids, horizon fit) belong to the
// model builder, which reports them as a ConfigError.

export const periodSchema = z.object({
  id: z.string().min(1),
  demand: z.number(),
  durationHours: z.number(),
});

export const pricingTierSchema = z.object({
  id: z.string().min(1),
  fixedCost: z.number(),
  hourlyCost: z.number(),
});

export const demandScheduleSchema = z.object({
  periods: z.array(periodSchema),
  horizonDays: z.number().optional(),
});

export const pricingCatalogSchema = z.object({
  onDemandRate: z.number(),
  tiers: z.array(pricingTierSchema).default([]),
  commitmentTermDays: z.number().optional(),
});

export const planRequestSchema = z.object({
  schedule: demandScheduleSchema,
  catalog: pricingCatalogSchema,
});

export const planQuerySchema = z.object({
  format: z.enum(['json', 'text']).default('json'),
});

export type PlanRequest = z.infer<typeof planRequestSchema>;
export type PlanQuery = z.infer<typeof planQuerySchema>;

/** Fill request defaults from the planner config. */
export function toPlanningInputs(
  request: PlanRequest,
  config: Pick<PlannerConfig, 'defaultHorizonDays' | 'defaultCommitmentTermDays'>,
): { schedule: DemandSchedule; catalog: PricingCatalog } {
  return {
    schedule: {
      periods: request.schedule.periods,
      horizonDays: request.schedule.horizonDays ?? config.defaultHorizonDays,
    },
    catalog: {
      onDemandRate: request.catalog.onDemandRate,
      tiers: request.catalog.tiers,
      commitmentTermDays: request.catalog.commitmentTermDays ?? config.defaultCommitmentTermDays,
    },
  };
}
