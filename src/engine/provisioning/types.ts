// ─── Inputs ──────────────────────────────────────────────────────────────────

/** A non-overlapping window of the repeating planning horizon. */
export interface Period {
  readonly id: string;
  /** Required capacity; may be fractional. */
  readonly demand: number;
  readonly durationHours: number;
}

export interface DemandSchedule {
  readonly periods: readonly Period[];
  /** Length in days of the horizon the periods repeat over. */
  readonly horizonDays: number;
}

/** A prepaid commitment: fixed cost per commitment term, lower hourly rate. */
export interface PricingTier {
  readonly id: string;
  readonly fixedCost: number;
  readonly hourlyCost: number;
}

export interface PricingCatalog {
  /** Hourly cost of capacity bought without commitment. */
  readonly onDemandRate: number;
  readonly tiers: readonly PricingTier[];
  /** Days one commitment's fixed cost pays for (365 for an annual term). */
  readonly commitmentTermDays: number;
}

// ─── Output ──────────────────────────────────────────────────────────────────

export interface TierCount {
  readonly tierId: string;
  readonly count: number;
}

export interface PeriodAllocation {
  readonly periodId: string;
  readonly onDemand: number;
  /** Reserved capacity running in this period, one entry per tier. */
  readonly reserved: readonly TierCount[];
}

export interface ProvisioningPlan {
  readonly periods: readonly PeriodAllocation[];
  /** Commitments purchased, one entry per tier. */
  readonly reservations: readonly TierCount[];
}
