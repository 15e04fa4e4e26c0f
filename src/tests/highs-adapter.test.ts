import { describe, it, expect } from 'vitest';
import { buildProvisioningModel } from '../engine/provisioning/model-builder.js';
import { ModelDraft } from '../engine/provisioning/model.js';
import { costPlan, findPlanViolations } from '../engine/provisioning/plan-checks.js';
import { decodeProvisioningPlan } from '../engine/provisioning/plan-decoder.js';
import type { DemandSchedule, PricingCatalog } from '../engine/provisioning/types.js';
import { VariableIndex, onDemandKey } from '../engine/provisioning/variable-index.js';
import { HighsSolverAdapter } from '../engine/solver/highs-adapter.js';
import { ProvisioningService } from '../services/provisioning.service.js';
import { LIGHT, dailySchedule, silentLogger, threeTierCatalog, valueIn } from './setup.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const REFERENCE_COST = 56016 / 365 + 136.448;

const solver = new HighsSolverAdapter();

/** Solve, decode and check the plan against the schedule it was built from. */
async function solveChecked(schedule: DemandSchedule, catalog: PricingCatalog) {
  const model = buildProvisioningModel(schedule, catalog);
  const solution = await solver.solve(model, { timeLimitMs: 10_000 });
  if (solution.status !== 'optimal') {
    throw new Error(`expected an optimal solution, got ${solution.status}`);
  }
  const plan = decodeProvisioningPlan(model.index, solution);

  expect(findPlanViolations(plan, schedule)).toEqual([]);
  expect(costPlan(plan, schedule, catalog).total).toBeCloseTo(solution.objectiveValue, 6);
  return { model, solution, plan };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('HighsSolverAdapter', () => {
  it('finds the optimal cost for the reference day', async () => {
    const { solution } = await solveChecked(dailySchedule(), threeTierCatalog());

    expect(solution.objectiveValue).toBeCloseTo(REFERENCE_COST, 6);
  });

  it('reports integral values for every variable', async () => {
    const { model, solution } = await solveChecked(dailySchedule(), threeTierCatalog());

    expect(solution.assignment.size).toBe(model.variables.length);
    for (const value of solution.assignment.values()) {
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
    }
  });

  it('rounds fractional demand up with on-demand capacity when there are no tiers', async () => {
    const { model, solution } = await solveChecked(dailySchedule(), threeTierCatalog({ tiers: [] }));

    expect(valueIn(model.index, solution, onDemandKey('night'))).toBe(13);
    expect(valueIn(model.index, solution, onDemandKey('morning'))).toBe(26);
    expect(valueIn(model.index, solution, onDemandKey('evening'))).toBe(54);
    expect(solution.objectiveValue).toBeCloseTo(0.64 * 8 * 93, 6);
  });

  it('covers demand carrying float noise with a whole extra unit', async () => {
    const schedule = { horizonDays: 1, periods: [{ id: 'a', demand: 0.1 * 3 * 10, durationHours: 8 }] };
    const { model, solution } = await solveChecked(schedule, threeTierCatalog({ tiers: [] }));

    expect(valueIn(model.index, solution, onDemandKey('a'))).toBe(4);
  });

  it('covers a tiny positive demand with one unit', async () => {
    const schedule = { horizonDays: 1, periods: [{ id: 'a', demand: 5e-7, durationHours: 8 }] };
    const { model, solution } = await solveChecked(schedule, threeTierCatalog({ tiers: [] }));

    expect(valueIn(model.index, solution, onDemandKey('a'))).toBe(1);
  });

  it('provisions nothing for zero demand', async () => {
    const { solution } = await solveChecked(
      dailySchedule({ night: 0, morning: 0, evening: 0 }),
      threeTierCatalog(),
    );

    expect(solution.objectiveValue).toBeCloseTo(0, 9);
    expect([...solution.assignment.values()].every((v) => v === 0)).toBe(true);
  });

  it('never gets cheaper when demand grows', async () => {
    const base = await solveChecked(dailySchedule(), threeTierCatalog());
    const busier = await solveChecked(
      dailySchedule({ night: 12.2, morning: 25.1, evening: 60 }),
      threeTierCatalog(),
    );

    expect(busier.solution.objectiveValue).toBeGreaterThanOrEqual(base.solution.objectiveValue);
  });

  it.each([
    { name: 'flat demand', demand: { night: 40, morning: 40, evening: 40 } },
    { name: 'a single busy window', demand: { night: 0, morning: 0, evening: 17.9 } },
    { name: 'falling demand', demand: { night: 70.01, morning: 33.5, evening: 2 } },
  ])('returns a plan within capacity and reservation bounds for $name', async ({ demand }) => {
    await solveChecked(dailySchedule(demand), threeTierCatalog());
  });

  it('returns a valid plan over a week with uneven periods', async () => {
    await solveChecked(
      {
        horizonDays: 7,
        periods: [
          { id: 'weekday', demand: 31.4, durationHours: 120 },
          { id: 'weekend', demand: 9.6, durationHours: 48 },
        ],
      },
      threeTierCatalog(),
    );
  });

  it('answers an empty model without calling the solver', async () => {
    const model = ModelDraft.start(new VariableIndex([], [])).finish();

    await expect(solver.solve(model)).resolves.toEqual({
      status: 'optimal',
      objectiveValue: 0,
      assignment: new Map(),
    });
  });

  it('reports a cancelled solve as an error value', async () => {
    const controller = new AbortController();
    controller.abort();
    const model = buildProvisioningModel(dailySchedule(), threeTierCatalog());

    await expect(solver.solve(model, { signal: controller.signal })).resolves.toEqual({
      status: 'error',
      reason: 'cancelled',
      detail: 'Solve was cancelled before it started',
    });
  });
});

describe('ProvisioningService with HiGHS', () => {
  it('accepts whichever of several equally cheap plans the solver returns', async () => {
    const schedule = dailySchedule();
    const catalog = threeTierCatalog({ tiers: [LIGHT, { ...LIGHT, id: 'light2' }] });
    const service = new ProvisioningService(solver, { timeLimitMs: 10_000 });

    const outcome = await service.plan(schedule, catalog, { logger: silentLogger() });

    expect(outcome.status).toBe('optimal');
    if (outcome.status !== 'optimal') return;
    // 54 light reservations running 13 + 26 + 54 units, split any way between the twins
    expect(outcome.objectiveValue).toBeCloseTo((54 * 552) / 365 + 93 * 0.312 * 8, 6);
    expect(findPlanViolations(outcome.plan, schedule)).toEqual([]);
  });

  it('plans float-noisy demand instead of failing the plan check', async () => {
    const schedule = { horizonDays: 1, periods: [{ id: 'a', demand: 0.1 * 3 * 10, durationHours: 8 }] };
    const service = new ProvisioningService(solver, { timeLimitMs: 10_000 });

    const outcome = await service.plan(schedule, threeTierCatalog(), { logger: silentLogger() });

    expect(outcome.status).toBe('optimal');
    if (outcome.status !== 'optimal') return;
    expect(findPlanViolations(outcome.plan, schedule)).toEqual([]);
    const provided =
      (outcome.plan.periods[0]?.onDemand ?? 0) +
      (outcome.plan.periods[0]?.reserved ?? []).reduce((sum, r) => sum + r.count, 0);
    expect(provided).toBe(4);
  });
});
