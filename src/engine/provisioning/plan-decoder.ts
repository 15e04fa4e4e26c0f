import { DecodeError } from '../../lib/errors.js';
import type { Solution } from '../solver/types.js';
import type { ProvisioningPlan, TierCount } from './types.js';
import {
  describeVariableKey,
  onDemandKey,
  reservationKey,
  reservedKey,
} from './variable-index.js';
import type { VariableIndex, VariableKey } from './variable-index.js';

/**
 * Relabel a solver's flat assignment into a provisioning plan.
 *
 * Values are copied verbatim. Throws DecodeError when the solution is not
 * optimal or when a variable the index declares is missing from the
 * assignment, which means builder and decoder disagree on naming.
 */
export function decodeProvisioningPlan(index: VariableIndex, solution: Solution): ProvisioningPlan {
  if (solution.status !== 'optimal') {
    throw new DecodeError(`Cannot decode a solution with status ${solution.status}`);
  }
  const { assignment } = solution;

  const valueOf = (key: VariableKey): number => {
    const label = describeVariableKey(key);
    const id = index.lookup(key);
    if (id === undefined) {
      throw new DecodeError(`Variable ${label} is not part of the model`, label);
    }
    const value = assignment.get(id);
    if (value === undefined) {
      throw new DecodeError(`Assignment is missing ${label} (${id})`, label);
    }
    return value;
  };

  const periods = index.periodIds.map((periodId) => ({
    periodId,
    onDemand: valueOf(onDemandKey(periodId)),
    reserved: index.tierIds.map(
      (tierId): TierCount => ({ tierId, count: valueOf(reservedKey(tierId, periodId)) }),
    ),
  }));

  const reservations = index.tierIds.map(
    (tierId): TierCount => ({ tierId, count: valueOf(reservationKey(tierId)) }),
  );

  return { periods, reservations };
}
