/**
 * Variable naming scheme shared by the model builder and the plan decoder.
 *
 * Variables are addressed by a structured key, never by a string assembled
 * from tier and period names. Ids are positional (`v0`, `v1`, ...) and are
 * derived from the ordered period and tier lists alone, so the builder and
 * the decoder agree on every id as long as they hold the same index.
 */

// ─── Keys ────────────────────────────────────────────────────────────────────

export type VariableKey =
  | { readonly kind: 'onDemand'; readonly periodId: string }
  | { readonly kind: 'reserved'; readonly tierId: string; readonly periodId: string }
  | { readonly kind: 'reservation'; readonly tierId: string };

/** Opaque solver-facing identifier. */
export type VariableId = `v${number}`;

export function onDemandKey(periodId: string): VariableKey {
  return { kind: 'onDemand', periodId };
}

export function reservedKey(tierId: string, periodId: string): VariableKey {
  return { kind: 'reserved', tierId, periodId };
}

export function reservationKey(tierId: string): VariableKey {
  return { kind: 'reservation', tierId };
}

/** Human-readable label, e.g. `reserved[heavy,night]`. Display only. */
export function describeVariableKey(key: VariableKey): string {
  switch (key.kind) {
    case 'onDemand':
      return `onDemand[${key.periodId}]`;
    case 'reserved':
      return `reserved[${key.tierId},${key.periodId}]`;
    case 'reservation':
      return `reservation[${key.tierId}]`;
  }
}

// ─── Index ───────────────────────────────────────────────────────────────────

export interface IndexedVariable {
  readonly id: VariableId;
  readonly key: VariableKey;
}

/**
 * Immutable lookup between structured keys and positional ids.
 *
 * Layout: every `onDemand[p]` in period order, then `reserved[k,p]` tier-major,
 * then every `reservation[k]` in tier order.
 */
export class VariableIndex {
  readonly periodIds: readonly string[];
  readonly tierIds: readonly string[];

  private readonly entries: readonly IndexedVariable[];
  private readonly onDemandIds: ReadonlyMap<string, VariableId>;
  private readonly reservedIds: ReadonlyMap<string, ReadonlyMap<string, VariableId>>;
  private readonly reservationIds: ReadonlyMap<string, VariableId>;

  constructor(periodIds: readonly string[], tierIds: readonly string[]) {
    assertDistinct('period', periodIds);
    assertDistinct('tier', tierIds);

    const entries: IndexedVariable[] = [];
    const push = (key: VariableKey): VariableId => {
      const id: VariableId = `v${entries.length}`;
      entries.push(Object.freeze({ id, key }));
      return id;
    };

    const onDemandIds = new Map<string, VariableId>();
    for (const periodId of periodIds) {
      onDemandIds.set(periodId, push(onDemandKey(periodId)));
    }

    const reservedIds = new Map<string, Map<string, VariableId>>();
    for (const tierId of tierIds) {
      const byPeriod = new Map<string, VariableId>();
      for (const periodId of periodIds) {
        byPeriod.set(periodId, push(reservedKey(tierId, periodId)));
      }
      reservedIds.set(tierId, byPeriod);
    }

    const reservationIds = new Map<string, VariableId>();
    for (const tierId of tierIds) {
      reservationIds.set(tierId, push(reservationKey(tierId)));
    }

    this.periodIds = Object.freeze([...periodIds]);
    this.tierIds = Object.freeze([...tierIds]);
    this.entries = Object.freeze(entries);
    this.onDemandIds = onDemandIds;
    this.reservedIds = reservedIds;
    this.reservationIds = reservationIds;
  }

  get size(): number {
    return this.entries.length;
  }

  /** All variables in layout order. */
  variables(): readonly IndexedVariable[] {
    return this.entries;
  }

  /** Id for `key`, or `undefined` when the key names an unknown tier or period. */
  lookup(key: VariableKey): VariableId | undefined {
    switch (key.kind) {
      case 'onDemand':
        return this.onDemandIds.get(key.periodId);
      case 'reserved':
        return this.reservedIds.get(key.tierId)?.get(key.periodId);
      case 'reservation':
        return this.reservationIds.get(key.tierId);
    }
  }

  /** Id for `key`; throws when the key is not part of this index. */
  idOf(key: VariableKey): VariableId {
    const id = this.lookup(key);
    if (id === undefined) {
      throw new Error(`Unknown variable: ${describeVariableKey(key)}`);
    }
    return id;
  }

  keyOf(id: VariableId): VariableKey | undefined {
    const position = Number(id.slice(1));
    return this.entries[position]?.key;
  }
}

function assertDistinct(label: string, ids: readonly string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new Error(`Duplicate ${label} id: ${id}`);
    }
    seen.add(id);
  }
}
