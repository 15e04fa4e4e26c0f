import { describe, it, expect } from 'vitest';
import {
  VariableIndex,
  describeVariableKey,
  onDemandKey,
  reservationKey,
  reservedKey,
} from '../engine/provisioning/variable-index.js';

describe('VariableIndex', () => {
  const index = new VariableIndex(['night', 'day'], ['light', 'heavy']);

  it('lays out on-demand, then reserved tier-major, then reservations', () => {
    expect(index.variables().map((v) => describeVariableKey(v.key))).toEqual([
      'onDemand[night]',
      'onDemand[day]',
      'reserved[light,night]',
      'reserved[light,day]',
      'reserved[heavy,night]',
      'reserved[heavy,day]',
      'reservation[light]',
      'reservation[heavy]',
    ]);
    expect(index.size).toBe(8);
  });

  it('assigns positional ids', () => {
    expect(index.idOf(onDemandKey('night'))).toBe('v0');
    expect(index.idOf(reservedKey('heavy', 'day'))).toBe('v5');
    expect(index.idOf(reservationKey('heavy'))).toBe('v7');
  });

  it('round-trips ids back to keys', () => {
    expect(index.keyOf('v3')).toEqual({ kind: 'reserved', tierId: 'light', periodId: 'day' });
    expect(index.keyOf('v99')).toBeUndefined();
  });

  it('keeps names that would collide when concatenated apart', () => {
    // "a_b" + "c" and "a" + "b_c" are distinct keys
    const tricky = new VariableIndex(['c', 'b_c'], ['a_b', 'a']);
    const first = tricky.idOf(reservedKey('a_b', 'c'));
    const second = tricky.idOf(reservedKey('a', 'b_c'));

    expect(first).not.toBe(second);
    expect(tricky.keyOf(first)).toEqual({ kind: 'reserved', tierId: 'a_b', periodId: 'c' });
    expect(tricky.keyOf(second)).toEqual({ kind: 'reserved', tierId: 'a', periodId: 'b_c' });
  });

  it('returns undefined from lookup for unknown keys and throws from idOf', () => {
    expect(index.lookup(onDemandKey('evening'))).toBeUndefined();
    expect(index.lookup(reservedKey('medium', 'night'))).toBeUndefined();
    expect(() => index.idOf(reservationKey('medium'))).toThrow('Unknown variable: reservation[medium]');
  });

  it('derives identical ids from identical period and tier lists', () => {
    const again = new VariableIndex(['night', 'day'], ['light', 'heavy']);
    expect(again.variables()).toEqual(index.variables());
  });

  it('rejects duplicate ids', () => {
    expect(() => new VariableIndex(['night', 'night'], [])).toThrow('Duplicate period id: night');
    expect(() => new VariableIndex([], ['light', 'light'])).toThrow('Duplicate tier id: light');
  });

  it('handles a schedule without tiers', () => {
    const bare = new VariableIndex(['night'], []);
    expect(bare.size).toBe(1);
    expect(bare.tierIds).toEqual([]);
  });
});
