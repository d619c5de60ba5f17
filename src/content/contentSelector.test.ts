import { describe, expect, it } from 'vitest';
import type { ContentBank, StateSnapshot } from '../domain/types.js';
import { emptySnapshot } from '../state/stateStore.js';
import { isOffCooldown, pickOne, selectContent, type Rng } from './contentSelector.js';

function sequence(...values: number[]): Rng {
  let i = 0;
  return () => values[i++ % values.length] ?? 0;
}

const bank: ContentBank = {
  thoughts: [
    { category: 'grind', text: 'A' },
    { category: 'grind', text: 'B' },
    { category: 'success', text: 'C' },
  ],
  scenes: [
    { name: 's1', description: 'first scene', details: 'd1' },
    { name: 's2', description: 'second scene', details: 'd2' },
  ],
  holidays: {
    '12-25': { name: 'christmas', text: 'Holiday line.', scene: 'snowy desk at night' },
  },
  seasonal: {
    '12': ['success'],
  },
};

const opts = { timezone: 'UTC', thoughtCooldownDays: 35, sceneCooldownDays: 5 };
const may10 = new Date('2025-05-10T06:00:00Z');

function state(patch: Partial<StateSnapshot>): StateSnapshot {
  return { ...emptySnapshot(), ...patch };
}

describe('isOffCooldown', () => {
  it('uses a day-count threshold with malformed dates treated as unused', () => {
    const history = { a: '2025-04-05', b: '2025-04-06', c: 'garbage' };
    expect(isOffCooldown(history, 'a', '2025-05-10', 35)).toBe(true);
    expect(isOffCooldown(history, 'b', '2025-05-10', 35)).toBe(false);
    expect(isOffCooldown(history, 'c', '2025-05-10', 35)).toBe(true);
    expect(isOffCooldown(history, 'never', '2025-05-10', 35)).toBe(true);
  });
});

describe('pickOne', () => {
  it('maps the unit interval onto indices', () => {
    expect(pickOne(['x', 'y', 'z'], () => 0)).toBe('x');
    expect(pickOne(['x', 'y', 'z'], () => 0.5)).toBe('y');
    expect(pickOne(['x', 'y', 'z'], () => 0.999)).toBe('z');
  });

  it('throws on an empty list', () => {
    expect(() => pickOne([], () => 0)).toThrow('pickOne called with an empty list');
  });
});

describe('selectContent', () => {
  it('never returns an item that is cooling down while others are eligible', () => {
    const s = state({ thoughtHistory: { A: '2025-05-01', B: '2025-03-01' } });
    for (const r of [0, 0.25, 0.49, 0.5, 0.75, 0.999]) {
      const picked = selectContent(may10, s, bank, { ...opts, rng: () => r });
      expect(picked.item.text).not.toBe('A');
      expect(picked.holiday).toBeUndefined();
    }
    expect(selectContent(may10, s, bank, { ...opts, rng: () => 0 }).item.text).toBe('B');
    expect(selectContent(may10, s, bank, { ...opts, rng: () => 0.9 }).item.text).toBe('C');
  });

  it('falls back to the whole bank when everything is cooling down', () => {
    const s = state({ thoughtHistory: { A: '2025-05-09', B: '2025-05-09', C: '2025-05-09' } });
    expect(selectContent(may10, s, bank, { ...opts, rng: () => 0 }).item.text).toBe('A');
  });

  it('filters scenes on their own threshold', () => {
    const s = state({ sceneHistory: { s1: '2025-05-07' } });
    for (const r of [0, 0.5, 0.99]) {
      expect(selectContent(may10, s, bank, { ...opts, rng: () => r }).scene.name).toBe('s2');
    }
  });

  it('falls back to every scene when all are cooling down', () => {
    const s = state({ sceneHistory: { s1: '2025-05-09', s2: '2025-05-09' } });
    expect(selectContent(may10, s, bank, { ...opts, rng: sequence(0, 0.9) }).scene.name).toBe('s2');
  });

  it('draws the item first and the scene second', () => {
    const picked = selectContent(may10, emptySnapshot(), bank, { ...opts, rng: sequence(0.9, 0) });
    expect(picked.item.text).toBe('C');
    expect(picked.scene.name).toBe('s1');
  });

  it('prefers the month seasonal categories', () => {
    const dec3 = new Date('2025-12-03T06:00:00Z');
    for (const r of [0, 0.5, 0.99]) {
      expect(selectContent(dec3, emptySnapshot(), bank, { ...opts, rng: () => r }).item.text).toBe('C');
    }
  });

  it('ignores the seasonal preference when none of its items are eligible', () => {
    const dec3 = new Date('2025-12-03T06:00:00Z');
    const s = state({ thoughtHistory: { C: '2025-12-01' } });
    expect(selectContent(dec3, s, bank, { ...opts, rng: () => 0 }).item.text).toBe('A');
  });

  it('skips the seasonal preference when the whole bank is cooling down', () => {
    const dec3 = new Date('2025-12-03T06:00:00Z');
    const s = state({ thoughtHistory: { A: '2025-12-01', B: '2025-12-01', C: '2025-12-01' } });
    expect(selectContent(dec3, s, bank, { ...opts, rng: () => 0 }).item.text).toBe('A');
  });

  it('returns the holiday pair on its date when unused this year', () => {
    const christmas = new Date('2025-12-25T06:00:00Z');
    const picked = selectContent(christmas, emptySnapshot(), bank, { ...opts, rng: () => 0 });
    expect(picked.item).toEqual({ category: 'holiday', text: 'Holiday line.' });
    expect(picked.scene).toEqual({ name: 'holiday_christmas', description: 'snowy desk at night', details: '' });
    expect(picked.holiday?.name).toBe('christmas');
  });

  it('resolves the holiday date in the configured zone', () => {
    // 18:00 UTC on the 24th is already the 25th in Manila.
    const eve = new Date('2025-12-24T18:00:00Z');
    expect(selectContent(eve, emptySnapshot(), bank, { ...opts, rng: () => 0 }).holiday).toBeUndefined();
    expect(selectContent(eve, emptySnapshot(), bank, { ...opts, timezone: 'Asia/Manila', rng: () => 0 }).holiday?.name).toBe(
      'christmas'
    );
  });

  it('falls through to regular content once the holiday is in the ledger', () => {
    const christmas = new Date('2025-12-25T06:00:00Z');
    const s = state({ holidayLedger: { '2025': ['christmas'] } });
    const picked = selectContent(christmas, s, bank, { ...opts, rng: () => 0 });
    expect(picked.holiday).toBeUndefined();
    expect(picked.item.text).toBe('C');
  });
});
