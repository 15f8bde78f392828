import { describe, it, expect } from 'vitest';
import {
  cartesianProduct,
  doseRateRange,
  outcomeKey,
  pairSchedules,
  personDoseRates,
  runSweep,
  topOutcomes,
} from '../parameter-sweep';
import { parseSweepConfig } from '@/config/sweep-config';
import { NoUsableScheduleError } from '../errors';

describe('doseRateRange', () => {
  it('excludes the stop value', () => {
    expect(doseRateRange(1, 2, 0.25)).toEqual([1, 1.25, 1.5, 1.75]);
  });

  it('does not gain an extra value from float error', () => {
    expect(doseRateRange(0.038, 0.042, 0.001)).toEqual([0.038, 0.039, 0.04, 0.041]);
  });

  it('is empty when stop does not exceed start', () => {
    expect(doseRateRange(1, 1, 0.1)).toEqual([]);
    expect(doseRateRange(2, 1, 0.1)).toEqual([]);
  });

  it('rejects a non-positive step', () => {
    expect(() => doseRateRange(0, 1, 0)).toThrow(RangeError);
  });
});

describe('personDoseRates', () => {
  it('uses a listed set as is', () => {
    expect(personDoseRates({ name: 'A', doseRate: [0.2, 0.1], frequencies: [1] }, 0.5)).toEqual([0.2, 0.1]);
  });

  it('falls back to the global step for a range without one', () => {
    expect(personDoseRates({ name: 'A', doseRate: { start: 0, stop: 1 }, frequencies: [1] }, 0.5)).toEqual([0, 0.5]);
  });

  it('prefers the range step', () => {
    expect(
      personDoseRates({ name: 'A', doseRate: { start: 0, stop: 1, step: 0.25 }, frequencies: [1] }, 0.5),
    ).toEqual([0, 0.25, 0.5, 0.75]);
  });
});

describe('cartesianProduct', () => {
  it('varies the last list fastest', () => {
    expect([...cartesianProduct([[1, 2], [3, 4]])]).toEqual([
      [1, 3],
      [1, 4],
      [2, 3],
      [2, 4],
    ]);
  });

  it('yields nothing when a list is empty', () => {
    expect([...cartesianProduct([[1, 2], []])]).toEqual([]);
  });

  it('yields one empty row for no lists', () => {
    expect([...cartesianProduct([])]).toEqual([[]]);
  });
});

describe('pairSchedules', () => {
  it('splits an interleaved row', () => {
    expect(pairSchedules(['A', 'B'], [0.5, 2, 0.25, 4])).toEqual([
      { name: 'A', doseRate: 0.5, frequency: 2 },
      { name: 'B', doseRate: 0.25, frequency: 4 },
    ]);
  });

  it('rejects a row of the wrong length', () => {
    expect(() => pairSchedules(['A', 'B'], [0.5, 2])).toThrow(RangeError);
  });
});

describe('runSweep', () => {
  const sweep = (people: unknown[], extra: Record<string, unknown> = {}) =>
    runSweep(parseSweepConfig({ numVials: 2, vialVolume: 5, people, ...extra }));

  it('counts invalid combinations as aborted', () => {
    const summary = sweep([{ name: 'A', doseRate: [2, 6], frequencies: [1] }]);
    expect(summary.totalTrials).toBe(2);
    expect(summary.abortedTrials).toBe(1);
    expect(summary.outcomes).toHaveLength(1);
    expect(summary.outcomes[0].waste).toBe(1);
    expect(summary.outcomes[0].day).toBe(3);
  });

  it('keeps one copy of identical outcomes', () => {
    // 2.001 mL/day rounds to the same 2.00 mL dose
    const summary = sweep([{ name: 'A', doseRate: [2, 2.001], frequencies: [1] }]);
    expect(summary.totalTrials).toBe(2);
    expect(summary.outcomes).toHaveLength(1);
  });

  it('ranks outcomes by waste', () => {
    const summary = sweep([{ name: 'A', doseRate: [2, 2.5], frequencies: [1] }]);
    expect(summary.outcomes.map(o => [o.roster[0].dosage, o.waste])).toEqual([
      [2.5, 0],
      [2, 1],
    ]);
  });

  it('sweeps ranges against every frequency', () => {
    const summary = sweep([{ name: 'A', doseRate: { start: 1, stop: 2, step: 0.5 }, frequencies: [1, 2] }]);
    expect(summary.totalTrials).toBe(4);
    expect(summary.abortedTrials).toBe(0);
  });

  it('passes the leftover policy through to each trial', () => {
    const people = [
      { name: 'Big', doseRate: [4], frequencies: [1] },
      { name: 'Small', doseRate: [0.5], frequencies: [2] },
    ];
    const [single] = sweep(people, { numVials: 5 }).outcomes;
    const [pool] = sweep(people, { numVials: 5, leftoverPolicy: 'fragment-pool' }).outcomes;
    expect(single.leftovers).toHaveLength(1);
    expect(pool.leftovers).toHaveLength(2);
  });

  it('throws when every combination is invalid', () => {
    expect(() => sweep([{ name: 'A', doseRate: [6, 7], frequencies: [1] }])).toThrow(NoUsableScheduleError);
    try {
      sweep([{ name: 'A', doseRate: [6, 7], frequencies: [1] }]);
    } catch (err) {
      expect(err).toMatchObject({ totalTrials: 2, abortedTrials: 2 });
    }
  });
});

describe('outcomeKey and topOutcomes', () => {
  const summary = runSweep(
    parseSweepConfig({ numVials: 2, vialVolume: 5, people: [{ name: 'A', doseRate: [2, 2.5], frequencies: [1] }] }),
  );

  it('keys on waste, day and roster', () => {
    expect(outcomeKey(summary.outcomes[1])).toBe('1.000000|3|A:2:1');
  });

  it('limits to the requested count', () => {
    expect(topOutcomes(summary, 1)).toHaveLength(1);
    expect(topOutcomes(summary, 10)).toHaveLength(2);
  });
});
