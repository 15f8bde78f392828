// ── Parameter Sweep ─────────────────────────────────────────────
// Runs one trial per combination of dose rate and frequency across all
// people, keeps the distinct completed outcomes and ranks them by waste.

import type { PersonConfig, SweepConfig } from '@/config/sweep-config';
import type { PersonSchedule, TrialResult } from '@/types/simulation';
import { simulate } from '@/lib/vial-simulator';
import { NoUsableScheduleError } from '@/lib/errors';
import { logger } from '@/lib/logger';

const WASTE_KEY_DECIMALS = 6;

export interface SweepSummary {
    /** Distinct completed trials, least waste first */
    outcomes: TrialResult[];
    totalTrials: number;
    abortedTrials: number;
}

/**
 * Half-open range start, start + step, … below stop.
 * Values are trimmed to 10 decimals so 0.038 + 2 × 0.001 reads 0.04.
 */
export function doseRateRange(start: number, stop: number, step: number): number[] {
    if (!(step > 0)) throw new RangeError(`step must be positive, got ${step}`);
    const count = Math.max(0, Math.ceil((stop - start) / step - 1e-9));
    return Array.from({ length: count }, (_, i) => Number((start + i * step).toFixed(10)));
}

export function personDoseRates(person: PersonConfig, step: number): number[] {
    const rate = person.doseRate;
    if (Array.isArray(rate)) return rate;
    return doseRateRange(rate.start, rate.stop, rate.step ?? step);
}

/** Every combination of one value per list, last list varying fastest. */
export function* cartesianProduct<T>(lists: T[][]): Generator<T[]> {
    if (lists.some(l => l.length === 0)) return;
    const idx = lists.map(() => 0);
    for (;;) {
        yield lists.map((l, i) => l[idx[i]]);
        let k = lists.length - 1;
        while (k >= 0) {
            idx[k] += 1;
            if (idx[k] < lists[k].length) break;
            idx[k] = 0;
            k -= 1;
        }
        if (k < 0) return;
    }
}

/** Split an interleaved [rate, freq, rate, freq, …] row into schedules. */
export function pairSchedules(names: string[], row: number[]): PersonSchedule[] {
    if (row.length !== names.length * 2) {
        throw new RangeError(`Expected ${names.length * 2} values for ${names.length} people, got ${row.length}`);
    }
    return names.map((name, i) => ({
        name,
        doseRate: row[2 * i],
        frequency: row[2 * i + 1],
    }));
}

/** Two trials are the same outcome when waste, day and roster all match. */
export function outcomeKey(result: TrialResult): string {
    const roster = result.roster.map(p => `${p.name}:${p.dosage}:${p.frequency}`).join(',');
    return `${result.waste.toFixed(WASTE_KEY_DECIMALS)}|${result.day}|${roster}`;
}

export function runSweep(config: SweepConfig): SweepSummary {
    const names = config.people.map(p => p.name);
    const lists: number[][] = config.people.flatMap(p => [personDoseRates(p, config.step), p.frequencies]);
    const combinations = lists.reduce((n, l) => n * l.length, 1);
    logger.debug(`Sweeping ${combinations} combinations for ${names.join(', ')}`);

    const seen = new Set<string>();
    const outcomes: TrialResult[] = [];
    let totalTrials = 0;
    let abortedTrials = 0;

    for (const row of cartesianProduct(lists)) {
        totalTrials++;
        const outcome = simulate(pairSchedules(names, row), config.numVials, config.vialVolume, {
            leftoverPolicy: config.leftoverPolicy,
            replacementTiming: config.replacementTiming,
        });

        if (outcome.status === 'invalid') {
            abortedTrials++;
            continue;
        }
        const key = outcomeKey(outcome.result);
        if (seen.has(key)) continue;
        seen.add(key);
        outcomes.push(outcome.result);
    }

    logger.debug(`${totalTrials} trials, ${abortedTrials} aborted, ${outcomes.length} distinct outcomes`);
    if (outcomes.length === 0) throw new NoUsableScheduleError(totalTrials, abortedTrials);

    outcomes.sort((a, b) => a.waste - b.waste);
    return { outcomes, totalTrials, abortedTrials };
}

export function topOutcomes(summary: SweepSummary, count: number): TrialResult[] {
    return summary.outcomes.slice(0, Math.max(0, count));
}
