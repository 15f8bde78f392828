import type { InvalidDosageReason, PersonDosage, PersonSchedule } from '@/types/simulation';

/** Dosages are cut to 2 decimals, the precision a syringe can be read at */
export function roundDosage(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Convert each schedule into a per-injection dosage and order the roster
 * largest dose first. Replacement and leftover rules read the first and last
 * entries, so the order matters.
 */
export function buildRoster(schedules: PersonSchedule[]): PersonDosage[] {
    return schedules
        .map(s => ({
            name: s.name,
            dosage: roundDosage(s.doseRate * s.frequency),
            frequency: s.frequency,
        }))
        .sort((a, b) => b.dosage - a.dosage);
}

export function maxDosage(roster: PersonDosage[]): number {
    return roster[0]?.dosage ?? 0;
}

export function minDosage(roster: PersonDosage[]): number {
    return roster[roster.length - 1]?.dosage ?? 0;
}

/**
 * Check a sorted roster against the vial size.
 * Returns null when the trial can run.
 */
export function validateRoster(roster: PersonDosage[], vialVolume: number): InvalidDosageReason | null {
    if (roster.length === 0) return 'empty-roster';
    if (maxDosage(roster) > vialVolume) return 'dosage-exceeds-vial';
    if (minDosage(roster) <= 0) return 'non-positive-dosage';
    if (roster.some(p => !Number.isInteger(p.frequency) || p.frequency < 1)) return 'invalid-frequency';
    return null;
}
