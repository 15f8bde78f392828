import type { SweepConfig } from '@/config/sweep-config';
import { topOutcomes, type SweepSummary } from '@/lib/parameter-sweep';

/**
 * Console report for the best outcomes of a sweep. People are listed in the
 * order they were configured, not the dosage order the simulator uses.
 */
export function formatReport(summary: SweepSummary, config: SweepConfig): string[] {
    const lines: string[] = [];

    if (summary.abortedTrials > 0) {
        lines.push(`${summary.abortedTrials} trials were aborted.`);
        lines.push('This is likely a result of a dose larger than the vial volume or a non-positive dose.');
        lines.push('');
    }

    lines.push('The least wasteful dosage schedules are:');
    topOutcomes(summary, config.numOutcomes).forEach((result, i) => {
        lines.push(`Optimal outcome: ${i + 1}`);
        lines.push(`Total wasted medicine: ${result.waste.toFixed(2)} mL`);
        lines.push(`In ${result.day} days, you will have used ${config.numVials} vials`);
        for (const { name } of config.people) {
            const person = result.roster.find(p => p.name === name);
            if (!person) continue;
            lines.push(`${person.name}'s dosage: ${person.dosage.toFixed(2)} mL every ${person.frequency} days`);
        }
        lines.push('');
    });

    return lines;
}
