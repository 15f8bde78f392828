import { describe, it, expect } from 'vitest';
import { formatReport } from '../sweep-report';
import { runSweep, type SweepSummary } from '../parameter-sweep';
import { parseSweepConfig } from '@/config/sweep-config';

describe('formatReport', () => {
  const config = parseSweepConfig({
    numVials: 1,
    vialVolume: 5,
    numOutcomes: 3,
    people: [
      { name: 'Zed', doseRate: [1], frequencies: [2] },
      { name: 'Amy', doseRate: [0.5, 6], frequencies: [1] },
    ],
  });

  it('prints aborted trials and people in configured order', () => {
    expect(formatReport(runSweep(config), config)).toEqual([
      '1 trials were aborted.',
      'This is likely a result of a dose larger than the vial volume or a non-positive dose.',
      '',
      'The least wasteful dosage schedules are:',
      'Optimal outcome: 1',
      'Total wasted medicine: 0.00 mL',
      'In 1 days, you will have used 1 vials',
      "Zed's dosage: 2.00 mL every 2 days",
      "Amy's dosage: 0.50 mL every 1 days",
      '',
    ]);
  });

  it('stops at numOutcomes and skips the aborted notice when nothing was aborted', () => {
    const outcome = (waste: number) => ({
      waste,
      day: 12,
      roster: [
        { name: 'Amy', dosage: 1.25, frequency: 1 },
        { name: 'Zed', dosage: 0.4, frequency: 3 },
      ],
      vialsUsed: 1,
      activeRemaining: 0,
      leftovers: [],
      droppedLeftover: 0,
    });
    const summary: SweepSummary = {
      outcomes: [outcome(0.1), outcome(0.2), outcome(0.3), outcome(0.4)],
      totalTrials: 4,
      abortedTrials: 0,
    };

    const lines = formatReport(summary, config);
    expect(lines[0]).toBe('The least wasteful dosage schedules are:');
    expect(lines.filter(l => l.startsWith('Optimal outcome:'))).toEqual([
      'Optimal outcome: 1',
      'Optimal outcome: 2',
      'Optimal outcome: 3',
    ]);
    expect(lines.slice(1, 7)).toEqual([
      'Optimal outcome: 1',
      'Total wasted medicine: 0.10 mL',
      'In 12 days, you will have used 1 vials',
      "Zed's dosage: 0.40 mL every 3 days",
      "Amy's dosage: 1.25 mL every 1 days",
      '',
    ]);
  });
});
