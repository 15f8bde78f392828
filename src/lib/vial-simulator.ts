// ── Vial Consumption Simulator ──────────────────────────────────
// Steps a fixed roster of people through shared multi-dose vials one day
// at a time until a target number of vials has been opened, tracking how
// much medication is thrown away along the way.

import type {
    InvalidDosageReason,
    PersonDosage,
    PersonSchedule,
    ReplacementTiming,
    SimulationOptions,
    TrialOutcome,
    VialParameters,
    VialState,
} from '@/types/simulation';
import { buildRoster, maxDosage, minDosage, validateRoster } from '@/lib/dosage-roster';
import { createLeftoverStore, type LeftoverStore } from '@/lib/leftover-store';

export class VialSimulator {
    readonly roster: PersonDosage[];
    /** Set when the roster cannot run; `run()` then reports an invalid trial */
    readonly invalidReason: InvalidDosageReason | null;

    private readonly numVials: number;
    private readonly vialVolume: number;
    private readonly timing: ReplacementTiming;
    private readonly onDayEnd?: SimulationOptions['onDayEnd'];
    private readonly leftovers: LeftoverStore;
    private readonly minDose: number;
    private readonly maxDose: number;

    private activeRemaining: number;
    private vialsUsed = 1;
    private waste = 0;
    private consumed = 0;
    private droppedLeftover = 0;
    private day = 1;
    private finished = false;

    constructor(schedules: PersonSchedule[], params: VialParameters, options: SimulationOptions = {}) {
        if (!Number.isInteger(params.numVials) || params.numVials < 1) {
            throw new RangeError(`numVials must be a positive integer, got ${params.numVials}`);
        }
        if (!(params.vialVolume > 0)) {
            throw new RangeError(`vialVolume must be positive, got ${params.vialVolume}`);
        }

        this.numVials = params.numVials;
        this.vialVolume = params.vialVolume;
        this.timing = options.replacementTiming ?? 'on-shortfall';
        this.onDayEnd = options.onDayEnd;
        this.leftovers = createLeftoverStore(options.leftoverPolicy ?? 'single-slot');

        this.roster = buildRoster(schedules);
        this.invalidReason = validateRoster(this.roster, this.vialVolume);
        this.minDose = minDosage(this.roster);
        this.maxDose = maxDosage(this.roster);

        // The first vial is opened up front and counts toward the target
        this.activeRemaining = this.vialVolume;
    }

    get state(): VialState {
        return {
            activeRemaining: this.activeRemaining,
            leftovers: this.leftovers.snapshot(),
            vialsUsed: this.vialsUsed,
            waste: this.waste,
            consumed: this.consumed,
            droppedLeftover: this.droppedLeftover,
            day: this.day,
        };
    }

    /**
     * Draw one dose, from the leftover fragment first and the open vial
     * second. Returns false when neither holds enough.
     */
    doInjection(dose: number): boolean {
        const wasted = this.leftovers.draw(dose, this.minDose);
        if (wasted !== null) {
            this.waste += wasted;
            this.consumed += dose;
            return true;
        }
        if (this.activeRemaining - dose >= 0) {
            this.activeRemaining -= dose;
            this.consumed += dose;
            return true;
        }
        return false;
    }

    /**
     * Retire the open vial once it can no longer serve the largest dose.
     * Below the smallest dose the remainder is waste; otherwise it is kept as
     * a leftover fragment. Either way a fresh vial is opened.
     */
    updateVialsUsed(): void {
        if (this.activeRemaining < this.minDose) {
            this.waste += this.activeRemaining;
            this.openVial();
        } else if (this.activeRemaining < this.maxDose) {
            this.droppedLeftover += this.leftovers.retain(this.activeRemaining);
            this.openVial();
        }
    }

    run(): TrialOutcome {
        if (this.invalidReason) {
            return { status: 'invalid', reason: this.invalidReason, roster: this.roster };
        }
        if (!this.finished) {
            for (;;) {
                this.runDay();
                this.onDayEnd?.(this.state);
                if (this.vialsUsed >= this.numVials) break;
                this.day += 1;
            }
            this.finished = true;
        }

        return {
            status: 'completed',
            result: {
                waste: this.waste,
                day: this.day,
                roster: this.roster,
                vialsUsed: this.vialsUsed,
                activeRemaining: this.activeRemaining,
                leftovers: this.leftovers.snapshot(),
                droppedLeftover: this.droppedLeftover,
            },
        };
    }

    /**
     * Serve everyone due today. Every pass that leaves someone unserved is
     * followed by one replacement, after which the first unserved person is
     * sure to fit, so n due people need at most n + 1 passes.
     */
    private runDay(): void {
        let pending = this.roster.filter(p => this.day % p.frequency === 0);
        const maxPasses = pending.length + 1;

        for (let pass = 1; ; pass++) {
            if (pass > maxPasses) {
                throw new Error(`Day ${this.day} did not settle within ${maxPasses} passes`);
            }

            const unserved: PersonDosage[] = [];
            for (const person of pending) {
                if (!this.doInjection(person.dosage)) unserved.push(person);
            }
            if (unserved.length > 0 || this.timing === 'every-pass') this.updateVialsUsed();

            pending = unserved;
            if (pending.length === 0) return;
        }
    }

    private openVial(): void {
        this.vialsUsed += 1;
        this.activeRemaining = this.vialVolume;
    }
}

/**
 * Run one trial for a fixed dosage assignment.
 * Invalid rosters come back as `{ status: 'invalid' }`, never as an exception.
 */
export function simulate(
    schedules: PersonSchedule[],
    numVials: number,
    vialVolume: number,
    options: SimulationOptions = {},
): TrialOutcome {
    return new VialSimulator(schedules, { numVials, vialVolume }, options).run();
}
