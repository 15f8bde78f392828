
/** One participant's raw schedule for a single trial. */
export interface PersonSchedule {
    name: string;
    /** Average medication use in mL per day */
    doseRate: number;
    /** Days between injections */
    frequency: number;
}

/** A participant's per-injection dosage, derived from their schedule. */
export interface PersonDosage {
    name: string;
    /** mL drawn per injection, rounded to 2 decimals */
    dosage: number;
    frequency: number;
}

export interface LeftoverFragment {
    amount: number;
    active: boolean;
}

export const LEFTOVER_POLICIES = ['single-slot', 'fragment-pool'] as const;
export type LeftoverPolicy = typeof LEFTOVER_POLICIES[number];

export const REPLACEMENT_TIMINGS = ['on-shortfall', 'every-pass'] as const;
export type ReplacementTiming = typeof REPLACEMENT_TIMINGS[number];

export interface VialState {
    /** mL left in the open primary vial */
    activeRemaining: number;
    leftovers: LeftoverFragment[];
    /** Vials opened so far, the open one included */
    vialsUsed: number;
    waste: number;
    /** Total mL injected */
    consumed: number;
    /** Leftover volume overwritten by the single-slot policy (never counted as waste) */
    droppedLeftover: number;
    day: number;
}

export interface VialParameters {
    /** Target number of vials to open */
    numVials: number;
    /** mL per vial */
    vialVolume: number;
}

export interface SimulationOptions {
    leftoverPolicy?: LeftoverPolicy;
    replacementTiming?: ReplacementTiming;
    /** Called with a snapshot once every due injection of a day is served */
    onDayEnd?: (state: Readonly<VialState>) => void;
}

export type InvalidDosageReason =
    | 'empty-roster'
    | 'dosage-exceeds-vial'
    | 'non-positive-dosage'
    | 'invalid-frequency';

export interface TrialResult {
    waste: number;
    /** Day on which the vial target was reached */
    day: number;
    /** Sorted by dosage, largest first */
    roster: PersonDosage[];
    vialsUsed: number;
    activeRemaining: number;
    leftovers: LeftoverFragment[];
    droppedLeftover: number;
}

export type TrialOutcome =
    | { status: 'completed'; result: TrialResult }
    | { status: 'invalid'; reason: InvalidDosageReason; roster: PersonDosage[] };
