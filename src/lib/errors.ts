export class ConfigError extends Error {
    issues: string[];
    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** Every trial of a sweep was rejected, so there is nothing to rank. */
export class NoUsableScheduleError extends Error {
    totalTrials: number;
    abortedTrials: number;
    constructor(totalTrials: number, abortedTrials: number) {
        super(`No usable dosing schedule: all ${abortedTrials} of ${totalTrials} trials were aborted`);
        this.name = 'NoUsableScheduleError';
        this.totalTrials = totalTrials;
        this.abortedTrials = abortedTrials;
    }
}
