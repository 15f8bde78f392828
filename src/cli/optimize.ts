import { loadSweepConfig } from '@/config/sweep-config';
import { ConfigError, NoUsableScheduleError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { runSweep } from '@/lib/parameter-sweep';
import { formatReport } from '@/lib/sweep-report';

export interface OptimizeOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    /** Receives each report line; defaults to stdout */
    write?: (line: string) => void;
}

/** Load the config, sweep every schedule and print the ranking. Returns the exit code. */
export function runOptimizer({ configPath, env = process.env, write = line => console.log(line) }: OptimizeOptions = {}): number {
    try {
        const config = loadSweepConfig(configPath, env);
        const summary = runSweep(config);
        formatReport(summary, config).forEach(line => write(line));
        return 0;
    } catch (err) {
        if (err instanceof ConfigError || err instanceof NoUsableScheduleError) {
            logger.error(err.message);
            return 1;
        }
        logger.error('Sweep failed:', err);
        throw err;
    }
}
