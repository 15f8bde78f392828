import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import { LEFTOVER_POLICIES, REPLACEMENT_TIMINGS } from '@/types/simulation';

export const DEFAULT_CONFIG_PATH = 'config/sweep.json';

const doseRateRangeSchema = z
    .object({
        start: z.number().finite(),
        stop: z.number().finite(),
        step: z.number().finite().positive().optional(),
    })
    .refine(r => r.stop > r.start, { message: 'stop must be greater than start' });

const personSchema = z.object({
    name: z.string().trim().min(1, 'name is required'),
    /** mL per day, listed or as a range */
    doseRate: z.union([z.array(z.number().finite()).nonempty(), doseRateRangeSchema]),
    /** Days between injections */
    frequencies: z.array(z.number().int().positive()).nonempty(),
});

export const sweepConfigSchema = z
    .object({
        numVials: z.number().int().positive().default(20),
        vialVolume: z.number().finite().positive().default(5.0),
        step: z.number().finite().positive().default(0.001),
        numOutcomes: z.number().int().positive().default(5),
        leftoverPolicy: z.enum(LEFTOVER_POLICIES).default('single-slot'),
        replacementTiming: z.enum(REPLACEMENT_TIMINGS).default('on-shortfall'),
        people: z.array(personSchema).nonempty('at least one person is required'),
    })
    .superRefine((cfg, ctx) => {
        const seen = new Set<string>();
        cfg.people.forEach((p, i) => {
            if (seen.has(p.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['people', i, 'name'],
                    message: `duplicate name "${p.name}"`,
                });
            }
            seen.add(p.name);
        });
    });

export type SweepConfig = z.infer<typeof sweepConfigSchema>;
export type PersonConfig = SweepConfig['people'][number];

const envOverridesSchema = z.object({
    VIAL_SIM_NUM_VIALS: z.coerce.number().int().positive().optional(),
    VIAL_SIM_VIAL_VOLUME: z.coerce.number().finite().positive().optional(),
    VIAL_SIM_STEP: z.coerce.number().finite().positive().optional(),
    VIAL_SIM_NUM_OUTCOMES: z.coerce.number().int().positive().optional(),
    VIAL_SIM_LEFTOVER_POLICY: z.enum(LEFTOVER_POLICIES).optional(),
    VIAL_SIM_REPLACEMENT_TIMING: z.enum(REPLACEMENT_TIMINGS).optional(),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

/** Empty strings in the environment count as unset. */
function pickEnv(env: NodeJS.ProcessEnv) {
    const keys = Object.keys(envOverridesSchema.shape);
    return Object.fromEntries(
        keys.filter(k => env[k] !== undefined && env[k] !== '').map(k => [k, env[k]]),
    );
}

/** Validate a raw config object, with environment overrides applied on top. */
export function parseSweepConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): SweepConfig {
    const overrides = envOverridesSchema.safeParse(pickEnv(env));
    if (!overrides.success) {
        throw new ConfigError('Invalid environment override', formatIssues(overrides.error));
    }
    const o = overrides.data;

    const base = typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? raw : {};
    const merged = {
        ...base,
        ...(o.VIAL_SIM_NUM_VIALS !== undefined ? { numVials: o.VIAL_SIM_NUM_VIALS } : {}),
        ...(o.VIAL_SIM_VIAL_VOLUME !== undefined ? { vialVolume: o.VIAL_SIM_VIAL_VOLUME } : {}),
        ...(o.VIAL_SIM_STEP !== undefined ? { step: o.VIAL_SIM_STEP } : {}),
        ...(o.VIAL_SIM_NUM_OUTCOMES !== undefined ? { numOutcomes: o.VIAL_SIM_NUM_OUTCOMES } : {}),
        ...(o.VIAL_SIM_LEFTOVER_POLICY !== undefined ? { leftoverPolicy: o.VIAL_SIM_LEFTOVER_POLICY } : {}),
        ...(o.VIAL_SIM_REPLACEMENT_TIMING !== undefined ? { replacementTiming: o.VIAL_SIM_REPLACEMENT_TIMING } : {}),
    };

    const parsed = sweepConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError('Invalid sweep configuration', formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Resolve the config path (argument, then VIAL_SIM_CONFIG, then the default),
 * read the JSON file and validate it.
 */
export function loadSweepConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SweepConfig {
    const filePath = path.resolve(process.cwd(), configPath || env.VIAL_SIM_CONFIG || DEFAULT_CONFIG_PATH);
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`Config file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
        throw new ConfigError(`Could not parse ${filePath}`, [err instanceof Error ? err.message : String(err)]);
    }
    return parseSweepConfig(raw, env);
}
