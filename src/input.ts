import { access, constants as fsConstants, mkdir } from 'node:fs/promises';

import { z } from 'zod';

import { INPUT_DEFAULTS, MAX_COOLDOWN_MINUTES, MAX_INTERVAL_HOURS } from './constants.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { Input } from './types.js';

const isValidTimeZone = (timeZone: string): boolean => {
    try {
        new Intl.DateTimeFormat('en-GB', { timeZone });
        return true;
    } catch {
        return false;
    }
};

const limit = z.number().int().nonnegative().nullable();

const inputSchema = z
    .object({
        categories: z.array(z.enum(['domy', 'byty', 'pozemky'])).min(1).default(INPUT_DEFAULTS.categories),
        offerType: z.enum(['prodej', 'pronajem', 'vse']).default(INPUT_DEFAULTS.offerType),
        regions: z.array(z.string()).default(INPUT_DEFAULTS.regions),
        districtIds: z.array(z.number().int().positive()).default(INPUT_DEFAULTS.districtIds),
        minPrice: limit.default(INPUT_DEFAULTS.minPrice),
        maxPrice: limit.default(INPUT_DEFAULTS.maxPrice),
        minArea: limit.default(INPUT_DEFAULTS.minArea),
        perPage: z.number().int().min(1).max(999).default(INPUT_DEFAULTS.perPage),
        dataDir: z.string().min(1).default(INPUT_DEFAULTS.dataDir),
        outputDir: z.string().min(1).default(INPUT_DEFAULTS.outputDir),
        runMode: z.enum(['once', 'continuous']).default(INPUT_DEFAULTS.runMode),
        intervalHours: z
            .number()
            .positive()
            .max(MAX_INTERVAL_HOURS, `must be at most ${MAX_INTERVAL_HOURS} hours`)
            .default(INPUT_DEFAULTS.intervalHours),
        retryCooldownMinutes: z
            .number()
            .positive()
            .max(MAX_COOLDOWN_MINUTES, `must be at most ${MAX_COOLDOWN_MINUTES} minutes`)
            .default(INPUT_DEFAULTS.retryCooldownMinutes),
        downloadImages: z.boolean().default(INPUT_DEFAULTS.downloadImages),
        timeZone: z.string().refine(isValidTimeZone, 'unknown time zone').default(INPUT_DEFAULTS.timeZone),
        publish: z
            .object({
                enabled: z.boolean().default(false),
                repoPath: z.string().min(1).nullable().default(null),
            })
            .default({}),
    })
    .refine((input) => input.minPrice === null || input.maxPrice === null || input.minPrice <= input.maxPrice, {
        message: 'minPrice must not exceed maxPrice',
        path: ['minPrice'],
    })
    .refine((input) => !input.publish.enabled || input.publish.repoPath !== null, {
        message: 'repoPath is required when publishing is enabled',
        path: ['publish', 'repoPath'],
    });

/** Applies defaults to the actor input and rejects anything the tracker cannot run with. */
export const parseInput = (raw: unknown): Input => {
    const parsed = inputSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const errs = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new ConfigurationError(`Invalid input: ${errs}`);
    }
    return parsed.data;
};

/** Creates `dir` when needed and fails with a ConfigurationError if it cannot be written to. */
export const ensureWritableDir = async (dir: string, label: string): Promise<void> => {
    try {
        await mkdir(dir, { recursive: true });
        await access(dir, fsConstants.W_OK);
    } catch (error) {
        throw new ConfigurationError(`${label} "${dir}" is not writable: ${errorMessage(error)}`, { cause: error });
    }
};
