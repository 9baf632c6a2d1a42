import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { log } from 'apify';
import { z } from 'zod';

import { STATE_FILES } from './constants.js';
import { errorMessage, PersistenceError } from './errors.js';
import type { History, ListingRecord, Snapshot, TrackerState } from './types.js';
import { createListingRecord, writeFileAtomic } from './utils.js';

const LOG_PREFIX = '[store]';

const listingRecordSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    price: z.number().int().nonnegative(),
    locality: z.string(),
    area: z.number().nullable(),
    url: z.string(),
    imageUrl: z.string().nullable(),
    description: z.string().nullable(),
    observedAt: z.string(),
});

const snapshotFileSchema = z.record(listingRecordSchema);
const historyFileSchema = z.record(z.array(listingRecordSchema));

export interface StateStore {
    load(): Promise<TrackerState>;
    save(state: TrackerState): Promise<void>;
}

const toJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

const parseJson = (text: string, label: string): unknown => {
    try {
        const value: unknown = JSON.parse(text);
        return value;
    } catch (error) {
        throw new PersistenceError(`${label} is not valid JSON`, { cause: error });
    }
};

const validate = <T>(schema: z.ZodType<T>, value: unknown, label: string): T => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new PersistenceError(`${label} has an unexpected shape: ${issues}`);
    }
    return parsed.data;
};

export const serializeSnapshot = (snapshot: Snapshot): string => toJson(Object.fromEntries(snapshot));

export const parseSnapshot = (text: string): Snapshot => {
    const data = validate(snapshotFileSchema, parseJson(text, 'Snapshot'), 'Snapshot');
    return new Map(
        Object.entries(data).map(([id, record]): [string, ListingRecord] => [id, createListingRecord(record)]),
    );
};

export const serializeHistory = (history: History): string => toJson(Object.fromEntries(history));

export const parseHistory = (text: string): History => {
    const data = validate(historyFileSchema, parseJson(text, 'History'), 'History');
    return new Map(
        Object.entries(data).map(([id, records]): [string, readonly ListingRecord[]] => [
            id,
            records.map(createListingRecord),
        ]),
    );
};

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readOptional = async (filePath: string): Promise<string | null> => {
    try {
        return await readFile(filePath, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) return null;
        throw new PersistenceError(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
};

/** Keeps the snapshot and the history as two pretty-printed JSON files in `dataDir`. */
export class FileStateStore implements StateStore {
    readonly snapshotPath: string;
    readonly historyPath: string;

    constructor(dataDir: string) {
        this.snapshotPath = join(dataDir, STATE_FILES.snapshot);
        this.historyPath = join(dataDir, STATE_FILES.history);
    }

    async load(): Promise<TrackerState> {
        const [snapshotText, historyText] = await Promise.all([
            readOptional(this.snapshotPath),
            readOptional(this.historyPath),
        ]);
        const snapshot: Snapshot = snapshotText === null ? new Map() : parseSnapshot(snapshotText);
        const history: History = historyText === null ? new Map() : parseHistory(historyText);

        log.debug(`${LOG_PREFIX} Loaded state`, { listings: snapshot.size, tracked: history.size });
        return { snapshot, history };
    }

    async save(state: TrackerState): Promise<void> {
        // History first. If the snapshot write fails after it, the next cycle diffs against the old
        // snapshot again: it re-alerts the same changes and appends one more entry per listing.
        try {
            await writeFileAtomic(this.historyPath, serializeHistory(state.history));
            await writeFileAtomic(this.snapshotPath, serializeSnapshot(state.snapshot));
        } catch (error) {
            throw new PersistenceError(`Failed to save state: ${errorMessage(error)}`, { cause: error });
        }
        log.info(`${LOG_PREFIX} Saved ${state.snapshot.size} listings, ${state.history.size} tracked`);
    }
}
