import { log } from 'apify';

import type {
    DetectionOutcome,
    DiffResult,
    DiffSummary,
    History,
    ListingRecord,
    PriceChange,
    RemovedListing,
    Snapshot,
} from './types.js';

/**
 * Compares a freshly fetched snapshot with the previous one and appends every current
 * record to its listing's timeline.
 *
 * Only `price` is compared. Listings missing from `previous` are reported as new even when
 * the history knows them from an earlier cycle, so a relisted property looks brand new.
 *
 * An empty `current` is treated as a failed fetch: nothing is classified and no history is
 * produced, so the caller keeps what it has instead of marking every listing as removed.
 * The inputs are never mutated.
 */
export function detectChanges(previous: Snapshot, current: Snapshot, history: History): DetectionOutcome {
    if (current.size === 0) return { status: 'empty-fetch' };

    const updatedHistory = new Map<string, readonly ListingRecord[]>(history);
    const diff: DiffResult = { newListings: [], priceChanges: [], removed: [], unchanged: [] };

    for (const [id, record] of current) {
        updatedHistory.set(id, [...(history.get(id) ?? []), record]);

        const prev = previous.get(id);
        if (!prev) {
            diff.newListings.push(record);
        } else if (prev.price !== record.price) {
            const change: PriceChange = {
                id,
                previous: prev,
                current: record,
                oldPrice: prev.price,
                newPrice: record.price,
                delta: record.price - prev.price,
            };
            diff.priceChanges.push(change);
        } else {
            diff.unchanged.push(id);
        }
    }

    for (const [id, record] of previous) {
        if (current.has(id)) continue;
        const removed: RemovedListing = { id, record, lastSeen: record.observedAt };
        diff.removed.push(removed);
    }

    return { status: 'detected', diff, history: updatedHistory, snapshot: current };
}

export function summarizeDiff(diff: DiffResult): DiffSummary {
    return {
        newListings: diff.newListings.length,
        priceDrops: diff.priceChanges.filter((c) => c.delta < 0).length,
        priceIncreases: diff.priceChanges.filter((c) => c.delta > 0).length,
        removed: diff.removed.length,
        unchanged: diff.unchanged.length,
    };
}

export function logDiffStats(diff: DiffResult): void {
    log.info('Change stats', { ...summarizeDiff(diff) });
}

export const hasAlerts = (diff: DiffResult): boolean => diff.newListings.length > 0 || diff.priceChanges.length > 0;
