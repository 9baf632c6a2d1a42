import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

import type { CycleSummary } from './cycle.js';
import { errorMessage } from './errors.js';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: Sleep = async (ms, signal) => {
    try {
        await setTimeout(ms, undefined, { signal });
    } catch (error) {
        if (!signal.aborted) throw error;
    }
};

export interface SchedulerOptions {
    runCycle: () => Promise<CycleSummary>;
    intervalMs: number;
    cooldownMs: number;
    signal: AbortSignal;
    sleep?: Sleep;
}

export interface SchedulerStats {
    succeeded: number;
    failed: number;
}

/**
 * Runs one cycle at a time until `signal` aborts. A running cycle is never interrupted:
 * the signal is only checked between cycles and cuts the wait short.
 */
export async function runContinuously({
    runCycle,
    intervalMs,
    cooldownMs,
    signal,
    sleep: wait = sleep,
}: SchedulerOptions): Promise<SchedulerStats> {
    const stats: SchedulerStats = { succeeded: 0, failed: 0 };
    log.info(`Starting continuous monitoring (checking every ${intervalMs / 3_600_000} hours)`);

    while (!signal.aborted) {
        let delay = intervalMs;
        try {
            const summary = await runCycle();
            stats.succeeded++;
            const { newListings, priceDrops, priceIncreases, removed } = summary;
            log.info(
                `Found ${newListings} new properties, ${priceDrops + priceIncreases} price changes, ${removed} removed`,
            );
        } catch (error) {
            stats.failed++;
            delay = cooldownMs;
            log.error(`Cycle failed, retrying in ${cooldownMs / 60_000} minutes`, { error: errorMessage(error) });
        }

        if (signal.aborted) break;
        log.info(`Next check in ${delay / 60_000} minutes`);
        await wait(delay, signal);
    }

    log.info('Stopping monitoring', { ...stats });
    return stats;
}
