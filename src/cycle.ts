import { log } from 'apify';

import { EmptyFetchError, errorMessage, RenderError } from './errors.js';
import { detectChanges, logDiffStats, summarizeDiff } from './history.js';
import type { Publisher } from './publish.js';
import type { ReportRenderer } from './reports/index.js';
import type { StateStore } from './store.js';
import type { DiffSummary, ListingSource } from './types.js';

export interface CycleDeps {
    source: ListingSource;
    store: StateStore;
    renderers: ReportRenderer[];
    publisher: Publisher;
    clock?: () => Date;
}

export interface CycleSummary extends DiffSummary {
    checkedAt: string;
    listings: number;
    failedReports: string[];
}

/**
 * One check: load → fetch → detect → render → persist → publish.
 *
 * Fetch, empty-fetch and persistence failures propagate and leave the stored state as it was.
 * Report failures are logged and do not stop the new state from being saved.
 */
export async function runCycle({
    source,
    store,
    renderers,
    publisher,
    clock = () => new Date(),
}: CycleDeps): Promise<CycleSummary> {
    const checkedAt = clock().toISOString();
    log.info(`Checking properties at ${checkedAt}`);

    const previous = await store.load();
    const current = await source.fetch(checkedAt);

    const outcome = detectChanges(previous.snapshot, current, previous.history);
    if (outcome.status === 'empty-fetch') throw new EmptyFetchError();

    const { diff, history, snapshot } = outcome;
    logDiffStats(diff);

    const failedReports: string[] = [];
    for (const renderer of renderers) {
        try {
            await renderer.render({ diff, snapshot, history, checkedAt });
        } catch (cause) {
            const error = new RenderError(renderer.name, { cause });
            log.exception(error, error.message);
            failedReports.push(renderer.name);
        }
    }

    await store.save({ snapshot, history });
    try {
        await publisher.publish(checkedAt);
    } catch (error) {
        log.error('Publishing failed, reports stay local', { error: errorMessage(error) });
    }

    return { ...summarizeDiff(diff), checkedAt, listings: snapshot.size, failedReports };
}
