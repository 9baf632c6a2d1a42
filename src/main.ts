import { Actor, log } from 'apify';

import { runCycle } from './cycle.js';
import { ImageCache, noImages } from './images.js';
import { ensureWritableDir, parseInput } from './input.js';
import { GitPublisher, noPublish } from './publish.js';
import { createReportRenderers } from './reports/index.js';
import { runContinuously } from './scheduler.js';
import { SrealityFetcher } from './scrapers/sreality.js';
import { FileStateStore } from './store.js';

await Actor.init();

const controller = new AbortController();
const stop = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    log.info(`Received ${signal}, stopping after the current check`);
    controller.abort();
};
process.once('SIGINT', stop);
process.once('SIGTERM', stop);

try {
    const input = parseInput(await Actor.getInput());
    await ensureWritableDir(input.dataDir, 'Data directory');
    await ensureWritableDir(input.outputDir, 'Output directory');

    log.info('Starting Sreality Watch', {
        categories: input.categories,
        offerType: input.offerType,
        regions: input.regions,
        districtIds: input.districtIds,
        minPrice: input.minPrice,
        maxPrice: input.maxPrice,
        minArea: input.minArea,
        runMode: input.runMode,
        outputDir: input.outputDir,
    });

    const renderers = createReportRenderers({
        outputDir: input.outputDir,
        timeZone: input.timeZone,
        images: input.downloadImages ? new ImageCache(input.outputDir) : noImages,
    });
    const { enabled, repoPath } = input.publish;
    const deps = {
        source: new SrealityFetcher(input),
        store: new FileStateStore(input.dataDir),
        renderers,
        publisher: enabled && repoPath ? new GitPublisher(repoPath) : noPublish,
    };

    if (input.runMode === 'once') {
        await runCycle(deps);
    } else {
        await runContinuously({
            runCycle: async () => runCycle(deps),
            intervalMs: input.intervalHours * 3_600_000,
            cooldownMs: input.retryCooldownMinutes * 60_000,
            signal: controller.signal,
        });
    }

    log.info('Done.');
    await Actor.exit();
} catch (error) {
    log.exception(error instanceof Error ? error : new Error(String(error)), 'Sreality Watch failed');
    await Actor.exit({ exitCode: 1 });
}
