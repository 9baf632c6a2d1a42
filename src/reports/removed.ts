import { join } from 'node:path';

import { log } from 'apify';

import { REPORT_FILES } from '../constants.js';
import type { RemovedListing } from '../types.js';
import { writeFileAtomic } from '../utils.js';
import { escapeHtml, formatArea, formatMinute, formatPrice, formatTimestamp } from './format.js';
import { renderImage, renderPage, renderTitleLink } from './layout.js';
import type { CycleReport, ReportContext, ReportRenderer } from './types.js';

const REMOVED_STYLE = `
        h1 { border-bottom-color: #cc0000; }
        .removed-badge {
            background: #cc0000;
            color: white;
            padding: 2px 8px;
            border-radius: 3px;
            font-size: 0.7em;
            margin-left: 10px;
        }`;

/** Listings that dropped out of the results this cycle, most recently seen first. */
export const renderRemovedPage = async (
    removed: RemovedListing[],
    checkedAt: string,
    context: Pick<ReportContext, 'images' | 'timeZone'>,
): Promise<string> => {
    const sorted = [...removed].sort((a, b) => b.lastSeen.localeCompare(a.lastSeen));

    let body = `    <div class="summary">
        <p><strong>Total Removed:</strong> ${removed.length}</p>
        <p class="timestamp">Last checked: ${formatTimestamp(checkedAt, context.timeZone)}</p>
        <p><em>These properties were previously available but are no longer in the search results -
            likely sold or withdrawn.</em></p>
    </div>`;

    for (const { id, record, lastSeen } of sorted) {
        const image = renderImage(await context.images.resolve(id, record.imageUrl));
        body += `
    <div class="property">
        ${image}
        <div class="property-details">
            <h3>${renderTitleLink(record.url, record.name)}<span class="removed-badge">REMOVED</span></h3>
            <p><strong>Last Price:</strong> ${formatPrice(record.price)}</p>
            <p><strong>Area:</strong> ${formatArea(record.area)}</p>
            <p><strong>Location:</strong> ${escapeHtml(record.locality)}</p>
            <p class="timestamp"><strong>Last seen:</strong> ${formatMinute(lastSeen, context.timeZone)}</p>
        </div>
    </div>`;
    }

    return renderPage('Sreality - Removed Properties', '🔴 Removed Properties (Likely Sold)', body, REMOVED_STYLE);
};

export class RemovedReport implements ReportRenderer {
    readonly name = 'removed';

    constructor(private readonly context: ReportContext) {}

    async render({ diff, checkedAt }: CycleReport): Promise<void> {
        if (diff.removed.length === 0) return;

        const filePath = join(this.context.outputDir, REPORT_FILES.removed);
        await writeFileAtomic(filePath, await renderRemovedPage(diff.removed, checkedAt, this.context));
        log.info(`[reports] ${diff.removed.length} removed listings saved to ${filePath}`);
    }
}
