import { join } from 'node:path';

import { log } from 'apify';

import { REPORT_FILES } from '../constants.js';
import type { History, ListingRecord } from '../types.js';
import { writeFileAtomic } from '../utils.js';
import { escapeHtml, formatArea, formatPrice, formatShortDate, formatTimestamp } from './format.js';
import { renderImage, renderPage, renderTitleLink } from './layout.js';
import type { CycleReport, ReportContext, ReportRenderer } from './types.js';

const TIMELINE_STYLE = `
        .property-header { display: flex; gap: 15px; margin-bottom: 10px; }
        .snapshot { padding: 6px 10px; border-bottom: 1px solid #eee; display: flex; gap: 20px; }
        .snapshot.price-change { background: #fff8e1; }
        .snapshot-date { color: #666; min-width: 120px; }
        .snapshot-price { font-weight: bold; }
        .price-up { color: #cc0000; }
        .price-down { color: #4caf50; }`;

/** Empty string for the first snapshot or an unchanged price, otherwise the colored delta. */
export const renderPriceMove = (previousPrice: number | null, price: number): string => {
    if (previousPrice === null || previousPrice === price) return '';
    const diff = price - previousPrice;
    return diff < 0
        ? ` → <span class="price-down">📉 -${formatPrice(-diff)}</span>`
        : ` → <span class="price-up">📈 +${formatPrice(diff)}</span>`;
};

const renderSnapshots = (snapshots: readonly ListingRecord[], timeZone: string): string => {
    let previousPrice: number | null = null;
    return snapshots
        .map((snapshot, index) => {
            const move = renderPriceMove(previousPrice, snapshot.price);
            previousPrice = snapshot.price;
            return `
        <div class="${move ? 'snapshot price-change' : 'snapshot'}">
            <span class="snapshot-date">#${index + 1} ${formatShortDate(snapshot.observedAt, timeZone)}</span>
            <span class="snapshot-price">${formatPrice(snapshot.price)}${move}</span>
        </div>`;
        })
        .join('');
};

/** Every tracked listing with its full price timeline, most observed first. */
export const renderTimelinePage = async (
    history: History,
    checkedAt: string,
    context: Pick<ReportContext, 'images' | 'timeZone'>,
): Promise<string> => {
    const sorted = [...history.entries()]
        .filter(([, snapshots]) => snapshots.length > 0)
        .sort(([, a], [, b]) => b.length - a.length);

    let body = `    <div class="summary">
        <p><strong>Properties Tracked:</strong> ${history.size}</p>
        <p class="timestamp">Generated: ${formatTimestamp(checkedAt, context.timeZone)}</p>
        <p><em>This shows the complete history of all properties, including price changes.</em></p>
    </div>`;

    for (const [id, snapshots] of sorted) {
        const latest = snapshots[snapshots.length - 1];
        const image = renderImage(await context.images.resolve(id, latest.imageUrl));
        body += `
    <div class="property-history">
        <div class="property-header">
            ${image}
            <div>
                <h2 style="margin-top: 0;">${renderTitleLink(latest.url, latest.name)}</h2>
                <p><strong>Location:</strong> ${escapeHtml(latest.locality)}</p>
                <p><strong>Area:</strong> ${formatArea(latest.area)}</p>
                <p><strong>Total Snapshots:</strong> ${snapshots.length}</p>
            </div>
        </div>
        <h3>History (${snapshots.length} snapshots):</h3>${renderSnapshots(snapshots, context.timeZone)}
    </div>`;
    }

    return renderPage('Sreality - Property History', '📊 Complete Property History & Changes', body, TIMELINE_STYLE);
};

export class TimelineReport implements ReportRenderer {
    readonly name = 'history';

    constructor(private readonly context: ReportContext) {}

    async render({ history, checkedAt }: CycleReport): Promise<void> {
        const filePath = join(this.context.outputDir, REPORT_FILES.history);
        await writeFileAtomic(filePath, await renderTimelinePage(history, checkedAt, this.context));
        log.info(`[reports] History of ${history.size} listings saved to ${filePath}`);
    }
}
