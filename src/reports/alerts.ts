import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { log } from 'apify';

import { REPORT_FILES } from '../constants.js';
import { hasAlerts } from '../history.js';
import type { DiffResult, PriceChange } from '../types.js';
import { writeFileAtomic } from '../utils.js';
import { escapeHtml, formatArea, formatPrice, formatTimestamp } from './format.js';
import { renderDescription, renderImage, renderPage, renderTitleLink, renderViewButton } from './layout.js';
import type { CycleReport, ReportContext, ReportRenderer } from './types.js';

const ALERTS_STYLE = `
        .check-header { color: #0066cc; border-bottom: 2px solid #eee; padding-bottom: 10px; margin-bottom: 15px; }
        .new { border-left: 4px solid #4caf50; }
        .price-drop { border-left: 4px solid #ff9800; }`;

const BODY_END = '</body>';

export const emptyAlertsPage = (): string =>
    renderPage('Sreality Alerts History', '🏠 Sreality Property Alerts - Complete History', '', ALERTS_STYLE);

const renderPriceChange = (change: PriceChange, image: string): string => {
    const { current, delta, oldPrice, newPrice } = change;
    const label = delta < 0 ? '📉 Reduced' : '📈 Increased';
    const color = delta < 0 ? 'green' : 'red';
    return `
        <div class="property price-drop">
            ${image}
            <div class="property-details">
                <h3>${renderTitleLink(current.url, current.name)}</h3>
                <p><strong>${label}:</strong> <span style="color: ${color};">${formatPrice(Math.abs(delta))}</span></p>
                <p><strong>Old Price:</strong> ${formatPrice(oldPrice)}</p>
                <p><strong>New Price:</strong> ${formatPrice(newPrice)}</p>
                <p><strong>Location:</strong> ${escapeHtml(current.locality)}</p>
                ${renderDescription(current.description)}
                ${renderViewButton(current.url)}
            </div>
        </div>`;
};

/** Builds the "Check: <time>" block for one cycle's new listings and price changes. */
export const renderAlertsSection = async (
    diff: DiffResult,
    checkedAt: string,
    context: Pick<ReportContext, 'images' | 'timeZone'>,
): Promise<string> => {
    let html = `
    <div class="check-section">
        <h2 class="check-header">Check: ${formatTimestamp(checkedAt, context.timeZone)}</h2>`;

    if (diff.newListings.length > 0) {
        html += `
        <h3>✨ New Properties (${diff.newListings.length})</h3>`;
        for (const listing of diff.newListings) {
            const image = renderImage(await context.images.resolve(listing.id, listing.imageUrl));
            html += `
        <div class="property new">
            ${image}
            <div class="property-details">
                <h3>${renderTitleLink(listing.url, listing.name)}</h3>
                <p><strong>Price:</strong> ${formatPrice(listing.price)}</p>
                <p><strong>Area:</strong> ${formatArea(listing.area)}</p>
                <p><strong>Location:</strong> ${escapeHtml(listing.locality)}</p>
                ${renderDescription(listing.description)}
                ${renderViewButton(listing.url)}
            </div>
        </div>`;
        }
    }

    if (diff.priceChanges.length > 0) {
        html += `
        <h3>💰 Price Changes (${diff.priceChanges.length})</h3>`;
        for (const change of diff.priceChanges) {
            const image = renderImage(await context.images.resolve(change.id, change.current.imageUrl));
            html += renderPriceChange(change, image);
        }
    }

    return `${html}
    </div>
`;
};

/** Inserts `section` before the closing body tag, starting a new page when there is none yet. */
export const appendSection = (existing: string | null, section: string): string => {
    const page = existing ?? emptyAlertsPage();
    const end = page.lastIndexOf(BODY_END);
    if (end === -1) return `${page}${section}`;
    return `${page.slice(0, end)}${section}${page.slice(end)}`;
};

const readExisting = async (filePath: string): Promise<string | null> => {
    try {
        return await readFile(filePath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
    }
};

/** Append-only log of every check that found something worth a look. */
export class AlertsReport implements ReportRenderer {
    readonly name = 'alerts';

    constructor(private readonly context: ReportContext) {}

    async render({ diff, checkedAt }: CycleReport): Promise<void> {
        if (!hasAlerts(diff)) return;

        const filePath = join(this.context.outputDir, REPORT_FILES.alerts);
        const section = await renderAlertsSection(diff, checkedAt, this.context);
        await writeFileAtomic(filePath, appendSection(await readExisting(filePath), section));
        log.info(`[reports] Alerts appended to ${filePath}`);
    }
}
