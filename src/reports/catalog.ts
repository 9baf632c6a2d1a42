import { join } from 'node:path';

import { log } from 'apify';

import { REPORT_FILES } from '../constants.js';
import type { ListingRecord, Snapshot } from '../types.js';
import { calcPricePerSqm, writeFileAtomic } from '../utils.js';
import { escapeHtml, formatArea, formatPrice, formatTimestamp } from './format.js';
import { renderDescription, renderImage, renderPage, renderTitleLink, renderViewButton } from './layout.js';
import type { CycleReport, ReportContext, ReportRenderer } from './types.js';

const renderListing = (listing: ListingRecord, image: string): string => {
    const pricePerSqm = calcPricePerSqm(listing.price, listing.area);
    const perSqm = pricePerSqm === null ? '' : ` (${formatPrice(pricePerSqm)}/m²)`;
    return `
    <div class="property">
        ${image}
        <div class="property-details">
            <h3>${renderTitleLink(listing.url, listing.name)}</h3>
            <p><strong>Price:</strong> ${formatPrice(listing.price)}${perSqm}</p>
            <p><strong>Area:</strong> ${formatArea(listing.area)}</p>
            <p><strong>Location:</strong> ${escapeHtml(listing.locality)}</p>
            ${renderDescription(listing.description)}
            ${renderViewButton(listing.url)}
        </div>
    </div>`;
};

/** Full page of every listing in the current snapshot, cheapest first. */
export const renderCatalogPage = async (
    snapshot: Snapshot,
    checkedAt: string,
    context: Pick<ReportContext, 'images' | 'timeZone'>,
): Promise<string> => {
    const sorted = [...snapshot.values()].sort((a, b) => a.price - b.price);

    let body = `    <div class="summary">
        <p><strong>Total Properties:</strong> ${snapshot.size}</p>
        <p class="timestamp">Last updated: ${formatTimestamp(checkedAt, context.timeZone)}</p>
        <p><em>This catalog shows ALL properties currently matching your search criteria.</em></p>
    </div>`;
    for (const listing of sorted) {
        body += renderListing(listing, renderImage(await context.images.resolve(listing.id, listing.imageUrl)));
    }

    return renderPage('Sreality - All Properties Catalog', '🏠 Complete Property Catalog', body);
};

export class CatalogReport implements ReportRenderer {
    readonly name = 'catalog';

    constructor(private readonly context: ReportContext) {}

    async render({ snapshot, checkedAt }: CycleReport): Promise<void> {
        const filePath = join(this.context.outputDir, REPORT_FILES.catalog);
        await writeFileAtomic(filePath, await renderCatalogPage(snapshot, checkedAt, this.context));
        log.info(`[reports] Catalog of ${snapshot.size} listings saved to ${filePath}`);
    }
}
