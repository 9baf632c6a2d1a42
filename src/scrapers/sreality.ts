import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { gotScraping } from 'crawlee';
import { z } from 'zod';

import { FETCH_HEADERS, PAGE_DELAY_MS, REQUEST_TIMEOUT_MS } from '../constants.js';
import { errorMessage, FetchError } from '../errors.js';
import type { Category, Input, ListingRecord, ListingSource, OfferType, Snapshot } from '../types.js';
import { createListingRecord } from '../utils.js';

const AREA_MAX = 1_000_000; // 1 000 000 m² upper bound for usable_area filter (covers any land plot)
const PRICE_MAX = 1_000_000_000_000;
const ESTATES_API = 'https://www.sreality.cz/api/cs/v2/estates';
const SOURCE = 'sreality' as const;
const LOG_PREFIX = `[${SOURCE}]`;

const CATEGORY_MAIN: Record<Category, number> = { byty: 1, domy: 2, pozemky: 3 };
const CATEGORY_TYPE: Partial<Record<OfferType, number>> = { prodej: 1, pronajem: 2 };
const CATEGORY_SLUG: Record<Category, string> = { byty: 'byt', domy: 'dum', pozemky: 'pozemek' };

const REGION_IDS: Record<string, number> = {
    Praha: 10,
    Středočeský: 20,
    Jihočeský: 31,
    Plzeňský: 32,
    Karlovarský: 41,
    Ústecký: 42,
    Liberecký: 51,
    Královéhradecký: 52,
    Pardubický: 53,
    Vysočina: 63,
    Jihomoravský: 64,
    Olomoucký: 71,
    Zlínský: 72,
    Moravskoslezský: 80,
};

const estateSchema = z.object({
    hash_id: z.number(),
    name: z.string().optional(),
    price: z.number().optional(),
    locality: z.string().optional(),
    seo: z.object({ locality: z.string().optional() }).optional(),
    _links: z.object({ images: z.array(z.object({ href: z.string() })).optional() }).optional(),
});

const pageSchema = z.object({
    result_size: z.number().optional(),
    _embedded: z.object({ estates: z.array(estateSchema).optional() }).optional(),
});

const detailItemSchema = z.object({
    name: z.string(),
    value: z.union([z.string(), z.number()]),
});

const detailSchema = z.object({
    text: z.object({ value: z.string() }).optional(),
    items: z.array(z.unknown()).optional(),
});

/** Accepts a bare region name, "Jihočeský kraj" or "Kraj Vysočina". */
export const resolveRegionId = (region: string): number | undefined => {
    const name = region
        .trim()
        .replace(/^kraj\s+/i, '')
        .replace(/\s+kraj$/i, '');
    return Object.hasOwn(REGION_IDS, name) ? REGION_IDS[name] : undefined;
};

// "vse" selects the whole country, same as an empty list.
const selectedRegions = (regions: string[]): string[] => regions.filter((region) => region !== 'vse');

export const expandOfferTypes = (offerType: OfferType): OfferType[] =>
    offerType === 'vse' ? ['prodej', 'pronajem'] : [offerType];

export type SrealityEstate = z.infer<typeof estateSchema>;

interface SearchTarget {
    category: Category;
    offerType: OfferType;
}

interface DetailResult {
    description: string | null;
    area: number | null;
}

export const parseArea = (value: string | number | undefined): number | null => {
    if (value == null) return null;
    const num = Number.parseFloat(
        String(value)
            .replace(',', '.')
            .replace(/[^\d.]/g, ''),
    );
    return Number.isNaN(num) ? null : num;
};

/** Pulls the description and the usable area out of an estate detail response. */
export const parseDetail = (data: unknown): DetailResult => {
    const parsed = detailSchema.safeParse(data);
    if (!parsed.success) return { description: null, area: null };

    let area: number | null = null;
    for (const raw of (parsed.data.items ?? []).flat()) {
        const item = detailItemSchema.safeParse(raw);
        if (!item.success) continue;
        const nameLower = item.data.name.toLowerCase();
        if (area === null && nameLower.includes('plocha') && !nameLower.includes('pozemku')) {
            area = parseArea(item.data.value);
        }
    }

    return { description: parsed.data.text?.value ?? null, area };
};

export const buildSearchUrl = (input: Input, target: SearchTarget, page: number): string => {
    const params = new URLSearchParams({
        category_main_cb: String(CATEGORY_MAIN[target.category]),
        per_page: String(input.perPage),
        page: String(page),
    });
    const categoryType = CATEGORY_TYPE[target.offerType];
    if (categoryType !== undefined) {
        params.set('category_type_cb', String(categoryType));
    }
    if (input.minPrice != null || input.maxPrice != null) {
        params.set('czk_price_summary_order2', `${input.minPrice ?? 0}|${input.maxPrice ?? PRICE_MAX}`);
    }
    if (input.minArea != null) {
        params.set('usable_area', `${input.minArea}|${AREA_MAX}`);
    }
    for (const region of selectedRegions(input.regions)) {
        const regionId = resolveRegionId(region);
        if (regionId !== undefined) params.append('locality_region_id', String(regionId));
    }
    for (const districtId of input.districtIds) {
        params.append('locality_district_id', String(districtId));
    }
    return `${ESTATES_API}?${params.toString()}`;
};

export const buildListingUrl = (target: SearchTarget, estate: SrealityEstate): string => {
    const seoLocality = estate.seo?.locality;
    const path = [target.offerType, CATEGORY_SLUG[target.category], seoLocality, String(estate.hash_id)]
        .filter((segment): segment is string => Boolean(segment))
        .join('/');
    return `https://www.sreality.cz/detail/${path}`;
};

export const toListingRecord = (
    estate: SrealityEstate,
    target: SearchTarget,
    detail: DetailResult,
    observedAt: string,
): ListingRecord =>
    createListingRecord({
        id: String(estate.hash_id),
        name: estate.name ?? 'N/A',
        price: Math.max(0, Math.round(estate.price ?? 0)),
        locality: estate.locality ?? 'N/A',
        area: detail.area,
        url: buildListingUrl(target, estate),
        imageUrl: estate._links?.images?.[0]?.href ?? null, // eslint-disable-line no-underscore-dangle
        description: detail.description,
        observedAt,
    });

/** Stops on an empty or short page, or once the reported result size is covered. */
export const hasNextPage = (
    page: number,
    perPage: number,
    received: number,
    resultSize: number | undefined,
): boolean =>
    received === perPage && (resultSize === undefined || page * perPage < resultSize);

const getJson = async (url: string): Promise<unknown> => {
    const { body } = await gotScraping({
        url,
        responseType: 'json',
        headers: FETCH_HEADERS,
        timeout: { request: REQUEST_TIMEOUT_MS },
    });
    return body;
};

const fetchDetail = async (hashId: number): Promise<DetailResult> => {
    try {
        return parseDetail(await getJson(`${ESTATES_API}/${hashId}`));
    } catch (error) {
        log.warning(`${LOG_PREFIX} Failed to fetch detail for hashId ${hashId}`, { error: errorMessage(error) });
        return { description: null, area: null };
    }
};

const fetchPage = async (url: string): Promise<z.infer<typeof pageSchema>> => {
    let body: unknown;
    try {
        body = await getJson(url);
    } catch (error) {
        throw new FetchError(`${LOG_PREFIX} Request failed: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = pageSchema.safeParse(body);
    if (!parsed.success) {
        throw new FetchError(`${LOG_PREFIX} Malformed listing page: ${parsed.error.message}`);
    }
    return parsed.data;
};

/**
 * Walks the estates API page by page, one request at a time, and fetches every estate's
 * detail for its description and usable area. A failed page aborts the whole fetch so a
 * partial result never reaches change detection.
 */
export class SrealityFetcher implements ListingSource {
    constructor(private readonly input: Input) {
        const unknown = selectedRegions(input.regions).filter((region) => resolveRegionId(region) === undefined);
        if (unknown.length > 0) {
            log.warning(`${LOG_PREFIX} Ignoring unrecognised region names: ${unknown.join(', ')}`);
        }
    }

    async fetch(observedAt: string): Promise<Snapshot> {
        const listings = new Map<string, ListingRecord>();

        for (const category of this.input.categories) {
            for (const offerType of expandOfferTypes(this.input.offerType)) {
                await this.fetchTarget({ category, offerType }, observedAt, listings);
            }
        }

        log.info(`${LOG_PREFIX} Done. Fetched ${listings.size} listings.`);
        return listings;
    }

    private async fetchTarget(
        target: SearchTarget,
        observedAt: string,
        listings: Map<string, ListingRecord>,
    ): Promise<void> {
        const { perPage } = this.input;

        for (let page = 1; ; page++) {
            const url = buildSearchUrl(this.input, target, page);
            log.info(`${LOG_PREFIX} Fetching page ${page} (${target.category}/${target.offerType})`, { url });

            const data = await fetchPage(url);
            if (page === 1) {
                const total = data.result_size ?? 0;
                log.info(`${LOG_PREFIX} Total available: ${total} (${target.category}/${target.offerType})`);
            }

            const estates = data._embedded?.estates ?? []; // eslint-disable-line no-underscore-dangle
            for (const estate of estates) {
                const detail = await fetchDetail(estate.hash_id);
                const listing = toListingRecord(estate, target, detail, observedAt);
                listings.set(listing.id, listing);
            }

            if (!hasNextPage(page, perPage, estates.length, data.result_size)) return;
            await setTimeout(PAGE_DELAY_MS);
        }
    }
}
