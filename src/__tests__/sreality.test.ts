import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FetchError } from '../errors.js';
import { parseInput } from '../input.js';
import {
    buildListingUrl,
    buildSearchUrl,
    expandOfferTypes,
    hasNextPage,
    parseArea,
    parseDetail,
    resolveRegionId,
    SrealityFetcher,
    toListingRecord,
} from '../scrapers/sreality.js';

const { gotScraping } = vi.hoisted(() => ({ gotScraping: vi.fn() }));

vi.mock('crawlee', () => ({ gotScraping }));
vi.mock('node:timers/promises', () => ({ setTimeout: vi.fn(async () => undefined) }));

const OBSERVED_AT = '2024-03-02T08:00:00.000Z';
const HOUSES_FOR_SALE = { category: 'domy', offerType: 'prodej' } as const;

describe('parseArea', () => {
    it('should return a number given a number', () => {
        expect(parseArea(288)).toBe(288);
    });

    it('should strip units from string like "288 m²"', () => {
        expect(parseArea('288 m²')).toBe(288);
    });

    it('should replace Czech decimal comma', () => {
        expect(parseArea('1,5')).toBe(1.5);
    });

    it('should return null for undefined', () => {
        expect(parseArea(undefined)).toBeNull();
    });

    it('should return null for non-numeric string', () => {
        expect(parseArea('bez ceny')).toBeNull();
    });
});

describe('parseDetail', () => {
    it('should take the description and the usable area but not the land area', () => {
        const detail = parseDetail({
            text: { value: 'Rodinný dům se zahradou' },
            items: [
                { name: 'Plocha pozemku', value: '900' },
                { name: 'Užitná plocha', value: '215' },
                { name: 'Stavba', value: 'Cihlová' },
            ],
        });

        expect(detail).toEqual({ description: 'Rodinný dům se zahradou', area: 215 });
    });

    it('should skip items it cannot read', () => {
        const detail = parseDetail({
            items: [null, { name: 'Užitná plocha', value: [] }, { name: 'Užitná plocha', value: 120 }],
        });

        expect(detail).toEqual({ description: null, area: 120 });
    });

    it('should return nulls for an unexpected body', () => {
        expect(parseDetail('<html>')).toEqual({ description: null, area: null });
    });
});

describe('expandOfferTypes', () => {
    it("should expand 'vse' to both offer types", () => {
        expect(expandOfferTypes('vse')).toEqual(['prodej', 'pronajem']);
    });

    it('should wrap a single offer type in an array', () => {
        expect(expandOfferTypes('pronajem')).toEqual(['pronajem']);
    });
});

describe('resolveRegionId', () => {
    it('should accept the bare region name', () => {
        expect(resolveRegionId('Praha')).toBe(10);
    });

    it('should accept the "kraj" forms of a region name', () => {
        expect(resolveRegionId('Jihočeský kraj')).toBe(31);
        expect(resolveRegionId('Kraj Vysočina')).toBe(63);
    });

    it('should not resolve unknown names or object keys', () => {
        expect(resolveRegionId('Atlantida')).toBeUndefined();
        expect(resolveRegionId('constructor')).toBeUndefined();
    });
});

describe('buildSearchUrl', () => {
    it('should encode category, offer type and paging', () => {
        const url = buildSearchUrl(parseInput({}), HOUSES_FOR_SALE, 1);

        expect(url).toBe(
            'https://www.sreality.cz/api/cs/v2/estates?category_main_cb=2&per_page=60&page=1&category_type_cb=1',
        );
    });

    it('should add price, area, region and district filters', () => {
        const input = parseInput({
            maxPrice: 21_623_887,
            minPrice: 4_948_302,
            minArea: 200,
            regions: ['Moravskoslezský kraj', 'Atlantida'],
            districtIds: [65, 64],
        });
        const params = new URL(buildSearchUrl(input, { category: 'byty', offerType: 'pronajem' }, 3)).searchParams;

        expect(params.get('category_main_cb')).toBe('1');
        expect(params.get('category_type_cb')).toBe('2');
        expect(params.get('page')).toBe('3');
        expect(params.get('czk_price_summary_order2')).toBe('4948302|21623887');
        expect(params.get('usable_area')).toBe('200|1000000');
        expect(params.getAll('locality_region_id')).toEqual(['80']);
        expect(params.getAll('locality_district_id')).toEqual(['65', '64']);
    });
});

describe('buildListingUrl', () => {
    it('should include the seo locality when present', () => {
        expect(buildListingUrl(HOUSES_FOR_SALE, { hash_id: 123, seo: { locality: 'ostrava-poruba' } })).toBe(
            'https://www.sreality.cz/detail/prodej/dum/ostrava-poruba/123',
        );
    });

    it('should skip a missing seo locality', () => {
        expect(buildListingUrl(HOUSES_FOR_SALE, { hash_id: 123 })).toBe(
            'https://www.sreality.cz/detail/prodej/dum/123',
        );
    });
});

describe('toListingRecord', () => {
    it('should map an estate to a frozen record', () => {
        const record = toListingRecord(
            {
                hash_id: 2887361100,
                name: 'Prodej rodinného domu 215 m²',
                price: 12_990_000,
                locality: 'Ostrava - Poruba',
                _links: {
                    images: [
                        { href: 'https://d18-a.sdn.cz/photo-1.jpeg' },
                        { href: 'https://d18-a.sdn.cz/photo-2.jpeg' },
                    ],
                },
            },
            HOUSES_FOR_SALE,
            { description: 'Dům', area: 215 },
            OBSERVED_AT,
        );

        expect(record).toEqual({
            id: '2887361100',
            name: 'Prodej rodinného domu 215 m²',
            price: 12_990_000,
            locality: 'Ostrava - Poruba',
            area: 215,
            url: 'https://www.sreality.cz/detail/prodej/dum/2887361100',
            imageUrl: 'https://d18-a.sdn.cz/photo-1.jpeg',
            description: 'Dům',
            observedAt: OBSERVED_AT,
        });
        expect(Object.isFrozen(record)).toBe(true);
    });

    it('should fall back to placeholders and a zero price', () => {
        const record = toListingRecord({ hash_id: 7 }, HOUSES_FOR_SALE, { description: null, area: null }, OBSERVED_AT);

        expect(record).toMatchObject({ name: 'N/A', locality: 'N/A', price: 0, imageUrl: null });
    });
});

describe('hasNextPage', () => {
    it('should continue after a full page below the result size', () => {
        expect(hasNextPage(1, 60, 60, 150)).toBe(true);
    });

    it('should stop after a short page', () => {
        expect(hasNextPage(3, 60, 30, 150)).toBe(false);
    });

    it('should stop when the result size is covered', () => {
        expect(hasNextPage(2, 60, 60, 120)).toBe(false);
    });

    it('should stop after an empty page', () => {
        expect(hasNextPage(1, 60, 0, undefined)).toBe(false);
    });
});

describe('SrealityFetcher', () => {
    const estate = (hashId: number, price: number) => ({
        hash_id: hashId,
        name: `Dům ${hashId}`,
        price,
        locality: 'Opava',
    });

    const pages: Record<string, unknown> = {
        '1': { result_size: 3, _embedded: { estates: [estate(1, 100), estate(2, 200)] } },
        '2': { result_size: 3, _embedded: { estates: [estate(3, 300)] } },
    };

    beforeEach(() => {
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        gotScraping.mockReset();
    });

    it('should walk every page and enrich estates from their detail', async () => {
        gotScraping.mockImplementation(async ({ url }: { url: string }) => {
            const parsed = new URL(url);
            if (parsed.pathname.endsWith('/estates')) return { body: pages[parsed.searchParams.get('page') ?? ''] };
            if (parsed.pathname.endsWith('/1')) return { body: { text: { value: 'Popis' }, items: [] } };
            throw new Error('detail unavailable');
        });

        const snapshot = await new SrealityFetcher(parseInput({ perPage: 2 })).fetch(OBSERVED_AT);

        expect([...snapshot.keys()]).toEqual(['1', '2', '3']);
        expect(snapshot.get('1')?.description).toBe('Popis');
        expect(snapshot.get('2')?.description).toBeNull();
        expect(snapshot.get('3')?.observedAt).toBe(OBSERVED_AT);
        expect(log.warning).toHaveBeenCalledTimes(2);
    });

    it('should warn once about region names it cannot resolve', () => {
        new SrealityFetcher(parseInput({ regions: ['vse', 'Praha', 'Atlantida', 'Mars'] }));

        expect(log.warning).toHaveBeenCalledTimes(1);
        expect(log.warning).toHaveBeenCalledWith('[sreality] Ignoring unrecognised region names: Atlantida, Mars');
    });

    it('should fail the whole fetch when a page request fails', async () => {
        gotScraping.mockRejectedValue(new Error('ECONNRESET'));

        await expect(new SrealityFetcher(parseInput({})).fetch(OBSERVED_AT)).rejects.toBeInstanceOf(FetchError);
    });

    it('should fail the whole fetch on a malformed page', async () => {
        gotScraping.mockResolvedValue({ body: { _embedded: { estates: [{ name: 'no id' }] } } });

        await expect(new SrealityFetcher(parseInput({})).fetch(OBSERVED_AT)).rejects.toThrow('Malformed listing page');
    });
});
