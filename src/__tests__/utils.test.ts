import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { calcPricePerSqm, createListingRecord, writeFileAtomic } from '../utils.js';

describe('calcPricePerSqm', () => {
    it('should round the price per square metre', () => {
        expect(calcPricePerSqm(1_000_000, 75)).toBe(13_333);
    });

    it('should return null without a usable area', () => {
        expect(calcPricePerSqm(4_500_000, null)).toBeNull();
        expect(calcPricePerSqm(4_500_000, 0)).toBeNull();
    });

    it('should return null for a listing without a price', () => {
        expect(calcPricePerSqm(0, 75)).toBeNull();
    });
});

describe('createListingRecord', () => {
    it('should return a frozen copy', () => {
        const fields = {
            id: '42',
            name: 'Dům',
            price: 1_000,
            locality: 'Opava',
            area: null,
            url: 'https://www.sreality.cz/detail/prodej/dum/42',
            imageUrl: null,
            description: null,
            observedAt: '2024-03-01T08:00:00.000Z',
        };
        const record = createListingRecord(fields);

        expect(record).toEqual(fields);
        expect(record).not.toBe(fields);
        expect(Object.isFrozen(record)).toBe(true);
    });
});

describe('writeFileAtomic', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'sreality-utils-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should create missing directories and replace existing content', async () => {
        const filePath = join(dir, 'nested', 'page.html');

        await writeFileAtomic(filePath, 'first');
        await writeFileAtomic(filePath, 'druhý');

        expect(await readFile(filePath, 'utf8')).toBe('druhý');
        expect(await readdir(join(dir, 'nested'))).toEqual(['page.html']);
    });

    it('should leave the target untouched and drop the temp file when the rename fails', async () => {
        const target = join(dir, 'page.html');
        await mkdir(target);
        await writeFile(join(target, 'kept.txt'), 'old');

        await expect(writeFileAtomic(target, 'new')).rejects.toThrow();

        expect(await readdir(dir)).toEqual(['page.html']);
        expect(await readFile(join(target, 'kept.txt'), 'utf8')).toBe('old');
    });
});
