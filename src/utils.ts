import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ListingRecord } from './types.js';

/** Rounded CZK per m², or null when the listing has no price (stored as 0) or no usable area. */
export const calcPricePerSqm = (price: number, area: number | null): number | null =>
    price > 0 && area !== null && area > 0 ? Math.round(price / area) : null;

export const createListingRecord = (fields: ListingRecord): ListingRecord => Object.freeze({ ...fields });

/**
 * Writes `content` next to `filePath` and renames it into place, so readers only ever see the
 * old file or the complete new one.
 */
export const writeFileAtomic = async (filePath: string, content: string): Promise<void> => {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await mkdir(dirname(filePath), { recursive: true });
    try {
        await writeFile(tmpPath, content, 'utf8');
        await rename(tmpPath, filePath);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
};
