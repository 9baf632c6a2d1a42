import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { log } from 'apify';
import { gotScraping } from 'crawlee';

import { FETCH_HEADERS, IMAGES_FOLDER, REQUEST_TIMEOUT_MS } from './constants.js';

const LOG_PREFIX = '[images]';

export interface ImageResolver {
    /** Returns a path relative to the report directory, or null when there is no usable photo. */
    resolve(listingId: string, imageUrl: string | null): Promise<string | null>;
}

export const noImages: ImageResolver = {
    resolve: async () => null,
};

const exists = async (filePath: string): Promise<boolean> => {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
};

/** Downloads each listing's main photo once into `<outputDir>/property_images/<id>.jpg`. */
export class ImageCache implements ImageResolver {
    private readonly dir: string;

    constructor(outputDir: string) {
        this.dir = join(outputDir, IMAGES_FOLDER);
    }

    async resolve(listingId: string, imageUrl: string | null): Promise<string | null> {
        if (!imageUrl) return null;

        const fileName = `${listingId}.jpg`;
        const relativePath = `${IMAGES_FOLDER}/${fileName}`;
        const filePath = join(this.dir, fileName);
        if (await exists(filePath)) return relativePath;

        try {
            const { body } = await gotScraping({
                url: imageUrl,
                responseType: 'buffer',
                headers: { 'User-Agent': FETCH_HEADERS['User-Agent'] },
                timeout: { request: REQUEST_TIMEOUT_MS },
            });
            await mkdir(this.dir, { recursive: true });
            await writeFile(filePath, body);
            log.debug(`${LOG_PREFIX} Downloaded image for listing ${listingId}`);
            return relativePath;
        } catch (error) {
            log.warning(`${LOG_PREFIX} Failed to download image for listing ${listingId}`, { error });
            return null;
        }
    }
}
