import type { Input } from './types.js';

export const PAGE_DELAY_MS = 1000;
export const REQUEST_TIMEOUT_MS = 10_000;

// Node clamps any timer above 2^31 - 1 ms to 1 ms.
const MAX_TIMER_MS = 2 ** 31 - 1;
export const MAX_INTERVAL_HOURS = Math.floor(MAX_TIMER_MS / 3_600_000);
export const MAX_COOLDOWN_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

export const INPUT_DEFAULTS: Omit<Input, 'publish'> = {
    categories: ['domy'],
    offerType: 'prodej',
    regions: [],
    districtIds: [],
    minPrice: null,
    maxPrice: null,
    minArea: null,
    perPage: 60,
    dataDir: './data',
    outputDir: './reports',
    runMode: 'continuous',
    intervalHours: 6,
    retryCooldownMinutes: 5,
    downloadImages: true,
    timeZone: 'Europe/Prague',
};

export const STATE_FILES = {
    snapshot: 'sreality_data.json',
    history: 'sreality_history.json',
};

export const REPORT_FILES = {
    alerts: 'sreality_alerts.html',
    catalog: 'sreality_all_properties.html',
    removed: 'sreality_removed_properties.html',
    history: 'sreality_property_history.html',
};

export const IMAGES_FOLDER = 'property_images';

export const FETCH_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
    Accept: 'application/json',
    Referer: 'https://www.sreality.cz/',
};
