export type Category = 'domy' | 'byty' | 'pozemky';
export type OfferType = 'prodej' | 'pronajem' | 'vse';
export type RunMode = 'once' | 'continuous';

export interface PublishInput {
    enabled: boolean;
    repoPath: string | null;
}

export interface Input {
    categories: Category[];
    offerType: OfferType;
    regions: string[];
    districtIds: number[];
    minPrice: number | null; // null = no limit
    maxPrice: number | null; // null = no limit
    minArea: number | null; // null = no limit
    perPage: number;
    dataDir: string;
    outputDir: string;
    runMode: RunMode;
    intervalHours: number;
    retryCooldownMinutes: number;
    downloadImages: boolean;
    timeZone: string;
    publish: PublishInput;
}

export interface ListingRecord {
    readonly id: string; // sreality hash_id
    readonly name: string;
    readonly price: number; // CZK, 0 when the portal hides it
    readonly locality: string;
    readonly area: number | null; // m²
    readonly url: string;
    readonly imageUrl: string | null;
    readonly description: string | null;
    readonly observedAt: string; // ISO date
}

export type Snapshot = ReadonlyMap<string, ListingRecord>;

export type History = ReadonlyMap<string, readonly ListingRecord[]>;

export interface TrackerState {
    snapshot: Snapshot;
    history: History;
}

export interface PriceChange {
    id: string;
    previous: ListingRecord;
    current: ListingRecord;
    oldPrice: number;
    newPrice: number;
    delta: number; // newPrice - oldPrice
}

export interface RemovedListing {
    id: string;
    record: ListingRecord;
    lastSeen: string;
}

export interface DiffResult {
    newListings: ListingRecord[];
    priceChanges: PriceChange[];
    removed: RemovedListing[];
    unchanged: string[];
}

export type DetectionOutcome =
    | { status: 'detected'; diff: DiffResult; history: History; snapshot: Snapshot }
    | { status: 'empty-fetch' };

export interface DiffSummary {
    newListings: number;
    priceDrops: number;
    priceIncreases: number;
    removed: number;
    unchanged: number;
}

export interface ListingSource {
    /** Fetches every listing matching the search; each record is stamped with `observedAt`. */
    fetch(observedAt: string): Promise<Snapshot>;
}
