export class TrackerError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The listing source was unreachable or answered with something we cannot read. */
export class FetchError extends TrackerError {}

/**
 * A fetch that yields zero listings. Treated as a transient failure rather than
 * "everything was sold", so the cycle stops before touching stored state.
 */
export class EmptyFetchError extends TrackerError {
    constructor() {
        super('Fetch returned no listings, keeping the previous snapshot and history');
    }
}

export class PersistenceError extends TrackerError {}

export class RenderError extends TrackerError {
    constructor(
        readonly report: string,
        options?: ErrorOptions,
    ) {
        super(`Failed to render ${report} report`, options);
    }
}

export class ConfigurationError extends TrackerError {}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
