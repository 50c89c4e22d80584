/**
 * Thrown when a read-write open finds the location locked by a live process.
 */
export class StoreLockedError extends Error {
    readonly holderPid: number | null;

    constructor(location: string, holderPid: number | null) {
        super(
            holderPid === null
                ? `Store at ${location} is locked`
                : `Store at ${location} is locked by process ${holderPid}`
        );
        this.name = 'StoreLockedError';
        this.holderPid = holderPid;
    }
}

/**
 * Thrown when the store location is missing or cannot be opened.
 */
export class StoreOpenError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreOpenError';
    }
}

/**
 * Thrown when the bootstrap ontology cannot be parsed or loaded.
 */
export class StoreInitError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreInitError';
    }
}
