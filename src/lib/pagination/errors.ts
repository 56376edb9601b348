export const DEFAULT_FETCH_ERROR = 'Failed to load data';

/** Thrown for calls that can never succeed, such as a removeItem with nothing to match. */
export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

export class StoreClosedError extends Error {
    constructor(storeName: string) {
        super(`Cannot dispatch to "${storeName}" after it was closed`);
        this.name = 'StoreClosedError';
    }
}

function extractDetail(err: object): string | null {
    if ('detail' in err && typeof err.detail === 'string') {
        return err.detail;
    }
    return null;
}

function stringify(err: object): string | null {
    try {
        const json = JSON.stringify(err);
        return json && json !== '{}' ? json : null;
    } catch {
        // circular or BigInt-holding values
        return null;
    }
}

/**
 * Turns whatever a data source rejected with into a display string.
 */
export function getErrorMessage(err: unknown, fallback = DEFAULT_FETCH_ERROR): string {
    if (!err) return fallback;

    if (err instanceof Error) return err.message || fallback;
    if (typeof err === 'string') return err;

    if (typeof err === 'object') {
        const detail = extractDetail(err);
        if (detail) return detail;
        if ('message' in err && err.message != null) {
            return String(err.message);
        }
        return stringify(err) ?? fallback;
    }

    return String(err);
}
