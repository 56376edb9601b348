import { InvalidArgumentError } from './errors';
import type { PageResult } from './types';

export type ResponseRecord = Readonly<Record<string, unknown>>;

export interface DecodePageResultOptions<T> {
    mapItem: (raw: unknown, index: number) => T;
    itemsKey?: string;
    hasMoreKey?: string;
    /** Metadata keys are only read when named. */
    currentPageKey?: string;
    totalPagesKey?: string;
    totalItemsKey?: string;
}

export interface EncodedPageResult<R> {
    data: R[];
    hasMore: boolean;
    currentPage?: number;
    totalPages?: number;
    totalItems?: number;
}

export function emptyPageResult<T>(): PageResult<T> {
    return { items: [], hasMore: false };
}

function readCount(record: ResponseRecord, key: string | undefined): number | undefined {
    if (key === undefined) return undefined;
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new InvalidArgumentError(`"${key}" must be a non-negative integer, got ${JSON.stringify(value)}`);
    }
    return value;
}

/**
 * Builds a page result from a plain response body.
 * @example
 * decodePageResult(body, { mapItem: toUser, itemsKey: 'users', totalItemsKey: 'total' });
 */
export function decodePageResult<T>(record: ResponseRecord, options: DecodePageResultOptions<T>): PageResult<T> {
    const itemsKey = options.itemsKey ?? 'data';
    const hasMoreKey = options.hasMoreKey ?? 'hasMore';

    const rawItems = record[itemsKey] ?? [];
    if (!Array.isArray(rawItems)) {
        throw new InvalidArgumentError(`"${itemsKey}" must be an array`);
    }

    const hasMore = record[hasMoreKey] ?? false;
    if (typeof hasMore !== 'boolean') {
        throw new InvalidArgumentError(`"${hasMoreKey}" must be a boolean`);
    }

    const result: PageResult<T> = {
        items: rawItems.map((raw: unknown, index) => options.mapItem(raw, index)),
        hasMore
    };

    const currentPage = readCount(record, options.currentPageKey);
    const totalPages = readCount(record, options.totalPagesKey);
    const totalItems = readCount(record, options.totalItemsKey);

    return {
        ...result,
        ...(currentPage !== undefined ? { currentPage } : {}),
        ...(totalPages !== undefined ? { totalPages } : {}),
        ...(totalItems !== undefined ? { totalItems } : {})
    };
}

export function encodePageResult<T, R>(result: PageResult<T>, mapItem: (item: T) => R): EncodedPageResult<R> {
    return {
        data: result.items.map((item) => mapItem(item)),
        hasMore: result.hasMore,
        ...(result.currentPage !== undefined ? { currentPage: result.currentPage } : {}),
        ...(result.totalPages !== undefined ? { totalPages: result.totalPages } : {}),
        ...(result.totalItems !== undefined ? { totalItems: result.totalItems } : {})
    };
}
