import { defaultEquals, type ItemEquals } from './equality';
import { InvalidArgumentError } from './errors';
import type { PaginationEvent } from './events';
import type { PaginationState } from './state';
import type { PageFilters, PaginatedDataSource } from './types';

export interface PaginationTransition<T> {
    event: PaginationEvent<T>;
    previous: PaginationState<T>;
    next: PaginationState<T>;
}

export interface PaginatedStoreOptions<T> {
    source: PaginatedDataSource<T>;
    itemsPerPage?: number;
    /** Passed verbatim to every fetch. */
    filters?: PageFilters;
    /** Item equality for update/remove calls made without a matcher. */
    equals?: ItemEquals<T>;
    /** Logger tag. */
    name?: string;
    onTransition?: (transition: PaginationTransition<T>) => void;
}

export interface ResolvedPaginatedStoreOptions<T> extends PaginatedStoreOptions<T> {
    itemsPerPage: number;
    equals: ItemEquals<T>;
    name: string;
}

export const DEFAULT_PAGINATION_OPTIONS = {
    itemsPerPage: 10,
    name: 'paginated'
} as const;

export function resolveOptions<T>(options: PaginatedStoreOptions<T>): ResolvedPaginatedStoreOptions<T> {
    const opts = {
        ...options,
        itemsPerPage: options.itemsPerPage ?? DEFAULT_PAGINATION_OPTIONS.itemsPerPage,
        equals: options.equals ?? defaultEquals,
        name: options.name ?? DEFAULT_PAGINATION_OPTIONS.name
    };

    if (!Number.isInteger(opts.itemsPerPage) || opts.itemsPerPage < 1) {
        throw new InvalidArgumentError(`itemsPerPage must be a positive integer, got ${opts.itemsPerPage}`);
    }

    return opts;
}
