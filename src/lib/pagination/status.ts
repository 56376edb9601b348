export const PAGINATION_STATUSES = [
    'initial',
    'firstPageLoading',
    'firstPageSuccess',
    'firstPageError',
    'loadingMore',
    'loadMoreSuccess',
    'loadMoreError',
    'refreshing',
    'refreshSuccess',
    'refreshError'
] as const;

export type PaginationStatus = typeof PAGINATION_STATUSES[number];

export const LOADING_STATUSES: ReadonlySet<PaginationStatus> = new Set([
    'firstPageLoading',
    'loadingMore',
    'refreshing'
]);

export const SUCCESS_STATUSES: ReadonlySet<PaginationStatus> = new Set([
    'firstPageSuccess',
    'loadMoreSuccess',
    'refreshSuccess'
]);

export const ERROR_STATUSES: ReadonlySet<PaginationStatus> = new Set([
    'firstPageError',
    'loadMoreError',
    'refreshError'
]);

export function isPaginationStatus(value: unknown): value is PaginationStatus {
    return PAGINATION_STATUSES.some((status) => status === value);
}
