/**
 * Data source contract for paginated stores.
 * A data source turns a page request into one page of items plus metadata.
 */

export type PageFilters = Readonly<Record<string, unknown>>;

export interface PageRequest {
    /** 1-based page number. */
    page: number;
    limit: number;
    filters?: PageFilters;
}

/**
 * One page of items returned by a data source.
 *
 * `hasMore` decides whether pagination continues. An empty `items` with
 * `hasMore: true` is accepted, but every load-more will then probe the next
 * page without the list growing.
 */
export interface PageResult<T> {
    items: readonly T[];
    hasMore: boolean;
    currentPage?: number;
    totalPages?: number;
    totalItems?: number;
}

/**
 * @example
 * const users: PaginatedDataSource<User> = {
 *     async fetchPage({ page, limit }) {
 *         const res = await api.listUsers({ skip: (page - 1) * limit, limit });
 *         return { items: res.users, hasMore: page * limit < res.total, totalItems: res.total };
 *     }
 * };
 */
export interface PaginatedDataSource<T> {
    fetchPage(request: PageRequest): Promise<PageResult<T>>;
}
