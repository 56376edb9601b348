import { defaultEquals, itemsEqual, type ItemEquals } from './equality';
import {
    ERROR_STATUSES,
    LOADING_STATUSES,
    SUCCESS_STATUSES,
    type PaginationStatus
} from './status';

/**
 * Immutable snapshot owned by a paginated store.
 * `itemsList` is null until a page has been loaded; use `getItems` for a list
 * that is always defined.
 */
export interface PaginationState<T> {
    readonly status: PaginationStatus;
    readonly itemsList: readonly T[] | null;
    readonly currentPage: number;
    readonly hasReachedMax: boolean;
    readonly isFirstLoad: boolean;
    readonly error: string | null;
    readonly totalItems: number | null;
    readonly totalPages: number | null;
}

export type PaginationStatePatch<T> = Partial<PaginationState<T>>;

const EMPTY: readonly never[] = Object.freeze([]);

function freezeState<T>(state: PaginationState<T>): PaginationState<T> {
    if (state.itemsList !== null && !Object.isFrozen(state.itemsList)) {
        return Object.freeze({ ...state, itemsList: Object.freeze([...state.itemsList]) });
    }
    return Object.freeze(state);
}

export function createInitialState<T>(): PaginationState<T> {
    return freezeState<T>({
        status: 'initial',
        itemsList: null,
        currentPage: 0,
        hasReachedMax: false,
        isFirstLoad: true,
        error: null,
        totalItems: null,
        totalPages: null
    });
}

/**
 * Returns a new snapshot with the given fields replaced. Unlike a null-coalescing
 * copy, an explicit `null` in the patch clears the field.
 */
export function patchState<T>(state: PaginationState<T>, patch: PaginationStatePatch<T>): PaginationState<T> {
    return freezeState({ ...state, ...patch });
}

export function getItems<T>(state: PaginationState<T>): readonly T[] {
    return state.itemsList ?? EMPTY;
}

export function getItemCount<T>(state: PaginationState<T>): number {
    return getItems(state).length;
}

export const isInitial = <T>(s: PaginationState<T>): boolean => s.status === 'initial';
export const isFirstPageLoading = <T>(s: PaginationState<T>): boolean => s.status === 'firstPageLoading';
export const isLoadingMore = <T>(s: PaginationState<T>): boolean => s.status === 'loadingMore';
export const isRefreshing = <T>(s: PaginationState<T>): boolean => s.status === 'refreshing';
export const isLoading = <T>(s: PaginationState<T>): boolean => LOADING_STATUSES.has(s.status);
export const isSuccess = <T>(s: PaginationState<T>): boolean => SUCCESS_STATUSES.has(s.status);
export const hasError = <T>(s: PaginationState<T>): boolean => ERROR_STATUSES.has(s.status);
export const hasFirstPageError = <T>(s: PaginationState<T>): boolean => s.status === 'firstPageError';
export const hasLoadMoreError = <T>(s: PaginationState<T>): boolean => s.status === 'loadMoreError';
export const hasRefreshError = <T>(s: PaginationState<T>): boolean => s.status === 'refreshError';

/** True once something was loaded and nothing came back. */
export function isEmpty<T>(state: PaginationState<T>): boolean {
    return getItemCount(state) === 0 && !isFirstPageLoading(state) && !isInitial(state);
}

/** Fraction of `totalItems` loaded so far, or undefined when the total is unknown. */
export function getLoadProgress<T>(state: PaginationState<T>): number | undefined {
    if (!state.totalItems) return undefined;
    return getItemCount(state) / state.totalItems;
}

export function statesEqual<T>(
    a: PaginationState<T>,
    b: PaginationState<T>,
    equals: ItemEquals<T> = defaultEquals
): boolean {
    if (a === b) return true;
    return a.status === b.status
        && a.currentPage === b.currentPage
        && a.hasReachedMax === b.hasReachedMax
        && a.isFirstLoad === b.isFirstLoad
        && a.error === b.error
        && a.totalItems === b.totalItems
        && a.totalPages === b.totalPages
        && itemsEqual(a.itemsList, b.itemsList, equals);
}

export function describeState<T>(state: PaginationState<T>): string {
    return `PaginationState(status: ${state.status}, items: ${getItemCount(state)}, `
        + `page: ${state.currentPage}, hasReachedMax: ${state.hasReachedMax}, error: ${state.error})`;
}
