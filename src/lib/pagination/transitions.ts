/**
 * Pure state transitions for a paginated list.
 * Each function takes a snapshot and returns the next one; none of them fetch.
 */

import { defaultEquals, type ItemEquals } from './equality';
import { assertRemoveTarget, type RemoveItemEvent, type UpdateItemEvent } from './events';
import { createInitialState, getItems, patchState, type PaginationState } from './state';
import type { PageResult } from './types';

export type PageLoadKind = 'firstPage' | 'loadMore' | 'refresh';

export function startFirstPage<T>(state: PaginationState<T>): PaginationState<T> {
    return patchState(state, { status: 'firstPageLoading', error: null });
}

export function startLoadMore<T>(state: PaginationState<T>): PaginationState<T> {
    return patchState(state, { status: 'loadingMore' });
}

export function startRefresh<T>(state: PaginationState<T>): PaginationState<T> {
    return patchState(state, { status: 'refreshing', error: null });
}

/** Load-more is only worth a fetch while more pages exist and none is in flight. */
export function canLoadMore<T>(state: PaginationState<T>): boolean {
    return !state.hasReachedMax && state.status !== 'loadingMore';
}

function totalsFrom<T>(state: PaginationState<T>, result: PageResult<T>) {
    return {
        totalItems: result.totalItems ?? state.totalItems,
        totalPages: result.totalPages ?? state.totalPages
    };
}

export function completeFirstPage<T>(state: PaginationState<T>, result: PageResult<T>): PaginationState<T> {
    return patchState(state, {
        status: 'firstPageSuccess',
        itemsList: result.items,
        currentPage: 1,
        hasReachedMax: !result.hasMore,
        isFirstLoad: false,
        error: null,
        ...totalsFrom(state, result)
    });
}

export function completeLoadMore<T>(
    state: PaginationState<T>,
    result: PageResult<T>,
    page: number
): PaginationState<T> {
    return patchState(state, {
        status: 'loadMoreSuccess',
        itemsList: [...getItems(state), ...result.items],
        currentPage: page,
        hasReachedMax: !result.hasMore,
        error: null,
        ...totalsFrom(state, result)
    });
}

export function completeRefresh<T>(state: PaginationState<T>, result: PageResult<T>): PaginationState<T> {
    return patchState(state, {
        status: 'refreshSuccess',
        itemsList: result.items,
        currentPage: 1,
        hasReachedMax: !result.hasMore,
        error: null,
        ...totalsFrom(state, result)
    });
}

const FAILURE_STATUS = {
    firstPage: 'firstPageError',
    loadMore: 'loadMoreError',
    refresh: 'refreshError'
} as const;

/** Records a failed fetch; items, page and hasReachedMax are left as they were. */
export function failPageLoad<T>(state: PaginationState<T>, kind: PageLoadKind, message: string): PaginationState<T> {
    return patchState(state, { status: FAILURE_STATUS[kind], error: message });
}

export function resetState<T>(): PaginationState<T> {
    return createInitialState<T>();
}

export function applyUpdateItem<T>(
    state: PaginationState<T>,
    event: UpdateItemEvent<T>,
    equals: ItemEquals<T> = defaultEquals
): PaginationState<T> {
    if (state.itemsList === null) return state;
    const { item: updated, matcher } = event;
    const isMatch = matcher ?? equals;
    return patchState(state, {
        itemsList: state.itemsList.map((old) => (isMatch(old, updated) ? updated : old))
    });
}

/**
 * Drops every matching item. A known `totalItems` goes down by one whatever
 * the number of matches.
 */
export function applyRemoveItem<T>(
    state: PaginationState<T>,
    event: RemoveItemEvent<T>,
    equals: ItemEquals<T> = defaultEquals
): PaginationState<T> {
    assertRemoveTarget(event);
    const { item, matcher } = event;
    const isMatch: (candidate: T) => boolean = matcher
        ?? ((candidate) => item !== undefined && equals(candidate, item));

    return patchState(state, {
        itemsList: state.itemsList === null ? null : state.itemsList.filter((candidate) => !isMatch(candidate)),
        totalItems: state.totalItems === null ? null : state.totalItems - 1
    });
}

export function applyAddItem<T>(state: PaginationState<T>, item: T, insertAtStart: boolean): PaginationState<T> {
    const items = getItems(state);
    return patchState(state, {
        itemsList: insertAtStart ? [item, ...items] : [...items, item],
        totalItems: state.totalItems === null ? null : state.totalItems + 1
    });
}
