import { getItemCount, isEmpty, type PaginationState } from './state';

export type ListBody = 'initial' | 'loading' | 'error' | 'empty' | 'items';
export type ListFooter = 'loadingMore' | 'loadMoreError' | 'end' | 'idle';

export interface ListView {
    body: ListBody;
    footer: ListFooter;
}

/**
 * Picks what a list should render for a snapshot. A first-page spinner or
 * error replaces the list only while there is nothing to show.
 */
export function resolveListView<T>(state: PaginationState<T>): ListView {
    return { body: resolveBody(state), footer: resolveFooter(state) };
}

function resolveBody<T>(state: PaginationState<T>): ListBody {
    const hasItems = getItemCount(state) > 0;
    if (state.status === 'firstPageLoading' && !hasItems) return 'loading';
    if (state.status === 'firstPageError' && !hasItems) return 'error';
    if (isEmpty(state)) return 'empty';
    if (state.status === 'initial') return 'initial';
    return 'items';
}

function resolveFooter<T>(state: PaginationState<T>): ListFooter {
    if (state.status === 'loadingMore') return 'loadingMore';
    if (state.status === 'loadMoreError') return 'loadMoreError';
    if (state.hasReachedMax) return 'end';
    return 'idle';
}
