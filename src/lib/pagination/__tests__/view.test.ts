import { describe, it, expect } from 'vitest';
import { resolveListView } from '../view';
import { createInitialState, patchState, type PaginationState } from '../state';

const state = (patch: Partial<PaginationState<string>>): PaginationState<string> =>
    patchState(createInitialState<string>(), patch);

describe('resolveListView', () => {
    it.each([
        ['initial', {}, 'initial', 'idle'],
        ['first load', { status: 'firstPageLoading' }, 'loading', 'idle'],
        ['reload over items', { status: 'firstPageLoading', itemsList: ['a'] }, 'items', 'idle'],
        ['first page error', { status: 'firstPageError', error: 'boom' }, 'error', 'idle'],
        ['first page error over items', { status: 'firstPageError', itemsList: ['a'] }, 'items', 'idle'],
        ['empty result', { status: 'firstPageSuccess', itemsList: [], hasReachedMax: true }, 'empty', 'end'],
        ['more pages', { status: 'firstPageSuccess', itemsList: ['a'] }, 'items', 'idle'],
        ['loading more', { status: 'loadingMore', itemsList: ['a'] }, 'items', 'loadingMore'],
        ['load more failed', { status: 'loadMoreError', itemsList: ['a'] }, 'items', 'loadMoreError'],
        ['last page', { status: 'loadMoreSuccess', itemsList: ['a', 'b'], hasReachedMax: true }, 'items', 'end'],
        ['refreshing', { status: 'refreshing', itemsList: ['a'] }, 'items', 'idle']
    ] as const)('%s → body=%s footer=%s', (_label, patch, body, footer) => {
        expect(resolveListView(state(patch))).toEqual({ body, footer });
    });
});
