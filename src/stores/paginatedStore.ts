import { writable, derived, get, type Readable } from 'svelte/store';
import { logger } from '$lib/logger';
import { resolveOptions, type PaginatedStoreOptions } from '$lib/pagination/config';
import { getErrorMessage, StoreClosedError } from '$lib/pagination/errors';
import {
    addItem,
    describeEvent,
    loadFirstPage,
    loadMore,
    refresh,
    removeItem,
    reset,
    updateItem,
    type AddItemOptions,
    type PaginationEvent,
    type RemoveItemOptions,
    type UpdateMatcher
} from '$lib/pagination/events';
import { EventQueue } from '$lib/pagination/eventQueue';
import {
    createInitialState,
    describeState,
    getItems,
    getLoadProgress,
    isEmpty,
    statesEqual,
    type PaginationState
} from '$lib/pagination/state';
import type { PaginationStatus } from '$lib/pagination/status';
import {
    applyAddItem,
    applyRemoveItem,
    applyUpdateItem,
    canLoadMore,
    completeFirstPage,
    completeLoadMore,
    completeRefresh,
    failPageLoad,
    resetState,
    startFirstPage,
    startLoadMore,
    startRefresh,
    type PageLoadKind
} from '$lib/pagination/transitions';
import type { PageRequest, PageResult } from '$lib/pagination/types';

export interface PaginatedStore<T> extends Readable<PaginationState<T>> {
    /** Queues an event; resolves once its handler, fetch included, has finished. */
    dispatch(event: PaginationEvent<T>): Promise<void>;
    loadFirstPage(): Promise<void>;
    loadMore(): Promise<void>;
    refresh(): Promise<void>;
    reset(): Promise<void>;
    updateItem(item: T, matcher?: UpdateMatcher<T>): Promise<void>;
    /** Rejects with `InvalidArgumentError` unless exactly one of `item` or `matcher` is given. */
    removeItem(options: RemoveItemOptions<T>): Promise<void>;
    addItem(item: T, options?: AddItemOptions): Promise<void>;
    getState(): PaginationState<T>;
    /** Resolves when every event dispatched so far has been handled. */
    idle(): Promise<void>;
    close(): Promise<void>;
    readonly isClosed: boolean;

    readonly items: Readable<readonly T[]>;
    readonly status: Readable<PaginationStatus>;
    readonly error: Readable<string | null>;
    readonly hasReachedMax: Readable<boolean>;
    readonly isEmpty: Readable<boolean>;
    readonly loadProgress: Readable<number | undefined>;
}

/**
 * Creates a store that pages through a data source one event at a time.
 * @example
 * const users = createPaginatedStore({ source: usersSource, itemsPerPage: 20, filters: { status: 'active' } });
 * await users.loadFirstPage();
 * await users.loadMore();
 * users.updateItem(renamed, (old, next) => old.id === next.id);
 */
export function createPaginatedStore<T>(options: PaginatedStoreOptions<T>): PaginatedStore<T> {
    const opts = resolveOptions(options);
    const log = logger.withTag(opts.name);
    const queue = new EventQueue();
    const state = writable<PaginationState<T>>(createInitialState<T>());
    let closed = false;

    function current(): PaginationState<T> {
        return get(state);
    }

    function emit(event: PaginationEvent<T>, next: PaginationState<T>): void {
        const previous = current();
        // Items compare by reference: an Equatable match must not hide a replacement.
        if (statesEqual(previous, next, Object.is)) return;
        state.set(next);
        log.debug(`${describeEvent(event)}: ${describeState(next)}`);
        opts.onTransition?.({ event, previous, next });
    }

    function request(page: number): PageRequest {
        return opts.filters === undefined
            ? { page, limit: opts.itemsPerPage }
            : { page, limit: opts.itemsPerPage, filters: opts.filters };
    }

    async function fetchPage(
        event: PaginationEvent<T>,
        kind: PageLoadKind,
        page: number
    ): Promise<PageResult<T> | null> {
        try {
            return await opts.source.fetchPage(request(page));
        } catch (err) {
            const message = getErrorMessage(err);
            log.warn(`Failed to fetch page ${page} (${kind}):`, err);
            emit(event, failPageLoad(current(), kind, message));
            return null;
        }
    }

    async function onLoadFirstPage(event: PaginationEvent<T>): Promise<void> {
        emit(event, startFirstPage(current()));
        const result = await fetchPage(event, 'firstPage', 1);
        if (result) emit(event, completeFirstPage(current(), result));
    }

    async function onLoadMore(event: PaginationEvent<T>): Promise<void> {
        if (!canLoadMore(current())) return;
        emit(event, startLoadMore(current()));
        const nextPage = current().currentPage + 1;
        const result = await fetchPage(event, 'loadMore', nextPage);
        if (result) emit(event, completeLoadMore(current(), result, nextPage));
    }

    async function onRefresh(event: PaginationEvent<T>): Promise<void> {
        emit(event, startRefresh(current()));
        const result = await fetchPage(event, 'refresh', 1);
        if (result) emit(event, completeRefresh(current(), result));
    }

    async function handle(event: PaginationEvent<T>): Promise<void> {
        switch (event.type) {
            case 'loadFirstPage':
                return onLoadFirstPage(event);
            case 'loadMore':
                return onLoadMore(event);
            case 'refresh':
                return onRefresh(event);
            case 'reset':
                return emit(event, resetState<T>());
            case 'updateItem':
                return emit(event, applyUpdateItem(current(), event, opts.equals));
            case 'removeItem':
                return emit(event, applyRemoveItem(current(), event, opts.equals));
            case 'addItem':
                return emit(event, applyAddItem(current(), event.item, event.insertAtStart));
            default: {
                const unhandled: never = event;
                throw new Error(`Unhandled pagination event: ${JSON.stringify(unhandled)}`);
            }
        }
    }

    function dispatch(event: PaginationEvent<T>): Promise<void> {
        if (closed) {
            return Promise.reject(new StoreClosedError(opts.name));
        }
        return queue.enqueue(async () => {
            try {
                await handle(event);
            } catch (err) {
                log.error(`${describeEvent(event)} failed:`, err);
                throw err;
            }
        });
    }

    const items = derived(state, (s) => getItems(s));

    return {
        subscribe: state.subscribe,
        dispatch,
        loadFirstPage: () => dispatch(loadFirstPage()),
        loadMore: () => dispatch(loadMore()),
        refresh: () => dispatch(refresh()),
        reset: () => dispatch(reset()),
        updateItem: (item, matcher) => dispatch(updateItem(item, matcher)),
        removeItem: async (target) => dispatch(removeItem(target)),
        addItem: (item, addOptions) => dispatch(addItem(item, addOptions)),
        getState: current,
        idle: () => queue.drain(),
        async close() {
            closed = true;
            await queue.drain();
            log.debug('closed');
        },
        get isClosed() {
            return closed;
        },

        items,
        status: derived(state, (s) => s.status),
        error: derived(state, (s) => s.error),
        hasReachedMax: derived(state, (s) => s.hasReachedMax),
        isEmpty: derived(state, (s) => isEmpty(s)),
        loadProgress: derived(state, (s) => getLoadProgress(s))
    };
}
