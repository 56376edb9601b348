import { InvalidArgumentError } from './errors';

export type UpdateMatcher<T> = (oldItem: T, newItem: T) => boolean;
export type RemoveMatcher<T> = (item: T) => boolean;

export interface LoadFirstPageEvent {
    readonly type: 'loadFirstPage';
}

/** Next page. Ignored while a page is loading or once the last page arrived. */
export interface LoadMoreEvent {
    readonly type: 'loadMore';
}

/** Refetches page 1 and keeps the current items visible until it lands. */
export interface RefreshEvent {
    readonly type: 'refresh';
}

export interface ResetEvent {
    readonly type: 'reset';
}

export interface UpdateItemEvent<T> {
    readonly type: 'updateItem';
    readonly item: T;
    readonly matcher?: UpdateMatcher<T>;
}

export interface RemoveItemEvent<T> {
    readonly type: 'removeItem';
    readonly item?: T;
    readonly matcher?: RemoveMatcher<T>;
}

export interface AddItemEvent<T> {
    readonly type: 'addItem';
    readonly item: T;
    readonly insertAtStart: boolean;
}

export type PaginationEvent<T> =
    | LoadFirstPageEvent
    | LoadMoreEvent
    | RefreshEvent
    | ResetEvent
    | UpdateItemEvent<T>
    | RemoveItemEvent<T>
    | AddItemEvent<T>;

export type PaginationEventType = PaginationEvent<unknown>['type'];

export interface RemoveItemOptions<T> {
    item?: T;
    matcher?: RemoveMatcher<T>;
}

export interface AddItemOptions {
    insertAtStart?: boolean;
}

export const loadFirstPage = (): LoadFirstPageEvent => ({ type: 'loadFirstPage' });
export const loadMore = (): LoadMoreEvent => ({ type: 'loadMore' });
export const refresh = (): RefreshEvent => ({ type: 'refresh' });
export const reset = (): ResetEvent => ({ type: 'reset' });

/**
 * @example
 * store.dispatch(updateItem(renamed, (old, next) => old.id === next.id));
 */
export function updateItem<T>(item: T, matcher?: UpdateMatcher<T>): UpdateItemEvent<T> {
    return matcher ? { type: 'updateItem', item, matcher } : { type: 'updateItem', item };
}

export function assertRemoveTarget<T>(target: RemoveItemOptions<T>): void {
    const hasItem = target.item !== undefined;
    const hasMatcher = target.matcher !== undefined;
    if (hasItem === hasMatcher) {
        throw new InvalidArgumentError(
            hasItem
                ? 'removeItem takes either an item or a matcher, not both'
                : 'removeItem needs an item or a matcher'
        );
    }
}

export function removeItem<T>(options: RemoveItemOptions<T>): RemoveItemEvent<T> {
    assertRemoveTarget(options);
    return { type: 'removeItem', ...options };
}

export function addItem<T>(item: T, options: AddItemOptions = {}): AddItemEvent<T> {
    return { type: 'addItem', item, insertAtStart: options.insertAtStart ?? false };
}

export function describeEvent<T>(event: PaginationEvent<T>): string {
    if (event.type === 'addItem') {
        return event.insertAtStart ? 'addItem(start)' : 'addItem(end)';
    }
    return event.type;
}
