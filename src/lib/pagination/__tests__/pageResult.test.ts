import { describe, it, expect } from 'vitest';
import { decodePageResult, emptyPageResult, encodePageResult } from '../pageResult';
import { InvalidArgumentError } from '../errors';
import type { TestItem } from '$test/test-utils';

function toTestItem(raw: unknown): TestItem {
    if (typeof raw !== 'object' || raw === null || !('id' in raw) || !('name' in raw)) {
        throw new Error('not an item');
    }
    return { id: Number(raw.id), name: String(raw.name) };
}

describe('emptyPageResult', () => {
    it('has no items and no more pages', () => {
        expect(emptyPageResult()).toEqual({ items: [], hasMore: false });
    });
});

describe('decodePageResult', () => {
    it('reads items and hasMore from the default keys', () => {
        const result = decodePageResult(
            { data: [{ id: 1, name: 'a' }, { id: 2, name: 'b' }], hasMore: true },
            { mapItem: toTestItem }
        );
        expect(result).toEqual({ items: [{ id: 1, name: 'a' }, { id: 2, name: 'b' }], hasMore: true });
    });

    it('reads custom keys and named metadata only', () => {
        const record = { users: [{ id: 7, name: 'x' }], next: false, page: 3, pages: 3, total: 21 };
        const result = decodePageResult(record, {
            mapItem: toTestItem,
            itemsKey: 'users',
            hasMoreKey: 'next',
            totalItemsKey: 'total'
        });
        expect(result).toEqual({ items: [{ id: 7, name: 'x' }], hasMore: false, totalItems: 21 });
    });

    it('reads every metadata key when named', () => {
        const result = decodePageResult(
            { data: [], hasMore: false, page: 2, pages: 5, total: 48 },
            { mapItem: toTestItem, currentPageKey: 'page', totalPagesKey: 'pages', totalItemsKey: 'total' }
        );
        expect(result).toEqual({ items: [], hasMore: false, currentPage: 2, totalPages: 5, totalItems: 48 });
    });

    it('defaults a missing list and flag', () => {
        expect(decodePageResult({}, { mapItem: toTestItem })).toEqual({ items: [], hasMore: false });
    });

    it('treats null metadata as unknown', () => {
        const result = decodePageResult({ data: [], total: null }, { mapItem: toTestItem, totalItemsKey: 'total' });
        expect(result).not.toHaveProperty('totalItems');
    });

    it('passes the index to mapItem', () => {
        const result = decodePageResult({ data: ['x', 'y'] }, { mapItem: (raw, index) => `${index}:${String(raw)}` });
        expect(result.items).toEqual(['0:x', '1:y']);
    });

    it.each([
        [{ data: 'nope' }, '"data" must be an array'],
        [{ data: [], hasMore: 'yes' }, '"hasMore" must be a boolean'],
        [{ data: [], total: -1 }, '"total" must be a non-negative integer, got -1'],
        [{ data: [], total: '12' }, '"total" must be a non-negative integer, got "12"']
    ])('rejects %j', (record, message) => {
        expect(() => decodePageResult(record, { mapItem: toTestItem, totalItemsKey: 'total' })).toThrow(
            new InvalidArgumentError(message)
        );
    });
});

describe('encodePageResult', () => {
    it('writes the default keys and omits unknown metadata', () => {
        const encoded = encodePageResult({ items: [{ id: 1, name: 'a' }], hasMore: true, totalItems: 5 }, (item) => ({
            id: item.id
        }));
        expect(encoded).toEqual({ data: [{ id: 1 }], hasMore: true, totalItems: 5 });
        expect(encoded).not.toHaveProperty('currentPage');
    });

    it('decodes back to the same page', () => {
        const page = { items: [{ id: 4, name: 'd' }], hasMore: false, currentPage: 2, totalPages: 2, totalItems: 4 };
        const decoded = decodePageResult({ ...encodePageResult(page, (item) => item) }, {
            mapItem: toTestItem,
            currentPageKey: 'currentPage',
            totalPagesKey: 'totalPages',
            totalItemsKey: 'totalItems'
        });
        expect(decoded).toEqual(page);
    });
});
