import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_PAGINATION_OPTIONS, resolveOptions } from '../config';
import { defaultEquals } from '../equality';
import { InvalidArgumentError } from '../errors';
import { createMockSource } from '$test/test-utils';

describe('resolveOptions', () => {
    const source = createMockSource<string>();

    it('fills in the defaults', () => {
        const opts = resolveOptions({ source });
        expect(opts.itemsPerPage).toBe(DEFAULT_PAGINATION_OPTIONS.itemsPerPage);
        expect(opts.itemsPerPage).toBe(10);
        expect(opts.name).toBe('paginated');
        expect(opts.equals).toBe(defaultEquals);
        expect(opts.filters).toBeUndefined();
    });

    it('keeps what the caller passes', () => {
        const equals = vi.fn(() => true);
        const onTransition = vi.fn();
        const opts = resolveOptions({ source, itemsPerPage: 50, filters: { q: 'x' }, equals, name: 'users', onTransition });

        expect(opts).toMatchObject({ itemsPerPage: 50, filters: { q: 'x' }, name: 'users' });
        expect(opts.equals).toBe(equals);
        expect(opts.onTransition).toBe(onTransition);
    });

    it('treats an explicit undefined as the default', () => {
        expect(resolveOptions({ source, itemsPerPage: undefined }).itemsPerPage).toBe(10);
    });

    it.each([0, -5, 2.5, Number.NaN])('rejects itemsPerPage=%s', (itemsPerPage) => {
        expect(() => resolveOptions({ source, itemsPerPage })).toThrow(InvalidArgumentError);
    });
});
