/**
 * Unit tests for the safety filter
 */

import { describe, it, expect, vi } from 'vitest';
import {
    applySafetyFilter,
    NOTE_NEEDS_CONFIRMATION,
    SKIP_NOT_CONFIRMED,
    type SafetyFilterOptions
} from '../SafetyFilter.js';
import { createOperation } from '../../__tests__/mocks/index.js';

vi.mock('../../utils/logger.js', async (importOriginal) => {
    const { withMockLogger } = await import('../../__tests__/mocks/logger.js');
    return withMockLogger(await importOriginal());
});

const GB = 1024 ** 3;

function options(overrides: Partial<SafetyFilterOptions> = {}): SafetyFilterOptions {
    return {
        skipLarge: false,
        largeTableSizeBytes: 10 * GB,
        confirmDestructive: false,
        dryRun: false,
        ...overrides
    };
}

describe('applySafetyFilter', () => {
    describe('large tables', () => {
        it('should skip tables at or above the size limit', async () => {
            const large = createOperation({
                id: 1,
                tier: 1,
                tag: 'Urgent',
                candidate: { table: 'events', liveTuples: 100, deadTuples: 900, sizeBytes: 12 * GB }
            });
            const small = createOperation({ id: 2, candidate: { table: 'orders' } });

            const { plan, skipped } = await applySafetyFilter([large, small], options({ skipLarge: true }));

            expect(plan).toEqual([small]);
            expect(skipped).toEqual([large]);
            expect(large.state).toBe('skipped');
            expect(large.notes).toEqual(['skipped: large table (12.0 GB >= 10.0 GB)']);
        });

        it('should treat the limit itself as large', async () => {
            const edge = createOperation({ candidate: { sizeBytes: 10 * GB } });

            const { skipped } = await applySafetyFilter([edge], options({ skipLarge: true }));

            expect(skipped).toEqual([edge]);
        });

        it('should keep large tables when the switch is off', async () => {
            const large = createOperation({ candidate: { sizeBytes: 12 * GB } });

            const { plan, skipped } = await applySafetyFilter([large], options());

            expect(plan).toEqual([large]);
            expect(skipped).toEqual([]);
            expect(large.state).toBe('pending');
        });
    });

    describe('destructive operations', () => {
        it('should skip unconfirmed VACUUM FULL when nobody can be asked', async () => {
            const full = createOperation({ id: 1, kind: 'vacuum_full' });

            const { plan, skipped } = await applySafetyFilter([full], options());

            expect(plan).toEqual([]);
            expect(skipped).toEqual([full]);
            expect(full.state).toBe('skipped');
            expect(full.notes).toEqual([SKIP_NOT_CONFIRMED]);
        });

        it('should ask once for all destructive operations', async () => {
            const full = createOperation({ id: 1, kind: 'vacuum_full', candidate: { table: 'a' } });
            const plain = createOperation({ id: 2, kind: 'vacuum', candidate: { table: 'b' } });
            const reindex = createOperation({ id: 3, kind: 'reindex', candidate: { table: 'c' } });
            const confirm = vi.fn().mockResolvedValue(true);

            const { plan, skipped } = await applySafetyFilter([full, plain, reindex], options({ confirm }));

            expect(confirm).toHaveBeenCalledTimes(1);
            expect(confirm).toHaveBeenCalledWith([full, reindex]);
            expect(plan).toEqual([full, plain, reindex]);
            expect(skipped).toEqual([]);
        });

        it('should skip only the destructive ones when the answer is no', async () => {
            const full = createOperation({ id: 1, kind: 'vacuum_full', candidate: { table: 'a' } });
            const plain = createOperation({ id: 2, kind: 'vacuum', candidate: { table: 'b' } });
            const confirm = vi.fn().mockResolvedValue(false);

            const { plan, skipped } = await applySafetyFilter([full, plain], options({ confirm }));

            expect(plan).toEqual([plain]);
            expect(skipped).toEqual([full]);
        });

        it('should not ask when confirmation was given up front', async () => {
            const full = createOperation({ kind: 'vacuum_full' });
            const confirm = vi.fn();

            const { plan } = await applySafetyFilter([full], options({ confirmDestructive: true, confirm }));

            expect(confirm).not.toHaveBeenCalled();
            expect(plan).toEqual([full]);
            expect(full.notes).toEqual([]);
        });

        it('should annotate instead of asking in a dry run', async () => {
            const full = createOperation({ kind: 'reindex' });
            const confirm = vi.fn();

            const { plan, skipped } = await applySafetyFilter([full], options({ dryRun: true, confirm }));

            expect(confirm).not.toHaveBeenCalled();
            expect(plan).toEqual([full]);
            expect(skipped).toEqual([]);
            expect(full.state).toBe('pending');
            expect(full.notes).toEqual([NOTE_NEEDS_CONFIRMATION]);
        });

        it('should not ask about destructive operations already skipped as large', async () => {
            const full = createOperation({ kind: 'vacuum_full', candidate: { sizeBytes: 20 * GB } });
            const confirm = vi.fn();

            const { skipped } = await applySafetyFilter([full], options({ skipLarge: true, confirm }));

            expect(confirm).not.toHaveBeenCalled();
            expect(skipped).toEqual([full]);
            expect(full.notes).toHaveLength(1);
        });
    });

    it('should return skipped operations in id order', async () => {
        const a = createOperation({ id: 1, kind: 'vacuum_full', candidate: { table: 'a' } });
        const b = createOperation({ id: 2, candidate: { table: 'b', sizeBytes: 20 * GB } });

        const { skipped } = await applySafetyFilter([a, b], options({ skipLarge: true }));

        expect(skipped.map((op) => op.id)).toEqual([1, 2]);
    });
});
