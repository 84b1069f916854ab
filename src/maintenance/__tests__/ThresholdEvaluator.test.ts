/**
 * Unit tests for the threshold evaluator
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_THRESHOLDS } from '../../types/index.js';
import {
    evaluateAnalyze,
    evaluateCandidate,
    evaluateReindex,
    evaluateVacuum
} from '../ThresholdEvaluator.js';
import { createCandidate } from '../../__tests__/mocks/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const policy = DEFAULT_THRESHOLDS;

describe('evaluateVacuum', () => {
    it('should mark a ratio at twice the threshold as Urgent', () => {
        const proposal = evaluateVacuum(createCandidate({ liveTuples: 600, deadTuples: 400 }), policy);

        expect(proposal).toEqual({
            kind: 'vacuum',
            tier: 1,
            reason: {
                tag: 'Urgent',
                description: 'dead tuples 40.0% (400 dead, 600 live) >= 40.0%',
                metric: { name: 'dead_tuple_ratio', value: 0.4 }
            }
        });
    });

    it('should mark 400 dead over 1000 live as High (ratio of all tuples)', () => {
        const proposal = evaluateVacuum(createCandidate({ liveTuples: 1000, deadTuples: 400 }), policy);

        expect(proposal?.tier).toBe(2);
        expect(proposal?.reason.tag).toBe('High');
        expect(proposal?.reason.description).toBe('dead tuples 28.6% (400 dead, 1000 live) >= 20.0%');
    });

    it('should include the threshold itself', () => {
        const proposal = evaluateVacuum(createCandidate({ liveTuples: 800, deadTuples: 200 }), policy);

        expect(proposal?.tier).toBe(2);
    });

    it('should propose nothing below the threshold', () => {
        expect(evaluateVacuum(createCandidate({ liveTuples: 900, deadTuples: 100 }), policy)).toBeNull();
    });

    it('should build VACUUM FULL proposals on the same rules', () => {
        const proposal = evaluateVacuum(
            createCandidate({ liveTuples: 600, deadTuples: 400 }),
            policy,
            'vacuum_full'
        );

        expect(proposal?.kind).toBe('vacuum_full');
        expect(proposal?.tier).toBe(1);
    });
});

describe('evaluateAnalyze', () => {
    it('should flag never-analyzed tables above the live row minimum', () => {
        const proposal = evaluateAnalyze(createCandidate({ liveTuples: 5000, stalenessMs: null }), policy);

        expect(proposal).toEqual({
            kind: 'analyze',
            tier: 1,
            reason: {
                tag: 'Never-analyzed',
                description: 'never analyzed (5000 live rows)',
                metric: { name: 'live_tuples', value: 5000 }
            }
        });
    });

    it('should leave small never-analyzed tables alone', () => {
        expect(evaluateAnalyze(createCandidate({ liveTuples: 1000, stalenessMs: null }), policy)).toBeNull();
    });

    it('should flag stale statistics with enough changes', () => {
        const proposal = evaluateAnalyze(
            createCandidate({ liveTuples: 100_000, stalenessMs: 10 * DAY_MS, modificationsSinceAnalyze: 5000 }),
            policy
        );

        expect(proposal?.tier).toBe(2);
        expect(proposal?.reason).toEqual({
            tag: 'Stale',
            description: 'statistics 10.0 days old, 5000 changes since last analyze',
            metric: { name: 'staleness_ms', value: 10 * DAY_MS }
        });
    });

    it('should fall through to High-churn when stale but quiet', () => {
        const proposal = evaluateAnalyze(
            createCandidate({ liveTuples: 1000, stalenessMs: 10 * DAY_MS, modificationsSinceAnalyze: 500 }),
            policy
        );

        expect(proposal?.tier).toBe(3);
        expect(proposal?.reason.tag).toBe('High-churn');
        expect(proposal?.reason.description).toBe('500 changes since last analyze (50.0% of live rows)');
    });

    it('should flag high churn on recently analyzed tables', () => {
        const proposal = evaluateAnalyze(
            createCandidate({ liveTuples: 1000, stalenessMs: DAY_MS, modificationsSinceAnalyze: 150 }),
            policy
        );

        expect(proposal?.tier).toBe(3);
        expect(proposal?.reason.metric).toEqual({ name: 'modification_ratio', value: 0.15 });
    });

    it('should propose nothing without changes', () => {
        expect(
            evaluateAnalyze(createCandidate({ liveTuples: 10, stalenessMs: 30 * DAY_MS }), policy)
        ).toBeNull();
    });
});

describe('evaluateReindex', () => {
    it('should flag bloat at the bloat threshold', () => {
        const proposal = evaluateReindex(createCandidate({ liveTuples: 600, deadTuples: 400 }), policy);

        expect(proposal).toEqual({
            kind: 'reindex',
            tier: 2,
            reason: {
                tag: 'Bloated',
                description: 'dead tuples 40.0% >= bloat threshold 30.0%',
                metric: { name: 'dead_tuple_ratio', value: 0.4 }
            }
        });
    });

    it('should escalate at twice the bloat threshold', () => {
        const proposal = evaluateReindex(createCandidate({ liveTuples: 300, deadTuples: 700 }), policy);

        expect(proposal?.tier).toBe(1);
    });

    it('should ignore moderate dead tuple ratios', () => {
        expect(evaluateReindex(createCandidate({ liveTuples: 750, deadTuples: 250 }), policy)).toBeNull();
    });
});

describe('evaluateCandidate', () => {
    const busy = createCandidate({
        liveTuples: 600,
        deadTuples: 400,
        stalenessMs: null
    });

    it('should propose at most one vacuum and one analyze in auto mode', () => {
        const kinds = evaluateCandidate(busy, 'auto', policy).map((p) => p.kind);

        expect(kinds).toEqual(['vacuum']);
        expect(
            evaluateCandidate({ ...busy, liveTuples: 6000 }, 'auto', policy).map((p) => p.kind)
        ).toEqual(['vacuum', 'analyze']);
    });

    it.each([
        ['vacuum', ['vacuum']],
        ['analyze', ['analyze']],
        ['full-vacuum', ['vacuum_full']],
        ['reindex', ['reindex']]
    ] as const)('should restrict %s mode to its kind', (mode, expected) => {
        const candidate = { ...busy, liveTuples: 6000, deadTuples: 6000, deadTupleRatio: 0.5 };

        expect(evaluateCandidate(candidate, mode, policy).map((p) => p.kind)).toEqual(expected);
    });

    it('should return nothing for a healthy table', () => {
        expect(evaluateCandidate(createCandidate(), 'auto', policy)).toEqual([]);
    });
});
