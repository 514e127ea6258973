import { describe, it, expect } from 'vitest';
import {
    type AnnealProgress,
    proposeMove,
    refineLayout,
    refineStartLayout,
    runAnnealer,
    runAnnealingChains,
    scoreStartLayout,
} from './optimizer';
import { normalizeAnnealerConfig } from './config';
import { buildCorpusStats, prepareCorpus } from './corpus';
import { cloneLayout, createRandomLayout, layoutKey, listLayoutViolations, swapSlots } from './layout';
import { describeSlot, keyAdjacency, createGridGeometry } from './keyboard';
import { createSeededRandom } from './random';
import { FITTS_A, FITTS_B, computeTotalCost, createScoringContext, evaluateLayout } from './scoring';
import { Adjacency, Role } from './types';
import { ConfigurationError, LayoutValidationError } from './errors';

const LETTERS = Array.from('abcdefghijklmnopqrstuvwxyz');
const TEXT = 'pack my box with five dozen liquor jugs and then watch the quiet zebra jump over the hedge';
const stats = buildCorpusStats(TEXT, LETTERS);

function distinctChars(count: number): string {
    return Array.from({ length: count }, (_, i) => String.fromCharCode(0x21 + i)).join('');
}

describe('runAnnealer', () => {
    it('never lets the best cost rise', () => {
        const bestCosts: number[] = [];
        const result = runAnnealer(stats, { seed: 3, maxIterations: 3000, progressInterval: 1 }, {
            onProgress: (progress: AnnealProgress) => bestCosts.push(progress.bestCost),
        });
        expect(bestCosts).toHaveLength(3000);
        for (let i = 1; i < bestCosts.length; i++) {
            expect(bestCosts[i]).toBeLessThanOrEqual(bestCosts[i - 1]);
        }
        expect(result.breakdown.total).toBeCloseTo(bestCosts[bestCosts.length - 1], 9);
        expect(result.breakdown.total).toBeLessThanOrEqual(result.startCost);
    });

    it('reproduces the same result for the same seed', () => {
        const config = { seed: 11, start: 'random', maxIterations: 2000 };
        const first = runAnnealer(stats, config);
        const second = runAnnealer(stats, config);
        expect(first.layout.slots).toEqual(second.layout.slots);
        expect(first.breakdown).toEqual(second.breakdown);
        expect(first.iterations).toBe(second.iterations);
    });

    it('uses an injected generator in place of the configured seed', () => {
        const config = { start: 'random', maxIterations: 1500 };
        const seeded = runAnnealer(stats, { ...config, seed: 21 });
        const injected = runAnnealer(stats, config, { random: createSeededRandom(21) });
        expect(injected.layout.slots).toEqual(seeded.layout.slots);
        expect(injected.breakdown.total).toBe(seeded.breakdown.total);
    });

    it('returns a valid layout when scoring each candidate in full', () => {
        const result = runAnnealer(stats, { seed: 5, maxIterations: 1000, incremental: false });
        expect(listLayoutViolations(result.layout, LETTERS, normalizeAnnealerConfig({}).slotTable)).toEqual([]);
        expect(result.breakdown.total).toBeLessThanOrEqual(result.startCost);
    });

    it('stops at the iteration budget', () => {
        const result = runAnnealer(stats, { maxIterations: 250 });
        expect(result.iterations).toBe(250);
        expect(result.operators.reduce((sum, op) => sum + op.attempts, 0)).toBe(250);
    });

    it('stops once the temperature drops below the floor', () => {
        const result = runAnnealer(stats, {
            initialTemp: 1,
            coolingRate: 0.5,
            minTemp: 0.1,
            iterationsPerTemp: 10,
            maxIterations: 1_000_000,
        });
        // 1 -> 0.5 -> 0.25 -> 0.125 -> 0.0625
        expect(result.iterations).toBe(40);
        expect(result.finalTemperature).toBe(0.0625);
    });

    it('returns the start layout untouched with no budget', () => {
        const result = runAnnealer(stats, { maxIterations: 0 });
        expect(result.iterations).toBe(0);
        expect(result.layout.positions.get('a')).toBe(0);
        expect(result.breakdown.total).toBe(result.startCost);
    });

    it('brings a lone dominant bigram together', () => {
        const bestCosts: number[] = [];
        const result = runAnnealer(
            { unigrams: { t: 1, h: 1 }, bigrams: { th: 1 } },
            { alphabet: 'thabc', seed: 17, progressInterval: 100 },
            { onProgress: (progress) => bestCosts.push(progress.bestCost) },
        );
        const t = result.layout.positions.get('t');
        const h = result.layout.positions.get('h');
        expect(t).toBeDefined();
        expect(h).toBeDefined();
        if (t === undefined || h === undefined) return;

        // t's swipe ends half a key from h's center; h itself is a tap
        expect(result.breakdown.total).toBeCloseTo(FITTS_A + FITTS_B * Math.log2(1.5), 9);
        expect(describeSlot(h).role).toBe(Role.TAP);
        expect(keyAdjacency(createGridGeometry(), describeSlot(t).key, describeSlot(h).key)).not.toBe(Adjacency.NONE);
        expect(result.breakdown.total).toBeLessThan(result.startCost);
        for (let i = 1; i < bestCosts.length; i++) {
            expect(bestCosts[i]).toBeLessThanOrEqual(bestCosts[i - 1]);
        }
    });

    it('ranks distinct layouts best first', () => {
        const result = runAnnealer(stats, { seed: 9, maxIterations: 2000, topCount: 3 });
        const totals = result.top.map((entry) => entry.total);
        expect(result.top).toHaveLength(3);
        expect(new Set(result.top.map((entry) => layoutKey(entry.layout))).size).toBe(3);
        expect(totals).toEqual(totals.slice().sort((a, b) => a - b));
        expect(totals[0]).toBeCloseTo(result.breakdown.total, 9);
    });

    it('keeps only the best layout by default', () => {
        const result = runAnnealer(stats, { seed: 9, maxIterations: 500 });
        expect(result.top).toHaveLength(1);
        expect(result.top[0].layout.slots).toEqual(result.layout.slots);
    });

    it('fails fast when the alphabet outgrows the slots', () => {
        expect(() => runAnnealer(stats, { alphabet: distinctChars(46) })).toThrow(ConfigurationError);
        expect(() => runAnnealer(stats, { alphabet: distinctChars(42), centerKeySwipes: false }))
            .toThrow(ConfigurationError);
        expect(() => normalizeAnnealerConfig({ alphabet: distinctChars(41), centerKeySwipes: false })).not.toThrow();
    });

    it('fails fast on an invalid start layout', () => {
        expect(() => runAnnealer(stats, { alphabet: 'ab', startLayout: { a: 0 } })).toThrow(LayoutValidationError);
        expect(() => runAnnealer(stats, { alphabet: 'ab', startLayout: { a: 0, b: 0 } })).toThrow(LayoutValidationError);
        expect(() => runAnnealer(stats, { alphabet: 'ab', startLayout: { a: 0, b: 1, z: 2 } }))
            .toThrow(/not in the alphabet/);
    });
});

describe('runAnnealingChains', () => {
    it('keeps the lowest-cost chain', () => {
        const { best, chains } = runAnnealingChains(stats, { maxIterations: 1500 }, [1, 2, 3]);
        expect(chains.map((chain) => chain.seed)).toEqual([1, 2, 3]);
        expect(best.breakdown.total).toBe(Math.min(...chains.map((chain) => chain.breakdown.total)));
    });

    it('merges the chains into one ranking', () => {
        const { best, top } = runAnnealingChains(stats, { maxIterations: 1500, topCount: 2 }, [1, 2, 3]);
        expect(top).toHaveLength(2);
        expect(layoutKey(top[0].layout)).not.toBe(layoutKey(top[1].layout));
        expect(top[0].total).toBeLessThanOrEqual(top[1].total);
        expect(top[0].total).toBeCloseTo(best.breakdown.total, 9);
    });

    it('requires a seed', () => {
        expect(() => runAnnealingChains(stats, {}, [])).toThrow(RangeError);
    });
});

describe('proposeMove', () => {
    it('always yields a valid layout after the swap', () => {
        for (const centerKeySwipes of [true, false]) {
            const config = normalizeAnnealerConfig({ withinKeyMoveRate: 0.5, centerKeySwipes });
            const random = createSeededRandom(8);
            const layout = createRandomLayout(config.alphabet, config.slotTable, random);
            for (let i = 0; i < 1000; i++) {
                const move = proposeMove(layout, config, random);
                expect(move.a).not.toBe(move.b);
                expect(layout.slots[move.a]).not.toBeNull();
                expect(config.slotTable.enabled[move.b]).toBe(true);
                if (move.operator === 'swap_within_key') {
                    expect(describeSlot(move.a).key).toBe(describeSlot(move.b).key);
                }
                swapSlots(layout, move.a, move.b);
                expect(listLayoutViolations(layout, config.alphabet, config.slotTable)).toEqual([]);
            }
        }
    });
});

describe('scoreStartLayout', () => {
    it('scores the reference layout', () => {
        const { layout, breakdown } = scoreStartLayout({ unigrams: {}, bigrams: { th: 1 } }, { alphabet: 'th' });
        expect(layout.positions.get('t')).toBe(0);
        expect(layout.positions.get('h')).toBe(5);
        expect(breakdown.total).toBeCloseTo(FITTS_A + FITTS_B, 12);
    });
});

describe('refineLayout', () => {
    it('stops at a layout that no single swap improves', () => {
        const config = normalizeAnnealerConfig();
        const corpus = prepareCorpus(stats, config.alphabet);
        const context = createScoringContext(config.costModel);
        const start = createRandomLayout(config.alphabet, config.slotTable, createSeededRandom(5));
        const startSlots = start.slots.slice();

        const { layout, swaps } = refineLayout(start, corpus, context, config.slotTable);
        expect(start.slots).toEqual(startSlots);
        expect(swaps).toBeGreaterThan(0);
        expect(listLayoutViolations(layout, config.alphabet, config.slotTable)).toEqual([]);

        const total = evaluateLayout(layout, corpus, context).total;
        expect(total).toBeLessThan(computeTotalCost(start, corpus, context));
        for (const a of config.slotTable.slots) {
            for (const b of config.slotTable.slots) {
                if (a.id >= b.id) continue;
                const neighbour = cloneLayout(layout);
                swapSlots(neighbour, a.id, b.id);
                expect(evaluateLayout(neighbour, corpus, context).total).toBeGreaterThanOrEqual(total - 1e-9);
            }
        }
        expect(refineLayout(layout, corpus, context, config.slotTable).swaps).toBe(0);
    });
});

describe('refineStartLayout', () => {
    it('moves t onto a swipe that ends beside h', () => {
        const result = refineStartLayout({ unigrams: {}, bigrams: { th: 1 } }, { alphabet: 'th' });
        expect(result.startCost).toBeCloseTo(FITTS_A + FITTS_B, 12);
        expect(result.breakdown.total).toBeCloseTo(FITTS_A + FITTS_B * Math.log2(1.5), 12);
        expect(result.swaps).toBe(1);
        expect(result.layout.positions.get('h')).toBe(5);
    });
});
