import { describe, it, expect } from 'vitest';
import {
    computeSwapDelta,
    computeTotalCost,
    createScoringContext,
    evaluateLayout,
    fittsTime,
    isolatedPressCost,
    keyPressCost,
    pressEndpoint,
} from './scoring';
import { normalizeCostModel } from './config';
import { buildCorpusStats, prepareCorpus } from './corpus';
import { createRandomLayout, createReferenceLayout, layoutFromAssignment, swapSlots } from './layout';
import { createSlotTable, describeSlot } from './keyboard';
import { createSeededRandom, randomInt } from './random';
import { Adjacency, Role } from './types';

// a = 0 and b = 1 make every movement time a plain log2.
const unitModel = normalizeCostModel({
    fittsA: 0,
    fittsB: 1,
    swipeDistance: 1,
    swipePenalty: 0.5,
    adjacency: { weight: 1, sameKeyFactor: 1, neighborFactor: 0.5 },
});
const table = createSlotTable();
const unitContext = createScoringContext(unitModel);

const LETTERS = Array.from('abcdefghijklmnopqrstuvwxyz');
const TEXT = 'the quick brown fox jumps over the lazy dog while a sphinx of black quartz judges my vow';

describe('fittsTime', () => {
    it('is the intercept for a zero-distance movement', () => {
        expect(fittsTime(0, 1, 0.1, 0.2)).toBe(0.1);
    });

    it('grows with log2(distance / width + 1)', () => {
        expect(fittsTime(3, 1, 0, 1)).toBe(2);
        expect(fittsTime(2, 2, 0, 1)).toBe(1);
    });

    it('clamps negative distances to zero', () => {
        expect(fittsTime(-5, 1, 0, 1)).toBe(0);
    });
});

describe('key presses', () => {
    it('ends a tap on the key center and a swipe past it', () => {
        expect(pressEndpoint(unitModel, describeSlot(5))).toEqual({ x: 1.5, y: 0.5 });
        expect(pressEndpoint(unitModel, describeSlot(6))).toEqual({ x: 1.5, y: -0.5 });
        expect(pressEndpoint(unitModel, describeSlot(9))).toEqual({ x: 0.5, y: 0.5 });
    });

    it('charges a swipe two movements plus the swipe constant', () => {
        const from = { x: 0.5, y: 0.5 };
        expect(keyPressCost(unitModel, from, describeSlot(5))).toBeCloseTo(1, 12);
        expect(keyPressCost(unitModel, from, describeSlot(6))).toBeCloseTo(2.5, 12);
    });

    it('measures isolated presses from the resting point', () => {
        // default rest point is the center key
        expect(isolatedPressCost(unitModel, describeSlot(20))).toBe(0);
        expect(isolatedPressCost(unitModel, describeSlot(21))).toBeCloseTo(1.5, 12);
    });
});

describe('evaluateLayout', () => {
    const thCorpus = prepareCorpus({ unigrams: {}, bigrams: { th: 1 } }, ['t', 'h']);

    it('charges a bigram to the second character', () => {
        const layout = layoutFromAssignment({ t: 0, h: 10 }, table);
        const breakdown = evaluateLayout(layout, thCorpus, unitContext);
        expect(breakdown.characters[0].base).toBe(0);
        expect(breakdown.characters[1].base).toBeCloseTo(Math.log2(3), 12);
        expect(breakdown.total).toBeCloseTo(Math.log2(3), 12);
        expect(breakdown.swipePenaltyCost).toBe(0);
    });

    it('starts the next movement where a swipe ends', () => {
        // t swipes right off key 0 and lands on the center of key 1
        const layout = layoutFromAssignment({ t: 2, h: 5 }, table);
        expect(evaluateLayout(layout, thCorpus, unitContext).total).toBe(0);
    });

    it('adds the swipe extension when the second character is a swipe', () => {
        const layout = layoutFromAssignment({ t: 0, h: 6 }, table);
        expect(evaluateLayout(layout, thCorpus, unitContext).total).toBeCloseTo(2.5, 12);
    });

    it('penalizes opposite swipes on one key and relaxes as they move apart', () => {
        const corpus = prepareCorpus({ unigrams: { a: 1, b: 1 }, bigrams: {} }, ['a', 'b', 'c']);
        const sameKey = evaluateLayout(
            layoutFromAssignment({ a: { key: 0, role: Role.SWIPE_UP }, b: { key: 0, role: Role.SWIPE_DOWN }, c: 20 }, table),
            corpus,
            unitContext,
        );
        expect(sameKey.swipePairs).toEqual([{ first: 'a', second: 'b', adjacency: Adjacency.SAME, penalty: 0.25 }]);
        expect(sameKey.characters.map((entry) => entry.swipePenalty)).toEqual([0.125, 0.125, 0]);

        const neighbor = evaluateLayout(
            layoutFromAssignment({ a: 1, b: { key: 1, role: Role.SWIPE_DOWN }, c: 20 }, table),
            corpus,
            unitContext,
        );
        expect(neighbor.swipePenaltyCost).toBe(0.125);

        const apart = evaluateLayout(
            layoutFromAssignment({ a: 1, b: { key: 2, role: Role.SWIPE_DOWN }, c: 20 }, table),
            corpus,
            unitContext,
        );
        expect(apart.swipePenaltyCost).toBe(0);
        expect(apart.swipePenaltyCost).toBeLessThan(sameKey.swipePenaltyCost);
        expect(apart.baseCost).toBe(sameKey.baseCost);
    });

    it('can sum frequencies instead of multiplying them', () => {
        const model = normalizeCostModel({ adjacency: { weight: 2, sameKeyFactor: 1, combine: 'sum' } });
        const context = createScoringContext(model);
        const corpus = prepareCorpus({ unigrams: { a: 3, b: 1 }, bigrams: {} }, ['a', 'b']);
        const layout = layoutFromAssignment({ a: 1, b: 3 }, table);
        expect(evaluateLayout(layout, corpus, context).swipePenaltyCost).toBe(2);
    });

    it('charges nothing for characters the corpus never uses', () => {
        const corpus = prepareCorpus({ unigrams: {}, bigrams: {} }, LETTERS);
        const breakdown = evaluateLayout(createReferenceLayout(LETTERS, table), corpus, unitContext);
        expect(breakdown.total).toBe(0);
        expect(breakdown.characters).toHaveLength(26);
    });

    it('attributes cost so the parts add up to the total exactly', () => {
        const model = normalizeCostModel({});
        const context = createScoringContext(model);
        const corpus = prepareCorpus(buildCorpusStats(TEXT, LETTERS), LETTERS);
        for (let seed = 1; seed <= 10; seed++) {
            const layout = createRandomLayout(LETTERS, table, createSeededRandom(seed));
            const breakdown = evaluateLayout(layout, corpus, context);
            const base = breakdown.characters.reduce((sum, entry) => sum + entry.base, 0);
            const penalty = breakdown.swipePairs.reduce((sum, pair) => sum + pair.penalty, 0);
            expect(base + penalty).toBe(breakdown.total);
            expect(breakdown.total).toBeGreaterThanOrEqual(0);
            expect(breakdown.characters.every((entry) => entry.base >= 0 && entry.swipePenalty >= 0)).toBe(true);
        }
    });
});

describe('computeSwapDelta', () => {
    const models = [
        normalizeCostModel({}),
        normalizeCostModel({ adjacency: { combine: 'sum', neighborFactor: 0.6 } }),
    ];
    const corpus = prepareCorpus(buildCorpusStats(TEXT, LETTERS), LETTERS);

    it('matches full recomputation for random swaps, including empty slots', () => {
        for (const model of models) {
            const context = createScoringContext(model);
            const random = createSeededRandom(99);
            const layout = createRandomLayout(LETTERS, table, random);
            for (let i = 0; i < 200; i++) {
                const a = table.slots[randomInt(random, table.slots.length)].id;
                const b = table.slots[randomInt(random, table.slots.length)].id;
                const before = computeTotalCost(layout, corpus, context);
                const snapshot = layout.slots.slice();
                const delta = computeSwapDelta(layout, corpus, context, a, b);
                expect(layout.slots).toEqual(snapshot);

                swapSlots(layout, a, b);
                const after = computeTotalCost(layout, corpus, context);
                expect(delta).toBeCloseTo(after - before, 10);
            }
        }
    });

    it('is zero when both slots are empty', () => {
        const context = createScoringContext(models[0]);
        const layout = createReferenceLayout(['t', 'h'], table);
        expect(computeSwapDelta(layout, corpus, context, 40, 44)).toBe(0);
    });
});
