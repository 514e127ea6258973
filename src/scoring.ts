import {
    type CharacterCost,
    type CostBreakdown,
    type CostModel,
    type Layout,
    type Point,
    type PreparedCorpus,
    type Slot,
    type SwipePairCost,
    Adjacency,
    isSwipeRole,
    roleToDelta,
} from './types';
import { SLOT_CAPACITY, describeSlot, keyAdjacency, keyCenter } from './keyboard';
import { swapSlots } from './layout';

// Thumb pointing on a phone-sized key, in seconds and key widths.
export const FITTS_A = 0.083;
export const FITTS_B = 0.127;
export const SWIPE_DISTANCE = 0.5;
export const SWIPE_PENALTY = 0.05;
export const ADJACENCY_WEIGHT = 4.0;
export const SAME_KEY_FACTOR = 1.0;
export const NEIGHBOR_FACTOR = 0.25;

// ─── Movement time ───────────────────────────────────────

/** Fitts's law, Shannon form. Distance is clamped at zero so the log argument is never below 1. */
export function fittsTime(distance: number, width: number, a: number, b: number): number {
    return a + b * Math.log2(Math.max(0, distance) / width + 1);
}

function distanceBetween(p: Point, q: Point): number {
    return Math.hypot(q.x - p.x, q.y - p.y);
}

/** Where the thumb lifts off after typing the slot: the key center, or the end of the swipe. */
export function pressEndpoint(model: CostModel, slot: Slot): Point {
    const center = keyCenter(model.geometry, slot.key);
    const { dx, dy } = roleToDelta(slot.role);
    return {
        x: center.x + dx * model.swipeDistance,
        y: center.y + dy * model.swipeDistance,
    };
}

/**
 * Time to type the slot starting from `from`. A tap is one movement to the key
 * center; a swipe chains a second movement of the swipe distance and pays the
 * fixed swipe penalty on top.
 */
export function keyPressCost(model: CostModel, from: Point, slot: Slot): number {
    const center = keyCenter(model.geometry, slot.key);
    const width = model.geometry.keys[slot.key].width;
    let cost = fittsTime(distanceBetween(from, center), width, model.fittsA, model.fittsB);
    if (isSwipeRole(slot.role)) {
        cost += fittsTime(model.swipeDistance, width, model.fittsA, model.fittsB) + model.swipePenalty;
    }
    return cost;
}

export function isolatedPressCost(model: CostModel, slot: Slot): number {
    return keyPressCost(model, model.restPoint, slot);
}

export function adjacencyFactor(model: CostModel, adjacency: Adjacency): number {
    switch (adjacency) {
        case Adjacency.SAME: return model.adjacency.sameKeyFactor;
        case Adjacency.NEIGHBOR: return model.adjacency.neighborFactor;
        case Adjacency.NONE: return 0;
    }
}

// ─── Context ─────────────────────────────────────────────

export interface ScoringContext {
    model: CostModel;
    /** [fromSlot][toSlot]: cost of typing `toSlot` right after `fromSlot`. */
    transition: number[][];
    /** [slotA][slotB]: weight times adjacency factor, zero unless both are swipe slots. */
    pairFactor: number[][];
    adjacency: Adjacency[][];
    isolated: number[];
}

/** Precomputes every slot-to-slot quantity; all scoring reads from these tables. */
export function createScoringContext(model: CostModel): ScoringContext {
    const slots: Slot[] = [];
    for (let id = 0; id < SLOT_CAPACITY; id++) slots.push(describeSlot(id));
    const endpoints = slots.map((slot) => pressEndpoint(model, slot));

    const transition = slots.map((_, from) => slots.map((slot) => keyPressCost(model, endpoints[from], slot)));
    const adjacency = slots.map((a) => slots.map((b) => keyAdjacency(model.geometry, a.key, b.key)));
    const pairFactor = slots.map((a, i) => slots.map((b, j) => (
        isSwipeRole(a.role) && isSwipeRole(b.role)
            ? model.adjacency.weight * adjacencyFactor(model, adjacency[i][j])
            : 0
    )));
    const isolated = slots.map((slot) => isolatedPressCost(model, slot));

    return { model, transition, pairFactor, adjacency, isolated };
}

function combineFrequencies(context: ScoringContext, p: number, q: number): number {
    return context.model.adjacency.combine === 'sum' ? p + q : p * q;
}

function pairPenalty(context: ScoringContext, slotA: number, slotB: number, p: number, q: number): number {
    const factor = context.pairFactor[slotA][slotB];
    if (factor === 0) return 0;
    return factor * combineFrequencies(context, p, q);
}

// ─── Evaluation ──────────────────────────────────────────

/**
 * Full cost of a layout. `baseCost` and `swipePenaltyCost` are the in-order
 * sums of `characters[].base` and `swipePairs[].penalty`, and `total` is their
 * sum, so the attribution adds up to the total exactly.
 */
export function evaluateLayout(layout: Layout, corpus: PreparedCorpus, context: ScoringContext): CostBreakdown {
    const slotOf = corpus.alphabet.map((char) => layout.positions.get(char));
    const characters: CharacterCost[] = corpus.alphabet.map((char, i) => {
        const slot = slotOf[i] ?? -1;
        return { char, slot, base: 0, swipePenalty: 0, isolated: slot >= 0 ? context.isolated[slot] : 0 };
    });

    for (const bigram of corpus.bigrams) {
        const from = slotOf[bigram.from];
        const to = slotOf[bigram.to];
        if (from === undefined || to === undefined) continue;
        characters[bigram.to].base += bigram.weight * context.transition[from][to];
    }

    const swipePairs: SwipePairCost[] = [];
    for (let i = 0; i < corpus.alphabet.length; i++) {
        const slotA = slotOf[i];
        if (slotA === undefined) continue;
        for (let j = i + 1; j < corpus.alphabet.length; j++) {
            const slotB = slotOf[j];
            if (slotB === undefined) continue;
            const penalty = pairPenalty(context, slotA, slotB, corpus.unigrams[i], corpus.unigrams[j]);
            if (penalty <= 0) continue;
            swipePairs.push({
                first: corpus.alphabet[i],
                second: corpus.alphabet[j],
                adjacency: context.adjacency[slotA][slotB],
                penalty,
            });
            characters[i].swipePenalty += penalty / 2;
            characters[j].swipePenalty += penalty / 2;
        }
    }

    const baseCost = characters.reduce((sum, entry) => sum + entry.base, 0);
    const swipePenaltyCost = swipePairs.reduce((sum, pair) => sum + pair.penalty, 0);
    return {
        total: baseCost + swipePenaltyCost,
        baseCost,
        swipePenaltyCost,
        characters,
        swipePairs,
    };
}

export function computeTotalCost(layout: Layout, corpus: PreparedCorpus, context: ScoringContext): number {
    return evaluateLayout(layout, corpus, context).total;
}

// ─── Incremental delta ───────────────────────────────────

function charIndexAt(layout: Layout, corpus: PreparedCorpus, slot: number): number {
    const char = layout.slots[slot];
    if (char === null) return -1;
    return corpus.index.get(char) ?? -1;
}

/** Bigram cost of every pair touching `charIndex`, skipping pairs that also touch `skip`. */
function incidentBigramCost(
    layout: Layout,
    corpus: PreparedCorpus,
    context: ScoringContext,
    charIndex: number,
    skip: number,
): number {
    let cost = 0;
    for (const bigramIndex of corpus.incident[charIndex]) {
        const bigram = corpus.bigrams[bigramIndex];
        if (bigram.from === skip || bigram.to === skip) continue;
        const from = layout.positions.get(corpus.alphabet[bigram.from]);
        const to = layout.positions.get(corpus.alphabet[bigram.to]);
        if (from === undefined || to === undefined) continue;
        cost += bigram.weight * context.transition[from][to];
    }
    return cost;
}

function incidentPenaltyCost(
    layout: Layout,
    corpus: PreparedCorpus,
    context: ScoringContext,
    charIndex: number,
    skip: number,
): number {
    const slot = layout.positions.get(corpus.alphabet[charIndex]);
    if (slot === undefined) return 0;
    let cost = 0;
    for (let other = 0; other < corpus.alphabet.length; other++) {
        if (other === charIndex || other === skip) continue;
        const otherSlot = layout.positions.get(corpus.alphabet[other]);
        if (otherSlot === undefined) continue;
        cost += pairPenalty(context, slot, otherSlot, corpus.unigrams[charIndex], corpus.unigrams[other]);
    }
    return cost;
}

function touchedCost(
    layout: Layout,
    corpus: PreparedCorpus,
    context: ScoringContext,
    charA: number,
    charB: number,
): number {
    let cost = 0;
    if (charA >= 0) {
        cost += incidentBigramCost(layout, corpus, context, charA, -1);
        cost += incidentPenaltyCost(layout, corpus, context, charA, charB);
    }
    if (charB >= 0) {
        cost += incidentBigramCost(layout, corpus, context, charB, charA);
        cost += incidentPenaltyCost(layout, corpus, context, charB, -1);
    }
    return cost;
}

/**
 * Change in total cost if slots `a` and `b` were exchanged. Only the bigrams
 * and swipe pairs touching the moved characters are rescored. The layout is
 * swapped and restored, so it is unchanged on return.
 */
export function computeSwapDelta(
    layout: Layout,
    corpus: PreparedCorpus,
    context: ScoringContext,
    a: number,
    b: number,
): number {
    if (a === b) return 0;
    const charA = charIndexAt(layout, corpus, a);
    const charB = charIndexAt(layout, corpus, b);
    if (charA < 0 && charB < 0) return 0;

    const before = touchedCost(layout, corpus, context, charA, charB);
    swapSlots(layout, a, b);
    const after = touchedCost(layout, corpus, context, charA, charB);
    swapSlots(layout, a, b);
    return after - before;
}
