import {
    type CorpusStats,
    type CostBreakdown,
    type Layout,
    type PreparedCorpus,
    type RandomFn,
    type SlotTable,
} from './types';
import { describeSlot } from './keyboard';
import { type AnnealerRuntimeConfig, normalizeAnnealerConfig } from './config';
import { prepareCorpus } from './corpus';
import {
    cloneLayout,
    createRandomLayout,
    createReferenceLayout,
    layoutFromAssignment,
    layoutKey,
    swapSlots,
    validateLayout,
} from './layout';
import {
    type ScoringContext,
    computeSwapDelta,
    computeTotalCost,
    createScoringContext,
    evaluateLayout,
} from './scoring';
import { createSeededRandom, deriveChainSeeds, randomInt } from './random';

// Deltas above this do not count as improvements.
const IMPROVEMENT_EPSILON = 1e-12;

export type MoveOperatorId = 'swap_slots' | 'swap_within_key';

export interface OperatorStats {
    id: MoveOperatorId;
    attempts: number;
    accepted: number;
    improved: number;
}

export interface AnnealProgress {
    iteration: number;
    temperature: number;
    currentCost: number;
    bestCost: number;
}

export interface AnnealerHooks {
    /** Overrides the generator seeded from `config.seed`. */
    random?: RandomFn;
    /** Takes precedence over `config.startLayout` and `config.start`. */
    startLayout?: Layout;
    onProgress?: (progress: AnnealProgress) => void;
}

export interface RankedLayout {
    layout: Layout;
    total: number;
}

export interface AnnealerResult {
    layout: Layout;
    breakdown: CostBreakdown;
    /** Up to `topCount` distinct layouts seen during the run, best first. */
    top: RankedLayout[];
    startCost: number;
    iterations: number;
    finalTemperature: number;
    acceptedMoves: number;
    operators: OperatorStats[];
    seed: number;
}

export interface ChainRunResult {
    best: AnnealerResult;
    chains: AnnealerResult[];
    /** The chains' rankings merged, duplicates removed. */
    top: RankedLayout[];
}

export interface SwapMove {
    operator: MoveOperatorId;
    a: number;
    b: number;
}

interface AnnealerState {
    current: Layout;
    currentCost: number;
    best: Layout;
    bestCost: number;
    temperature: number;
    iteration: number;
    acceptedMoves: number;
    top: RankedEntry[];
}

interface RankedEntry extends RankedLayout {
    key: string;
}

/**
 * Simulated annealing over slot transpositions. Runs synchronously to
 * completion: stops once the iteration budget is spent or the temperature
 * falls below `minTemp`, and returns the best layout seen, which need not be
 * the final current one.
 *
 * Configuration errors and invalid start layouts throw before the first
 * iteration.
 */
export function runAnnealer(
    stats: CorpusStats,
    _config: Record<string, unknown> = {},
    hooks: AnnealerHooks = {},
): AnnealerResult {
    const config = normalizeAnnealerConfig(_config);
    const random = hooks.random ?? createSeededRandom(config.seed);
    const corpus = prepareCorpus(stats, config.alphabet);
    const context = createScoringContext(config.costModel);

    const start = resolveStartLayout(config, hooks.startLayout, random);
    validateLayout(start, config.alphabet, config.slotTable);

    const startCost = computeTotalCost(start, corpus, context);
    const state: AnnealerState = {
        current: start,
        currentCost: startCost,
        best: cloneLayout(start),
        bestCost: startCost,
        temperature: config.initialTemp,
        iteration: 0,
        acceptedMoves: 0,
        top: [],
    };
    recordRanked(state.top, start, startCost, config.topCount);
    const operatorStats: Record<MoveOperatorId, OperatorStats> = {
        swap_slots: { id: 'swap_slots', attempts: 0, accepted: 0, improved: 0 },
        swap_within_key: { id: 'swap_within_key', attempts: 0, accepted: 0, improved: 0 },
    };

    const scoreCandidate = (move: SwapMove): number => {
        if (config.incremental) {
            return state.currentCost + computeSwapDelta(state.current, corpus, context, move.a, move.b);
        }
        swapSlots(state.current, move.a, move.b);
        const cost = computeTotalCost(state.current, corpus, context);
        swapSlots(state.current, move.a, move.b);
        return cost;
    };

    const shouldStop = (): boolean => (
        state.iteration >= config.maxIterations || state.temperature < config.minTemp
    );

    while (!shouldStop()) {
        for (let i = 0; i < config.iterationsPerTemp && state.iteration < config.maxIterations; i++) {
            state.iteration++;
            const move = proposeMove(state.current, config, random);
            const stats = operatorStats[move.operator];
            const candidateCost = scoreCandidate(move);
            const delta = candidateCost - state.currentCost;
            stats.attempts++;

            if (delta <= 0 || random() < Math.exp(-delta / state.temperature)) {
                swapSlots(state.current, move.a, move.b);
                state.currentCost = candidateCost;
                state.acceptedMoves++;
                stats.accepted++;
                if (candidateCost < state.bestCost) {
                    state.bestCost = candidateCost;
                    state.best = cloneLayout(state.current);
                    stats.improved++;
                }
                recordRanked(state.top, state.current, candidateCost, config.topCount);
            }

            if (hooks.onProgress && state.iteration % config.progressInterval === 0) {
                hooks.onProgress({
                    iteration: state.iteration,
                    temperature: state.temperature,
                    currentCost: state.currentCost,
                    bestCost: state.bestCost,
                });
            }
        }
        state.temperature *= config.coolingRate;

        // Deltas accumulate rounding error; resync once per temperature step.
        if (config.incremental) {
            state.currentCost = computeTotalCost(state.current, corpus, context);
        }
    }

    return {
        layout: state.best,
        breakdown: evaluateLayout(state.best, corpus, context),
        top: rescoreRanked(state.top, corpus, context),
        startCost,
        iterations: state.iteration,
        finalTemperature: state.temperature,
        acceptedMoves: state.acceptedMoves,
        operators: [operatorStats.swap_slots, operatorStats.swap_within_key],
        seed: config.seed,
    };
}

/**
 * Runs one independent chain per seed and keeps the lowest total. Chains
 * share nothing but the read-only corpus; ties go to the earlier seed.
 */
export function runAnnealingChains(
    stats: CorpusStats,
    config: Record<string, unknown> = {},
    seeds: number[] = deriveChainSeeds(normalizeAnnealerConfig(config).seed, 4),
    hooks: Omit<AnnealerHooks, 'random'> = {},
): ChainRunResult {
    if (seeds.length === 0) throw new RangeError('runAnnealingChains needs at least one seed');
    const chains = seeds.map((seed) => runAnnealer(stats, { ...config, seed }, {
        startLayout: hooks.startLayout ? cloneLayout(hooks.startLayout) : undefined,
        onProgress: hooks.onProgress,
    }));
    const best = chains.reduce((winner, chain) => (
        chain.breakdown.total < winner.breakdown.total ? chain : winner
    ));
    const topCount = normalizeAnnealerConfig(config).topCount;
    const top: RankedEntry[] = [];
    for (const chain of chains) {
        for (const entry of chain.top) recordRanked(top, entry.layout, entry.total, topCount);
    }
    return { best, chains, top: top.map(({ layout, total }) => ({ layout, total })) };
}

// ─── Ranking ─────────────────────────────────────────────

/** Keeps `top` sorted by total, distinct and at most `limit` long. The layout is cloned when kept. */
function recordRanked(top: RankedEntry[], layout: Layout, total: number, limit: number): void {
    if (top.length >= limit && total >= top[top.length - 1].total) return;
    const key = layoutKey(layout);
    const existing = top.findIndex((entry) => entry.key === key);
    if (existing >= 0) {
        if (top[existing].total <= total) return;
        top.splice(existing, 1);
    }
    let at = top.findIndex((entry) => total < entry.total);
    if (at < 0) at = top.length;
    top.splice(at, 0, { layout: cloneLayout(layout), total, key });
    if (top.length > limit) top.pop();
}

// Totals recorded from incremental deltas drift slightly; report full evaluations.
function rescoreRanked(top: RankedEntry[], corpus: PreparedCorpus, context: ScoringContext): RankedLayout[] {
    return top
        .map(({ layout }) => ({ layout, total: computeTotalCost(layout, corpus, context) }))
        .sort((a, b) => a.total - b.total);
}

export interface LayoutScore {
    layout: Layout;
    breakdown: CostBreakdown;
}

/** Scores the start layout the configuration describes, without searching. */
export function scoreStartLayout(
    stats: CorpusStats,
    _config: Record<string, unknown> = {},
    startLayout?: Layout,
): LayoutScore {
    const config = normalizeAnnealerConfig(_config);
    const layout = resolveStartLayout(config, startLayout, createSeededRandom(config.seed));
    validateLayout(layout, config.alphabet, config.slotTable);
    const corpus = prepareCorpus(stats, config.alphabet);
    const context = createScoringContext(config.costModel);
    return { layout, breakdown: evaluateLayout(layout, corpus, context) };
}

export interface RefineResult extends LayoutScore {
    startCost: number;
    swaps: number;
}

/**
 * Steepest descent over single transpositions: scores every pair of enabled
 * slots, applies the best improving swap, and repeats until no swap lowers the
 * total. Deterministic; `start` is not modified.
 */
export function refineLayout(
    start: Layout,
    corpus: PreparedCorpus,
    context: ScoringContext,
    table: SlotTable,
): { layout: Layout; swaps: number } {
    const layout = cloneLayout(start);
    const ids = table.slots.map((slot) => slot.id);
    let swaps = 0;

    for (;;) {
        let bestDelta = -IMPROVEMENT_EPSILON;
        let bestA = -1;
        let bestB = -1;
        for (let i = 0; i < ids.length; i++) {
            for (let j = i + 1; j < ids.length; j++) {
                const delta = computeSwapDelta(layout, corpus, context, ids[i], ids[j]);
                if (delta < bestDelta) {
                    bestDelta = delta;
                    bestA = ids[i];
                    bestB = ids[j];
                }
            }
        }
        if (bestA < 0) return { layout, swaps };
        swapSlots(layout, bestA, bestB);
        swaps++;
    }
}

/** Refines the start layout the configuration describes. */
export function refineStartLayout(
    stats: CorpusStats,
    _config: Record<string, unknown> = {},
    startLayout?: Layout,
): RefineResult {
    const config = normalizeAnnealerConfig(_config);
    const start = resolveStartLayout(config, startLayout, createSeededRandom(config.seed));
    validateLayout(start, config.alphabet, config.slotTable);
    const corpus = prepareCorpus(stats, config.alphabet);
    const context = createScoringContext(config.costModel);
    const { layout, swaps } = refineLayout(start, corpus, context, config.slotTable);
    return {
        layout,
        breakdown: evaluateLayout(layout, corpus, context),
        startCost: computeTotalCost(start, corpus, context),
        swaps,
    };
}

function resolveStartLayout(config: AnnealerRuntimeConfig, provided: Layout | undefined, random: RandomFn): Layout {
    if (provided) return cloneLayout(provided);
    if (config.startAssignment) return layoutFromAssignment(config.startAssignment, config.slotTable);
    if (config.start === 'random') return createRandomLayout(config.alphabet, config.slotTable, random);
    return createReferenceLayout(config.alphabet, config.slotTable);
}

// ─── Moves ───────────────────────────────────────────────

/**
 * Picks a character uniformly, then a partner slot: any other enabled slot, or
 * with probability `withinKeyMoveRate` another role on the same key. The
 * partner may be empty. Keys with a single enabled slot fall back to the
 * unrestricted swap.
 */
export function proposeMove(layout: Layout, config: AnnealerRuntimeConfig, random: RandomFn): SwapMove {
    const char = config.alphabet[randomInt(random, config.alphabet.length)];
    const a = layout.positions.get(char) ?? config.slotTable.slots[0].id;
    const sameKey = config.slotTable.byKey[describeSlot(a).key];

    if (random() < config.withinKeyMoveRate && sameKey.length > 1) {
        return { operator: 'swap_within_key', a, b: pickOther(sameKey, a, random) };
    }
    const all = config.slotTable.slots.map((slot) => slot.id);
    return { operator: 'swap_slots', a, b: pickOther(all, a, random) };
}

function pickOther(ids: number[], exclude: number, random: RandomFn): number {
    const excludeIndex = ids.indexOf(exclude);
    if (excludeIndex < 0) return ids[randomInt(random, ids.length)];
    const pick = randomInt(random, ids.length - 1);
    return ids[pick >= excludeIndex ? pick + 1 : pick];
}
