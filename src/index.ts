export * from './types';
export * from './errors';
export {
    CENTER_KEY,
    KEY_COUNT,
    SLOT_CAPACITY,
    createGridGeometry,
    createSlotTable,
    describeSlot,
    getSlotId,
    keyAdjacency,
} from './keyboard';
export {
    cloneLayout,
    createRandomLayout,
    createReferenceLayout,
    getCharacterSlot,
    layoutFromAssignment,
    layoutKey,
    layoutToAssignment,
    listLayoutViolations,
    parseAssignment,
    swapSlots,
    validateLayout,
} from './layout';
export { buildCorpusStats, prepareCorpus } from './corpus';
export {
    type ScoringContext,
    computeSwapDelta,
    computeTotalCost,
    createScoringContext,
    evaluateLayout,
    fittsTime,
    isolatedPressCost,
    keyPressCost,
    pressEndpoint,
} from './scoring';
export {
    type AlphabetPreset,
    type AnnealerRuntimeConfig,
    LETTERS,
    SYMBOLS,
    normalizeAnnealerConfig,
    normalizeCostModel,
    resolveAlphabet,
} from './config';
export { createSeededRandom, deriveChainSeeds } from './random';
export {
    type AnnealProgress,
    type AnnealerHooks,
    type AnnealerResult,
    type ChainRunResult,
    type LayoutScore,
    type OperatorStats,
    type RankedLayout,
    type RefineResult,
    refineLayout,
    refineStartLayout,
    runAnnealer,
    runAnnealingChains,
    scoreStartLayout,
} from './optimizer';
export { formatCostSummary, renderLayout } from './renderer';
