import {
    type CostModel,
    type FrequencyCombine,
    type KeyboardGeometry,
    type KeySpec,
    type Point,
    type SlotRef,
    type SlotTable,
    type SwipeAdjacencyModel,
} from './types';
import { CENTER_KEY, createGridGeometry, createSlotTable, keyCenter, validateGeometry } from './keyboard';
import {
    ADJACENCY_WEIGHT,
    FITTS_A,
    FITTS_B,
    NEIGHBOR_FACTOR,
    SAME_KEY_FACTOR,
    SWIPE_DISTANCE,
    SWIPE_PENALTY,
} from './scoring';
import { parseAssignment } from './layout';
import { DEFAULT_SEED } from './random';
import { ConfigurationError } from './errors';

export const LETTERS = 'abcdefghijklmnopqrstuvwxyz';
export const SYMBOLS = '.,?!\'-:;"@/&';

export type AlphabetPreset = 'letters' | 'letters+symbols';
export type StartMode = 'reference' | 'random';

interface ScheduleProfile {
    initialTemp: number;
    coolingRate: number;
    minTemp: number;
    iterationsPerTemp: number;
    maxIterations: number;
}

const SCHEDULE: ScheduleProfile = {
    initialTemp: 0.01,
    coolingRate: 0.95,
    minTemp: 1e-5,
    iterationsPerTemp: 300,
    maxIterations: 60000,
};

export interface AnnealerRuntimeConfig {
    alphabet: string[];
    slotTable: SlotTable;
    costModel: CostModel;
    initialTemp: number;
    coolingRate: number;
    minTemp: number;
    iterationsPerTemp: number;
    maxIterations: number;
    seed: number;
    withinKeyMoveRate: number;
    incremental: boolean;
    start: StartMode;
    startAssignment: Record<string, SlotRef> | null;
    progressInterval: number;
    /** Distinct layouts kept in the ranking, best first. */
    topCount: number;
}

export function normalizeAnnealerConfig(config: Record<string, unknown> = {}): AnnealerRuntimeConfig {
    const alphabet = resolveAlphabet(config.alphabet);
    const slotTable = createSlotTable(pickBoolean(config.centerKeySwipes, true));
    if (alphabet.length > slotTable.slots.length) {
        throw new ConfigurationError(
            `Alphabet of ${alphabet.length} characters exceeds the ${slotTable.slots.length} available slots`,
        );
    }

    const iterationsPerTemp = pickPositiveInteger(config.iterationsPerTemp, SCHEDULE.iterationsPerTemp);
    return {
        alphabet,
        slotTable,
        costModel: normalizeCostModel(config),
        initialTemp: pickPositiveNumber(config.initialTemp, SCHEDULE.initialTemp),
        coolingRate: pickClampedNumber(config.coolingRate, SCHEDULE.coolingRate, 1e-6, 1 - 1e-9),
        minTemp: pickPositiveNumber(config.minTemp, SCHEDULE.minTemp),
        iterationsPerTemp,
        maxIterations: pickNonNegativeInteger(config.maxIterations, SCHEDULE.maxIterations),
        seed: pickSeed(config.seed) ?? DEFAULT_SEED,
        withinKeyMoveRate: pickClampedNumber(config.withinKeyMoveRate, 0.2, 0, 1),
        incremental: pickBoolean(config.incremental, true),
        start: config.start === 'random' ? 'random' : 'reference',
        startAssignment: config.startLayout === undefined ? null : parseAssignment(config.startLayout),
        progressInterval: pickPositiveInteger(config.progressInterval, iterationsPerTemp),
        topCount: pickPositiveInteger(config.topCount, 1),
    };
}

// ─── Cost model ──────────────────────────────────────────

/** Reads cost options from a flat record; anything absent or unusable takes its default. */
export function normalizeCostModel(config: Record<string, unknown> = {}): CostModel {
    const geometry = pickGeometry(config.geometry);
    return {
        geometry,
        fittsA: pickNonNegativeNumber(config.fittsA, FITTS_A),
        fittsB: pickNonNegativeNumber(config.fittsB, FITTS_B),
        swipeDistance: pickNonNegativeNumber(config.swipeDistance, SWIPE_DISTANCE),
        swipePenalty: pickNonNegativeNumber(config.swipePenalty, SWIPE_PENALTY),
        restPoint: pickPoint(config.restPoint, keyCenter(geometry, CENTER_KEY)),
        adjacency: pickAdjacencyModel(config.adjacency),
    };
}

function pickAdjacencyModel(value: unknown): SwipeAdjacencyModel {
    const raw = isRecord(value) ? value : {};
    const combine: FrequencyCombine = raw.combine === 'sum' ? 'sum' : 'product';
    return {
        weight: pickNonNegativeNumber(raw.weight, ADJACENCY_WEIGHT),
        sameKeyFactor: pickNonNegativeNumber(raw.sameKeyFactor, SAME_KEY_FACTOR),
        neighborFactor: pickNonNegativeNumber(raw.neighborFactor, NEIGHBOR_FACTOR),
        combine,
    };
}

function pickGeometry(value: unknown): KeyboardGeometry {
    if (value === undefined) return createGridGeometry();
    if (!isRecord(value)) throw new ConfigurationError('geometry must be an object');
    if (value.keys === undefined) {
        return createGridGeometry({
            keyWidth: pickPositiveNumber(value.keyWidth, 1),
            keyHeight: pickPositiveNumber(value.keyHeight, 1),
            gap: pickNonNegativeNumber(value.gap, 0),
        });
    }
    if (!Array.isArray(value.keys)) throw new ConfigurationError('geometry.keys must be an array');
    const keys: KeySpec[] = value.keys.map((rawKey: unknown, i: number) => {
        if (!isRecord(rawKey)) throw new ConfigurationError(`geometry.keys[${i}] must be an object`);
        const fields = ['index', 'row', 'col', 'x', 'y', 'width'] as const;
        for (const field of fields) {
            if (typeof rawKey[field] !== 'number') {
                throw new ConfigurationError(`geometry.keys[${i}].${field} must be a number`);
            }
        }
        return {
            index: Number(rawKey.index),
            row: Number(rawKey.row),
            col: Number(rawKey.col),
            x: Number(rawKey.x),
            y: Number(rawKey.y),
            width: Number(rawKey.width),
        };
    });
    return validateGeometry({ keys });
}

function pickPoint(value: unknown, fallback: Point): Point {
    if (!isRecord(value)) return fallback;
    const { x, y } = value;
    if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
        return fallback;
    }
    return { x, y };
}

// ─── Alphabet ────────────────────────────────────────────

/** Accepts a preset name, a string of characters, or an array of single characters. */
export function resolveAlphabet(value: unknown): string[] {
    if (value === undefined || value === 'letters') return Array.from(LETTERS);
    if (value === 'letters+symbols') return Array.from(LETTERS + SYMBOLS);

    let chars: string[];
    if (typeof value === 'string') {
        chars = Array.from(value);
    } else if (Array.isArray(value) && value.every((c): c is string => typeof c === 'string' && Array.from(c).length === 1)) {
        chars = value.slice();
    } else {
        throw new ConfigurationError('alphabet must be "letters", "letters+symbols", a string or an array of characters');
    }
    if (chars.length === 0) throw new ConfigurationError('alphabet must not be empty');
    const seen = new Set<string>();
    for (const char of chars) {
        if (seen.has(char)) throw new ConfigurationError(`alphabet repeats "${char}"`);
        seen.add(char);
    }
    return chars;
}

// ─── Pickers ─────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickPositiveInteger(value: unknown, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
    return Math.max(1, Math.floor(value));
}

function pickNonNegativeInteger(value: unknown, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
    return Math.max(0, Math.floor(value));
}

function pickPositiveNumber(value: unknown, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return fallback;
    return value;
}

function pickNonNegativeNumber(value: unknown, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return fallback;
    return value;
}

function pickClampedNumber(value: unknown, fallback: number, min: number, max: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
    return Math.max(min, Math.min(max, value));
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
    if (typeof value !== 'boolean') return fallback;
    return value;
}

function pickSeed(value: unknown): number | undefined {
    if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
    return Math.floor(value);
}
