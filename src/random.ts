import { type RandomFn } from './types';

export const DEFAULT_SEED = 0x6d2b79f5;

/** 32-bit LCG. Returns values in [0, 1); the same seed always yields the same stream. */
export function createSeededRandom(seed: number = DEFAULT_SEED): RandomFn {
    let state = (seed >>> 0) || DEFAULT_SEED;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

export function randomInt(random: RandomFn, exclusiveMax: number): number {
    return Math.min(exclusiveMax - 1, Math.floor(random() * exclusiveMax));
}

/** Fisher-Yates. Mutates and returns `items`. */
export function shuffleInPlace<T>(items: T[], random: RandomFn): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = randomInt(random, i + 1);
        const tmp = items[i];
        items[i] = items[j];
        items[j] = tmp;
    }
    return items;
}

/** FNV-1a over the string; used to derive per-chain seeds. */
export function stableSeedFromName(name: string): number {
    let hash = 2166136261;
    for (let i = 0; i < name.length; i++) {
        hash ^= name.charCodeAt(i);
        hash = Math.imul(hash, 16777619);
    }
    return hash >>> 0;
}

export function deriveChainSeeds(baseSeed: number, count: number): number[] {
    const seeds: number[] = [];
    for (let i = 0; i < count; i++) {
        seeds.push(i === 0 ? baseSeed : stableSeedFromName(`${baseSeed}:${i}`));
    }
    return seeds;
}
