// ─── Enums ───────────────────────────────────────────────

/** How a character is produced on its key: a plain tap or an outward swipe. */
export enum Role {
  TAP = 'TAP',
  SWIPE_UP = 'SWIPE_UP',
  SWIPE_RIGHT = 'SWIPE_RIGHT',
  SWIPE_DOWN = 'SWIPE_DOWN',
  SWIPE_LEFT = 'SWIPE_LEFT',
}

/** Slot order within a key. A slot id is `key * ROLES.length + roleIndex(role)`. */
export const ROLES: readonly Role[] = [Role.TAP, Role.SWIPE_UP, Role.SWIPE_RIGHT, Role.SWIPE_DOWN, Role.SWIPE_LEFT];

export enum Adjacency {
  SAME = 'SAME',
  NEIGHBOR = 'NEIGHBOR',
  NONE = 'NONE',
}

export type FrequencyCombine = 'product' | 'sum';

export type RandomFn = () => number;

// ─── Keyboard ────────────────────────────────────────────

export interface Point {
  x: number;
  y: number;
}

export interface KeySpec {
  index: number; // 0..8, row-major
  row: number;
  col: number;
  x: number; // center x
  y: number; // center y
  width: number; // target width used by the movement-time law
}

export interface KeyboardGeometry {
  keys: KeySpec[]; // sorted by index
}

export interface Slot {
  id: number;
  key: number;
  role: Role;
}

export interface SlotTable {
  /** Enabled slots, ascending by id. */
  slots: Slot[];
  /** Indexed by slot id; false for slots the configuration switches off. */
  enabled: boolean[];
  /** Enabled slot ids per key. */
  byKey: number[][];
}

// ─── Layout ──────────────────────────────────────────────

export interface Layout {
  /** Character held by each slot id, or null when empty. */
  slots: (string | null)[];
  /** Reverse index: character -> slot id. Always kept in sync with `slots`. */
  positions: Map<string, number>;
}

/** A slot given either by id or by key and role, as read from layout files. */
export type SlotRef = number | { key: number; role: Role };

// ─── Corpus ──────────────────────────────────────────────

export interface CorpusStats {
  unigrams: Record<string, number>;
  /** Keyed by the two-character string, e.g. `th`. */
  bigrams: Record<string, number>;
}

export interface WeightedBigram {
  from: number; // alphabet index
  to: number; // alphabet index
  weight: number; // probability
}

export interface PreparedCorpus {
  alphabet: string[];
  index: Map<string, number>;
  /** Unigram probability per alphabet index. */
  unigrams: number[];
  bigrams: WeightedBigram[];
  /** Indices into `bigrams` touching each character, each listed once. */
  incident: number[][];
}

// ─── Cost model ──────────────────────────────────────────

export interface SwipeAdjacencyModel {
  weight: number;
  sameKeyFactor: number;
  neighborFactor: number;
  combine: FrequencyCombine;
}

export interface CostModel {
  geometry: KeyboardGeometry;
  fittsA: number;
  fittsB: number;
  swipeDistance: number;
  swipePenalty: number;
  restPoint: Point;
  adjacency: SwipeAdjacencyModel;
}

export interface CharacterCost {
  char: string;
  slot: number;
  /** Bigram movement cost charged to typing this character. */
  base: number;
  /** Half of every swipe-adjacency pair this character belongs to. */
  swipePenalty: number;
  /** Cost of pressing it from the resting point. Reporting only, not part of the total. */
  isolated: number;
}

export interface SwipePairCost {
  first: string;
  second: string;
  adjacency: Adjacency;
  penalty: number;
}

export interface CostBreakdown {
  total: number;
  baseCost: number;
  swipePenaltyCost: number;
  characters: CharacterCost[]; // alphabet order
  swipePairs: SwipePairCost[]; // alphabet order of (first, second)
}

// ─── Helper ──────────────────────────────────────────────

export function roleIndex(role: Role): number {
  switch (role) {
    case Role.TAP: return 0;
    case Role.SWIPE_UP: return 1;
    case Role.SWIPE_RIGHT: return 2;
    case Role.SWIPE_DOWN: return 3;
    case Role.SWIPE_LEFT: return 4;
  }
}

export function isSwipeRole(role: Role): boolean {
  return role !== Role.TAP;
}

/** Screen-space unit vector of a swipe (y grows downward). Taps do not move. */
export function roleToDelta(role: Role): { dx: number; dy: number } {
  switch (role) {
    case Role.TAP: return { dx: 0, dy: 0 };
    case Role.SWIPE_UP: return { dx: 0, dy: -1 };
    case Role.SWIPE_RIGHT: return { dx: 1, dy: 0 };
    case Role.SWIPE_DOWN: return { dx: 0, dy: 1 };
    case Role.SWIPE_LEFT: return { dx: -1, dy: 0 };
  }
}

export function normalizeRole(rawRole: unknown): Role | null {
  if (typeof rawRole !== 'string') return null;
  switch (rawRole.toUpperCase()) {
    case Role.TAP:
      return Role.TAP;
    case Role.SWIPE_UP:
    case 'UP':
      return Role.SWIPE_UP;
    case Role.SWIPE_RIGHT:
    case 'RIGHT':
      return Role.SWIPE_RIGHT;
    case Role.SWIPE_DOWN:
    case 'DOWN':
      return Role.SWIPE_DOWN;
    case Role.SWIPE_LEFT:
    case 'LEFT':
      return Role.SWIPE_LEFT;
    default:
      return null;
  }
}
