import {
    type KeyboardGeometry,
    type KeySpec,
    type Point,
    type Slot,
    type SlotTable,
    Adjacency,
    ROLES,
    Role,
    roleIndex,
} from './types';
import { ConfigurationError } from './errors';

export const GRID_SIDE = 3;
export const KEY_COUNT = GRID_SIDE * GRID_SIDE;
export const CENTER_KEY = 4;
export const SLOT_CAPACITY = KEY_COUNT * ROLES.length;

export interface GridGeometryOptions {
    keyWidth?: number;
    keyHeight?: number;
    gap?: number;
}

export function createGridGeometry(options: GridGeometryOptions = {}): KeyboardGeometry {
    const keyWidth = options.keyWidth ?? 1;
    const keyHeight = options.keyHeight ?? 1;
    const gap = options.gap ?? 0;
    const keys: KeySpec[] = [];
    for (let index = 0; index < KEY_COUNT; index++) {
        const row = Math.floor(index / GRID_SIDE);
        const col = index % GRID_SIDE;
        keys.push({
            index,
            row,
            col,
            x: col * (keyWidth + gap) + keyWidth / 2,
            y: row * (keyHeight + gap) + keyHeight / 2,
            width: keyWidth,
        });
    }
    return validateGeometry({ keys });
}

/** Returns the geometry with keys sorted by index, or throws a ConfigurationError. */
export function validateGeometry(geometry: KeyboardGeometry): KeyboardGeometry {
    if (geometry.keys.length !== KEY_COUNT) {
        throw new ConfigurationError(`Geometry must define ${KEY_COUNT} keys, got ${geometry.keys.length}`);
    }
    const keys = geometry.keys.slice().sort((a, b) => a.index - b.index);
    const cells = new Set<string>();
    keys.forEach((key, i) => {
        if (key.index !== i) {
            throw new ConfigurationError(`Geometry key indices must be 0..${KEY_COUNT - 1} without repeats`);
        }
        if (!Number.isInteger(key.row) || !Number.isInteger(key.col)
            || key.row < 0 || key.col < 0 || key.row >= GRID_SIDE || key.col >= GRID_SIDE) {
            throw new ConfigurationError(`Key ${key.index} has grid cell (${key.row}, ${key.col}) outside the 3x3 grid`);
        }
        const cell = `${key.row},${key.col}`;
        if (cells.has(cell)) {
            throw new ConfigurationError(`Keys share grid cell (${key.row}, ${key.col})`);
        }
        cells.add(cell);
        if (!Number.isFinite(key.x) || !Number.isFinite(key.y)) {
            throw new ConfigurationError(`Key ${key.index} has a non-finite center`);
        }
        if (!Number.isFinite(key.width) || key.width <= 0) {
            throw new ConfigurationError(`Key ${key.index} must have a positive width`);
        }
    });
    return { keys };
}

export function keyCenter(geometry: KeyboardGeometry, key: number): Point {
    const spec = geometry.keys[key];
    return { x: spec.x, y: spec.y };
}

/** Keys sharing a side or a corner are neighbors; a key is maximally adjacent to itself. */
export function keyAdjacency(geometry: KeyboardGeometry, a: number, b: number): Adjacency {
    if (a === b) return Adjacency.SAME;
    const ka = geometry.keys[a];
    const kb = geometry.keys[b];
    const chebyshev = Math.max(Math.abs(ka.row - kb.row), Math.abs(ka.col - kb.col));
    return chebyshev <= 1 ? Adjacency.NEIGHBOR : Adjacency.NONE;
}

// ─── Slots ───────────────────────────────────────────────

export function getSlotId(key: number, role: Role): number {
    return key * ROLES.length + roleIndex(role);
}

export function describeSlot(id: number): Slot {
    return { id, key: Math.floor(id / ROLES.length), role: ROLES[id % ROLES.length] };
}

/** With `centerKeySwipes` off, the center key exposes only its tap slot. */
export function createSlotTable(centerKeySwipes = true): SlotTable {
    const slots: Slot[] = [];
    const enabled: boolean[] = [];
    const byKey: number[][] = [];
    for (let key = 0; key < KEY_COUNT; key++) {
        byKey.push([]);
        for (const role of ROLES) {
            const on = centerKeySwipes || key !== CENTER_KEY || role === Role.TAP;
            enabled.push(on);
            if (!on) continue;
            const slot = describeSlot(getSlotId(key, role));
            slots.push(slot);
            byKey[key].push(slot.id);
        }
    }
    return { slots, enabled, byKey };
}

export function isSlotEnabled(table: SlotTable, id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < SLOT_CAPACITY && table.enabled[id];
}
