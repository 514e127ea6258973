import {
    type Layout,
    type RandomFn,
    type SlotRef,
    type SlotTable,
    ROLES,
    normalizeRole,
} from './types';
import { SLOT_CAPACITY, getSlotId, isSlotEnabled, KEY_COUNT } from './keyboard';
import { ConfigurationError, LayoutValidationError } from './errors';
import { shuffleInPlace } from './random';

export function createEmptyLayout(): Layout {
    return {
        slots: new Array<string | null>(SLOT_CAPACITY).fill(null),
        positions: new Map(),
    };
}

export function cloneLayout(layout: Layout): Layout {
    return {
        slots: layout.slots.slice(),
        positions: new Map(layout.positions),
    };
}

/** Identifies a placement; equal keys mean equal layouts. */
export function layoutKey(layout: Layout): string {
    return JSON.stringify(layout.slots);
}

export function getCharacterSlot(layout: Layout, char: string): number | undefined {
    return layout.positions.get(char);
}

/**
 * Exchanges the contents of two slots. Either slot may be empty, so this also
 * moves a single character into a free slot.
 */
export function swapSlots(layout: Layout, a: number, b: number): void {
    if (a === b) return;
    const charA = layout.slots[a];
    const charB = layout.slots[b];
    layout.slots[a] = charB;
    layout.slots[b] = charA;
    if (charA !== null) layout.positions.set(charA, b);
    if (charB !== null) layout.positions.set(charB, a);
}

/** Slot-ordered list of every placement, suitable for JSON output. */
export function layoutToAssignment(layout: Layout): Record<string, number> {
    const assignment: Record<string, number> = {};
    layout.slots.forEach((char, id) => {
        if (char !== null) assignment[char] = id;
    });
    return assignment;
}

// ─── Builders ────────────────────────────────────────────

function ensureCapacity(alphabet: string[], table: SlotTable): void {
    if (alphabet.length > table.slots.length) {
        throw new ConfigurationError(
            `Alphabet of ${alphabet.length} characters exceeds the ${table.slots.length} available slots`,
        );
    }
}

/** Fills every tap slot in key order first, then each swipe direction in turn. */
export function createReferenceLayout(alphabet: string[], table: SlotTable): Layout {
    ensureCapacity(alphabet, table);
    const order: number[] = [];
    for (const role of ROLES) {
        for (let key = 0; key < KEY_COUNT; key++) {
            const id = getSlotId(key, role);
            if (table.enabled[id]) order.push(id);
        }
    }
    const layout = createEmptyLayout();
    alphabet.forEach((char, i) => {
        layout.slots[order[i]] = char;
        layout.positions.set(char, order[i]);
    });
    return layout;
}

export function createRandomLayout(alphabet: string[], table: SlotTable, random: RandomFn): Layout {
    ensureCapacity(alphabet, table);
    const order = shuffleInPlace(table.slots.map((slot) => slot.id), random);
    const layout = createEmptyLayout();
    alphabet.forEach((char, i) => {
        layout.slots[order[i]] = char;
        layout.positions.set(char, order[i]);
    });
    return layout;
}

/**
 * Builds a layout from a character -> slot mapping. Structural problems
 * (unknown slots, two characters in one slot) are rejected here; alphabet
 * coverage is checked by `validateLayout`.
 */
export function layoutFromAssignment(assignment: Record<string, SlotRef>, table: SlotTable): Layout {
    const layout = createEmptyLayout();
    const violations: string[] = [];
    for (const [char, ref] of Object.entries(assignment)) {
        const id = typeof ref === 'number' ? ref : getSlotId(ref.key, ref.role);
        if (typeof ref !== 'number' && (!Number.isInteger(ref.key) || ref.key < 0 || ref.key >= KEY_COUNT)) {
            violations.push(`"${char}" refers to missing key ${ref.key}`);
            continue;
        }
        if (!isSlotEnabled(table, id)) {
            violations.push(`"${char}" is assigned to unavailable slot ${id}`);
            continue;
        }
        const occupant = layout.slots[id];
        if (occupant !== null) {
            violations.push(`"${char}" and "${occupant}" share slot ${id}`);
            continue;
        }
        layout.slots[id] = char;
        layout.positions.set(char, id);
    }
    if (violations.length > 0) throw new LayoutValidationError(violations);
    return layout;
}

/** Reads an assignment from parsed JSON: values are slot ids or `{ key, role }` objects. */
export function parseAssignment(raw: unknown): Record<string, SlotRef> {
    if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
        throw new LayoutValidationError(['layout must be an object mapping characters to slots']);
    }
    const parsed: Record<string, SlotRef> = {};
    const violations: string[] = [];
    for (const [char, value] of Object.entries(raw)) {
        if (typeof value === 'number' && Number.isInteger(value)) {
            parsed[char] = value;
            continue;
        }
        if (value && typeof value === 'object' && 'key' in value && 'role' in value) {
            const key = value.key;
            const role = normalizeRole(value.role);
            if (typeof key === 'number' && role !== null) {
                parsed[char] = { key, role };
                continue;
            }
        }
        violations.push(`"${char}" has an unreadable slot`);
    }
    if (violations.length > 0) throw new LayoutValidationError(violations);
    return parsed;
}

// ─── Validation ──────────────────────────────────────────

export function listLayoutViolations(layout: Layout, alphabet: string[], table: SlotTable): string[] {
    const violations: string[] = [];
    const expected = new Set(alphabet);
    const seen = new Set<string>();

    if (layout.slots.length !== SLOT_CAPACITY) {
        violations.push(`expected ${SLOT_CAPACITY} slots, found ${layout.slots.length}`);
    }
    layout.slots.forEach((char, id) => {
        if (char === null) return;
        if (!table.enabled[id]) violations.push(`"${char}" occupies unavailable slot ${id}`);
        if (!expected.has(char)) violations.push(`"${char}" is not in the alphabet`);
        if (seen.has(char)) violations.push(`"${char}" appears more than once`);
        seen.add(char);
        if (layout.positions.get(char) !== id) violations.push(`index for "${char}" is out of sync`);
    });
    for (const char of alphabet) {
        if (!seen.has(char)) violations.push(`"${char}" has no slot`);
    }
    if (layout.positions.size !== seen.size) {
        violations.push('reverse index holds characters missing from the slots');
    }
    return violations;
}

export function validateLayout(layout: Layout, alphabet: string[], table: SlotTable): void {
    const violations = listLayoutViolations(layout, alphabet, table);
    if (violations.length > 0) throw new LayoutValidationError(violations);
}
