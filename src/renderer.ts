import { type CostBreakdown, type Layout, Role } from './types';
import { GRID_SIDE, getSlotId } from './keyboard';

const KEY_SEPARATOR = '|';
const ROW_SEPARATOR = ['-------', '-------', '-------'].join('+');

function printable(char: string | null): string {
    if (char === null) return ' ';
    return char === ' ' ? '␣' : char;
}

/**
 * Draws the layout as a 3x3 grid, three text lines per key row:
 *
 *     up            |   u   |
 *     left tap right| l t r |
 *     down          |   d   |
 *
 * Empty and disabled slots print as blanks.
 */
export function renderLayout(layout: Layout): string {
    const lines: string[] = [];
    const at = (key: number, role: Role): string => printable(layout.slots[getSlotId(key, role)]);

    for (let row = 0; row < GRID_SIDE; row++) {
        const top: string[] = [];
        const middle: string[] = [];
        const bottom: string[] = [];
        for (let col = 0; col < GRID_SIDE; col++) {
            const key = row * GRID_SIDE + col;
            top.push(`   ${at(key, Role.SWIPE_UP)}   `);
            middle.push(` ${at(key, Role.SWIPE_LEFT)} ${at(key, Role.TAP)} ${at(key, Role.SWIPE_RIGHT)} `);
            bottom.push(`   ${at(key, Role.SWIPE_DOWN)}   `);
        }
        lines.push(top.join(KEY_SEPARATOR), middle.join(KEY_SEPARATOR), bottom.join(KEY_SEPARATOR));
        if (row < GRID_SIDE - 1) lines.push(ROW_SEPARATOR);
    }
    return lines.join('\n');
}

export function formatCostSummary(breakdown: CostBreakdown, topCount = 5): string {
    const lines = [
        `total: ${breakdown.total.toFixed(4)}`,
        `base: ${breakdown.baseCost.toFixed(4)}`,
        `swipe penalty: ${breakdown.swipePenaltyCost.toFixed(4)}`,
        'costliest characters:',
    ];

    const characters = breakdown.characters
        .filter((entry) => entry.base + entry.swipePenalty > 0)
        .sort((a, b) => (b.base + b.swipePenalty) - (a.base + a.swipePenalty))
        .slice(0, topCount);
    if (characters.length === 0) lines.push('  (none)');
    for (const entry of characters) {
        lines.push(`  ${printable(entry.char)} base=${entry.base.toFixed(4)} swipe=${entry.swipePenalty.toFixed(4)}`);
    }

    lines.push('swipe pairs:');
    const pairs = breakdown.swipePairs
        .slice()
        .sort((a, b) => b.penalty - a.penalty)
        .slice(0, topCount);
    if (pairs.length === 0) lines.push('  (none)');
    for (const pair of pairs) {
        lines.push(
            `  ${printable(pair.first)}${printable(pair.second)} ${pair.adjacency.toLowerCase()} ${pair.penalty.toFixed(4)}`,
        );
    }
    return lines.join('\n');
}
