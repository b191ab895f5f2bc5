import { UsageError } from './errors';

// ============================================================================
// ORDERING
// ============================================================================

export type Primitive = number | string;

/**
 * Values with a built-in total order.
 * Nesting is allowed: sequences of comparables are compared lexicographically.
 */
export type Comparable = Primitive | ReadonlyArray<Comparable>;

/** Negative if a < b, positive if a > b, 0 if equal. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Natural ordering over `Comparable`.
 *
 * Order of Types:
 * 1. Numbers
 * 2. Strings
 * 3. Sequences (by length, then element-wise)
 *
 * @throws UsageError on `NaN` anywhere in either value, nested sequences included.
 */
export function compare(a: Comparable, b: Comparable): number {
    assertOrderable(a);
    assertOrderable(b);
    return compareOrderable(a, b);
}

/** Rejects `NaN` anywhere inside a value, including nested sequences. */
function assertOrderable(v: Comparable): void {
    if (typeof v === 'number') {
        if (Number.isNaN(v)) throw new UsageError('NaN is not supported');
        return;
    }
    if (typeof v === 'string') return;
    for (const item of v) assertOrderable(item);
}

function compareOrderable(a: Comparable, b: Comparable): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    // Type Segregation
    const scoreA = typeScore(a);
    const scoreB = typeScore(b);
    if (scoreA !== scoreB) return scoreA - scoreB;

    if (typeof a === 'object' && typeof b === 'object') return compareSequences(a, b);
    return 0;
}

function typeScore(v: Comparable): number {
    if (typeof v === 'number') return 1;
    return typeof v === 'string' ? 2 : 3;
}

function compareSequences(a: ReadonlyArray<Comparable>, b: ReadonlyArray<Comparable>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compareOrderable(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}
