import { checkInvariants, emptyTree } from './src/index';

// === Utilities ===

function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

const N = Number(process.argv[2] ?? 100_000);

console.log(`=== AVL Tree Benchmark (N = ${N}) ===\n`);

const ascending = Array.from({ length: N }, (_, i) => i);
const scrambled = ascending.map(i => (i * 7919) % N);

// ============================================================================
// 1. Insertion
// ============================================================================
const sortedTree = emptyTree<number>();
measure('insert ascending', () => { for (const v of ascending) sortedTree.insert(v); });

const scrambledTree = emptyTree<number>();
measure('insert scrambled', () => { for (const v of scrambled) scrambledTree.insert(v); });
console.log(`height after ascending inserts: ${sortedTree.height}`);

// ============================================================================
// 2. Lookup
// ============================================================================
const dfsHits = measure('contains (dfs)', () => scrambled.filter(v => sortedTree.search(v, 'dfs')).length);
const bfsHits = measure('contains (bfs)', () => scrambled.filter(v => sortedTree.search(v, 'bfs')).length);
console.log(`hits: dfs=${dfsHits} bfs=${bfsHits}`);

// ============================================================================
// 3. Copy, Equality, Removal
// ============================================================================
const copy = measure('clone', () => sortedTree.clone());
console.log(`clone equals source: ${measure('equals', () => copy.equals(sortedTree))}`);

measure('remove scrambled', () => { for (const v of scrambled) scrambledTree.remove(v); });
console.log(`size after removals: ${scrambledTree.size}`);

measure('checkInvariants', () => checkInvariants(sortedTree));
