import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AVLTree, checkInvariants, emptyTree, InvariantViolation } from '../src/index';

// === Test Utilities ===

/** Deterministic PRNG (mulberry32) so failures are reproducible. */
function seededRandom(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6D2B79F5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function shuffled(values: number[], random: () => number): number[] {
    const res = values.slice();
    for (let i = res.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [res[i], res[j]] = [res[j], res[i]];
    }
    return res;
}

// ============================================================================
// 1. Invariant Preservation
// ============================================================================
describe('invariants under mutation', () => {
    it('hold after every step of a random insert/remove sequence', () => {
        const random = seededRandom(7);
        const tree = emptyTree<number>();
        const mirror = new Set<number>();

        for (let step = 0; step < 3000; step++) {
            const value = Math.floor(random() * 250);
            if (random() < 0.6) {
                tree.insert(value);
                mirror.add(value);
            } else {
                tree.remove(value);
                mirror.delete(value);
            }
            checkInvariants(tree);
            assert.equal(tree.size, mirror.size);
        }
        assert.deepEqual(tree.toArray(), [...mirror].sort((a, b) => a - b));
        assert.equal(tree.isBalanced(), true);
    });

    it('round-trips any insertion order', () => {
        const random = seededRandom(42);
        const values = Array.from({ length: 500 }, (_, i) => i * 3);
        const tree = AVLTree.from(shuffled(values, random), (a: number, b: number) => a - b);

        assert.equal(tree.size, values.length);
        for (const v of values) assert.equal(tree.contains(v), true);
        assert.equal(tree.contains(1), false);
        checkInvariants(tree);
    });

    it('keeps sorted input logarithmically shallow', () => {
        const tree = emptyTree<number>();
        for (let i = 0; i < 1023; i++) tree.insert(i);
        assert.equal(tree.height, 9);
        checkInvariants(tree);
    });

    it('drains to empty in random order', () => {
        const random = seededRandom(3);
        const values = Array.from({ length: 200 }, (_, i) => i);
        const tree = AVLTree.from(shuffled(values, random), (a: number, b: number) => a - b);
        for (const v of shuffled(values, random)) {
            tree.remove(v);
            checkInvariants(tree);
        }
        assert.equal(tree.isEmpty(), true);
    });
});

// ============================================================================
// 2. Checker Detects Corruption
// ============================================================================
describe('checkInvariants', () => {
    it('accepts the empty tree', () => {
        checkInvariants(emptyTree<number>());
    });

    it('reports an order violation when the comparator changes underneath the tree', () => {
        let reversed = false;
        const tree = new AVLTree<number>((a, b) => (reversed ? b - a : a - b));
        [1, 2, 3].forEach(x => tree.insert(x));
        checkInvariants(tree);

        reversed = true;
        assert.throws(() => checkInvariants(tree), (err: unknown) => {
            assert.ok(err instanceof InvariantViolation);
            assert.equal(err.invariant, 'order');
            assert.equal(err.message, 'InvariantViolation (order): 1 is not less than ancestor 2');
            return true;
        });
    });
});

// ============================================================================
// 3. Strategy Agreement
// ============================================================================
describe('dfs and bfs mutation', () => {
    it('produce identical shapes and rotations for the same operations', () => {
        const random = seededRandom(11);
        const dfsLog: string[] = [];
        const bfsLog: string[] = [];
        const byDepth = emptyTree<number>({ onRotate: (kind, pivot) => { dfsLog.push(`${kind}@${pivot}`); } });
        const byLevel = emptyTree<number>({ onRotate: (kind, pivot) => { bfsLog.push(`${kind}@${pivot}`); } });

        for (let step = 0; step < 2000; step++) {
            const value = Math.floor(random() * 150);
            if (random() < 0.6) {
                byDepth.insert(value, 'dfs');
                byLevel.insert(value, 'bfs');
            } else {
                byDepth.remove(value, 'dfs');
                byLevel.remove(value, 'bfs');
            }
            checkInvariants(byLevel);
            assert.equal(byLevel.equals(byDepth), true, `shapes diverge at step ${step}`);
        }
        assert.deepEqual(bfsLog, dfsLog);
        assert.ok(dfsLog.length > 0);
    });
});
