import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseSearchStrategy, parseTraversalOrder, treeOf, UsageError } from '../src/index';

describe('parseTraversalOrder', () => {
    it('accepts known tags in any case', () => {
        assert.equal(parseTraversalOrder('Pre'), 'pre');
        assert.equal(parseTraversalOrder('in'), 'in');
        assert.equal(parseTraversalOrder(' POST '), 'post');
    });

    it('rejects unknown tags', () => {
        assert.throws(() => parseTraversalOrder('level'), UsageError);
        assert.throws(() => parseTraversalOrder(''), UsageError);
    });

    it('feeds traverse', () => {
        const tree = treeOf<number>(2, 1, 3);
        assert.deepEqual(tree.traverse(parseTraversalOrder('Post')), [1, 3, 2]);
    });
});

describe('parseSearchStrategy', () => {
    it('accepts DFS and BFS in any case', () => {
        assert.equal(parseSearchStrategy('DFS'), 'dfs');
        assert.equal(parseSearchStrategy('bfs'), 'bfs');
    });

    it('rejects unknown strategies', () => {
        assert.throws(
            () => parseSearchStrategy('random'),
            { message: 'UsageError: Unknown search strategy "random". Expected one of: dfs, bfs.' }
        );
    });

    it('feeds search', () => {
        const tree = treeOf<number>(10, 5, 15, 3);
        assert.equal(tree.search(3, parseSearchStrategy('BFS')), true);
        assert.equal(tree.search(4, parseSearchStrategy('BFS')), false);
    });
});
