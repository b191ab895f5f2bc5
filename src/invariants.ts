import type { AVLTree, TreeNodeView } from './avl-tree';
import { InvariantViolation } from './errors';

/**
 * Walks the whole tree and throws on the first broken invariant:
 * - order: left < node < right (strict, so no duplicates)
 * - balance: cached balance factor in {-1, 0, 1}
 * - height: cached height and balance factor match the children
 * - size: `tree.size` equals the number of reachable nodes
 *
 * Complexity: O(N).
 */
export function checkInvariants<T>(tree: AVLTree<T>): void {
    const compare = tree.comparator;
    let count = 0;

    function walk(node: TreeNodeView<T> | null, low: TreeNodeView<T> | null, high: TreeNodeView<T> | null): number {
        if (!node) return -1;
        count++;

        if (low && compare(low.val, node.val) >= 0) {
            throw new InvariantViolation('order', `${String(node.val)} is not greater than ancestor ${String(low.val)}`);
        }
        if (high && compare(node.val, high.val) >= 0) {
            throw new InvariantViolation('order', `${String(node.val)} is not less than ancestor ${String(high.val)}`);
        }

        const lh = walk(node.left, low, node);
        const rh = walk(node.right, node, high);

        const expected = Math.max(lh, rh) + 1;
        if (node.height !== expected) {
            throw new InvariantViolation('height', `node ${String(node.val)} caches height ${node.height}, actual ${expected}`);
        }
        if (node.balanceFactor !== rh - lh) {
            throw new InvariantViolation('height', `node ${String(node.val)} caches balance ${node.balanceFactor}, actual ${rh - lh}`);
        }
        if (node.balanceFactor < -1 || node.balanceFactor > 1) {
            throw new InvariantViolation('balance', `node ${String(node.val)} has balance factor ${node.balanceFactor}`);
        }
        return expected;
    }

    const root = tree.peekRoot();
    walk(root ? root : null, null, null);

    if (count !== tree.size) {
        throw new InvariantViolation('size', `size is ${tree.size} but ${count} nodes are reachable`);
    }
}
