/**
 * @module avl-ordered-set
 * Self-balancing ordered set (AVL tree) with structural equality.
 */

import { AVLTree } from './avl-tree';
import type { AVLTreeHooks } from './avl-tree';
import { compare } from './compare';
import type { Comparable } from './compare';

export { AVLTree } from './avl-tree';
export type { AVLTreeHooks, RotationKind, TreeNodeView } from './avl-tree';
export { compare } from './compare';
export type { Comparable, Comparator, Primitive } from './compare';
export { InvariantViolation, UsageError } from './errors';
export { checkInvariants } from './invariants';
export {
    parseSearchStrategy,
    parseTraversalOrder,
    SEARCH_STRATEGIES,
    TRAVERSAL_ORDERS,
} from './traversal';
export type { SearchStrategy, TraversalOrder } from './traversal';

/** Empty tree under the natural ordering of numbers, strings and sequences. */
export function emptyTree<T extends Comparable>(hooks?: AVLTreeHooks<T>): AVLTree<T> {
    return new AVLTree<T>(compare, hooks);
}

/** Tree under the natural ordering, filled by inserting `elements` left to right. */
export function treeOf<T extends Comparable>(...elements: T[]): AVLTree<T> {
    return AVLTree.from<T>(elements, compare);
}
