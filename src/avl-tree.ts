/**
 * @module avl-tree
 * @description
 * Mutable ordered set implemented as an AVL tree.
 *
 * * Features:
 * - O(log N) search, insert and remove.
 * - Exclusive ownership: nodes are never shared between trees.
 * - Shape-sensitive structural equality.
 *
 * * Contracts:
 * - The comparator is a total order and stays consistent for the tree's lifetime.
 * - Elements must not be mutated in a way that changes their order after insertion.
 * - No duplicates: inserting an element that compares equal to a stored one is a no-op.
 */

import type { Comparator } from './compare';
import { parseSearchStrategy, parseTraversalOrder } from './traversal';
import type { SearchStrategy, TraversalOrder } from './traversal';

// ============================================================================
// 1. NODE
// ============================================================================

/**
 * Read-only view of a tree node handed out by `peekRoot()`.
 * Holding one does not transfer ownership.
 */
export interface TreeNodeView<T> {
    readonly val: T;
    readonly left: TreeNodeView<T> | null;
    readonly right: TreeNodeView<T> | null;
    /** Longest path to a descendant leaf. Leaf = 0. */
    readonly height: number;
    /** $Height(right) - Height(left)$. */
    readonly balanceFactor: number;
}

class AVLNode<T> implements TreeNodeView<T> {
    constructor(
        public val: T,
        public left: AVLNode<T> | null = null,
        public right: AVLNode<T> | null = null,
        /** Height of the node. Leaf = 0. Null = -1. */
        public height: number = 0,
        public balanceFactor: number = 0
    ) {}
}

/** Single rotations and the two double (elbow) rotations. */
export type RotationKind = 'left' | 'right' | 'right-left' | 'left-right';

export interface AVLTreeHooks<T> {
    /**
     * Called once per rebalancing step, in the order the steps ran, after the
     * insert/remove has finished. `pivot` is the element of the node that was out of balance.
     */
    onRotate?(kind: RotationKind, pivot: T): void;
}

interface TreeContext<T> {
    readonly compare: Comparator<T>;
    readonly hooks: AVLTreeHooks<T>;
}

/**
 * Outcome of one insert/remove: whether the element set changed, and the
 * rotations performed. Hooks see the rotations only once the tree is consistent again.
 */
interface Mutation<T> {
    applied: boolean;
    readonly rotations: Array<[RotationKind, T]>;
}

function newMutation<T>(): Mutation<T> {
    return { applied: false, rotations: [] };
}

function getHeight<T>(n: AVLNode<T> | null): number { return n ? n.height : -1; }

/**
 * Re-calculates the cached height and balance factor of a node.
 * Must be called whenever a child of `n` changes.
 *
 * $$Height(n) = 1 + \max(Height(n.left), Height(n.right))$$
 * $$BF(n) = Height(n.right) - Height(n.left)$$
 */
function updateHeight<T>(n: AVLNode<T>) {
    const lh = getHeight(n.left);
    const rh = getHeight(n.right);
    n.height = (lh > rh ? lh : rh) + 1;
    n.balanceFactor = rh - lh;
}

// ============================================================================
// 2. ROTATIONS
// ============================================================================

/**
 * Left rotation, for a right-leaning stick.
 *
 * x               y
 *  \             / \
 *   y     -->   x   T3
 *  / \           \
 * T2  T3          T2
 *
 * @returns The new subtree root `y`.
 */
function rotateLeft<T>(x: AVLNode<T>): AVLNode<T> {
    const y = x.right;
    if (!y) return x;

    x.right = y.left;
    y.left = x;

    // x is now a child of y: update it first
    updateHeight(x);
    updateHeight(y);
    return y;
}

/**
 * Right rotation, for a left-leaning stick.
 *
 *     y           x
 *    /           / \
 *   x     -->  T1   y
 *  / \             /
 * T1  T2          T2
 *
 * @returns The new subtree root `x`.
 */
function rotateRight<T>(y: AVLNode<T>): AVLNode<T> {
    const x = y.left;
    if (!x) return y;

    y.left = x.right;
    x.right = y;

    updateHeight(y);
    updateHeight(x);
    return x;
}

/** Right-left elbow: straighten the right child into a stick, then rotate left. */
function rotateRightLeft<T>(node: AVLNode<T>): AVLNode<T> {
    if (node.right) node.right = rotateRight(node.right);
    return rotateLeft(node);
}

/** Left-right elbow: straighten the left child into a stick, then rotate right. */
function rotateLeftRight<T>(node: AVLNode<T>): AVLNode<T> {
    if (node.left) node.left = rotateLeft(node.left);
    return rotateRight(node);
}

/**
 * Refreshes `node`'s cached metadata and repairs a ±2 balance factor.
 * A child balance factor of 0 counts as a stick (single rotation).
 *
 * @returns The new (potentially rotated) root of the subtree.
 */
function rebalance<T>(node: AVLNode<T>, mutation: Mutation<T>): AVLNode<T> {
    updateHeight(node);

    if (node.balanceFactor > 1) {
        const elbow = node.right !== null && node.right.balanceFactor < 0;
        mutation.rotations.push([elbow ? 'right-left' : 'left', node.val]);
        return elbow ? rotateRightLeft(node) : rotateLeft(node);
    }
    if (node.balanceFactor < -1) {
        const elbow = node.left !== null && node.left.balanceFactor > 0;
        mutation.rotations.push([elbow ? 'left-right' : 'right', node.val]);
        return elbow ? rotateLeftRight(node) : rotateRight(node);
    }
    return node;
}

// ============================================================================
// 3. RECURSIVE OPERATIONS
// ============================================================================

/**
 * Inserts `val` below `node`, rebalancing every ancestor on the way up.
 * @returns The new root of the subtree.
 */
function insertNode<T>(ctx: TreeContext<T>, node: AVLNode<T> | null, val: T, mutation: Mutation<T>): AVLNode<T> {
    if (!node) {
        mutation.applied = true;
        return new AVLNode(val);
    }

    const cmp = ctx.compare(val, node.val);
    if (cmp === 0) return node;

    if (cmp > 0) node.right = insertNode(ctx, node.right, val, mutation);
    else node.left = insertNode(ctx, node.left, val, mutation);

    return rebalance(node, mutation);
}

/** Rightmost node of a subtree: the in-order predecessor of its parent's element. */
function maxNode<T>(node: AVLNode<T>): AVLNode<T> {
    let current = node;
    while (current.right) current = current.right;
    return current;
}

function minNode<T>(node: AVLNode<T>): AVLNode<T> {
    let current = node;
    while (current.left) current = current.left;
    return current;
}

/**
 * Removes `val` from the subtree.
 * A node with two children takes over its in-order predecessor's element,
 * and the predecessor is then removed from the left subtree.
 *
 * @returns The new root of the subtree, or null if it became empty.
 */
function removeNode<T>(ctx: TreeContext<T>, node: AVLNode<T> | null, val: T, mutation: Mutation<T>): AVLNode<T> | null {
    if (!node) return null;

    const cmp = ctx.compare(val, node.val);
    if (cmp > 0) {
        node.right = removeNode(ctx, node.right, val, mutation);
    } else if (cmp < 0) {
        node.left = removeNode(ctx, node.left, val, mutation);
    } else if (!node.left || !node.right) {
        // Leaf or single child: promote whatever is there
        mutation.applied = true;
        return node.left ? node.left : node.right;
    } else {
        const predecessor = maxNode(node.left);
        node.val = predecessor.val;
        node.left = removeNode(ctx, node.left, predecessor.val, mutation);
    }

    if (!mutation.applied) return node;
    return rebalance(node, mutation);
}

/**
 * Rebalances a recorded root-to-leaf `path` bottom-up, re-linking each new
 * subtree root into its parent.
 * @returns The new root of the whole tree.
 */
function rebalancePath<T>(path: AVLNode<T>[], mutation: Mutation<T>): AVLNode<T> | null {
    let subtree: AVLNode<T> | null = null;
    for (let i = path.length - 1; i >= 0; i--) {
        const node = path[i];
        subtree = rebalance(node, mutation);
        if (i === 0) break;
        const parent = path[i - 1];
        if (parent.left === node) parent.left = subtree;
        else parent.right = subtree;
    }
    return subtree;
}

/** Detaches every node post-order. Returns the number of nodes released. */
function releaseTree<T>(node: AVLNode<T> | null): number {
    if (!node) return 0;
    const released = releaseTree(node.left) + releaseTree(node.right);
    node.left = null;
    node.right = null;
    return released + 1;
}

function visit<T>(node: AVLNode<T> | null, order: TraversalOrder, acc: T[]) {
    if (!node) return;
    if (order === 'pre') acc.push(node.val);
    visit(node.left, order, acc);
    if (order === 'in') acc.push(node.val);
    visit(node.right, order, acc);
    if (order === 'post') acc.push(node.val);
}

/**
 * Actual height of a subtree, or `null` as soon as some node's subtrees differ by more than one.
 * Ignores the cached heights.
 */
function measureBalanced<T>(node: AVLNode<T> | null): number | null {
    if (!node) return -1;
    const lh = measureBalanced(node.left);
    if (lh === null) return null;
    const rh = measureBalanced(node.right);
    if (rh === null) return null;
    if (Math.abs(rh - lh) > 1) return null;
    return Math.max(lh, rh) + 1;
}

// ============================================================================
// 4. PUBLIC CLASS
// ============================================================================

/**
 * A sorted, unique collection of values kept height-balanced.
 * * Features:
 * - O(log N) insert/remove/contains.
 * - Depth-first or breadth-first lookup, insertion and removal.
 * - Pre/in/post-order traversal.
 * - Copies are independent node graphs with the same shape.
 */
export class AVLTree<T> implements Iterable<T> {
    #root: AVLNode<T> | null = null;
    #size: number = 0;
    readonly #ctx: TreeContext<T>;

    constructor(compare: Comparator<T>, hooks: AVLTreeHooks<T> = {}) {
        this.#ctx = { compare, hooks };
    }

    /**
     * Builds a tree by inserting `elements` in iteration order.
     * Complexity O(N log N).
     */
    static from<U>(elements: Iterable<U>, compare: Comparator<U>, hooks?: AVLTreeHooks<U>): AVLTree<U> {
        const tree = new AVLTree<U>(compare, hooks);
        for (const el of elements) tree.insert(el);
        return tree;
    }

    get size(): number { return this.#size; }
    isEmpty(): boolean { return this.#root === null; }

    /** Height of the root; -1 for the empty tree. */
    get height(): number { return getHeight(this.#root); }

    get comparator(): Comparator<T> { return this.#ctx.compare; }

    /** Read-only view of the root, or undefined if the tree is empty. */
    peekRoot(): TreeNodeView<T> | undefined {
        return this.#root ? this.#root : undefined;
    }

    /** Check if element exists. Complexity: O(log N). */
    contains(element: T): boolean {
        return this.search(element, 'dfs');
    }

    /**
     * Looks up `element`.
     * - `dfs`: walks a single root-to-leaf path.
     * - `bfs`: level-order queue scan that only enqueues the viable child at each level.
     *
     * @throws UsageError if `strategy` is not a known tag.
     */
    search(element: T, strategy: SearchStrategy = 'dfs'): boolean {
        const resolved = parseSearchStrategy(strategy);
        if (!this.#root) return false;
        return resolved === 'dfs' ? this.#searchDFS(element) : this.#searchBFS(element);
    }

    #searchDFS(element: T): boolean {
        let curr = this.#root;
        while (curr) {
            const cmp = this.#ctx.compare(element, curr.val);
            if (cmp === 0) return true;
            curr = cmp > 0 ? curr.right : curr.left;
        }
        return false;
    }

    #searchBFS(element: T): boolean {
        return this.#scanBFS(element).found !== null;
    }

    /**
     * Level-order queue scan that only enqueues the viable child at each level.
     * `path` holds every node dequeued before the match (root first), or the
     * whole descent if there is no match.
     */
    #scanBFS(element: T): { found: AVLNode<T> | null; path: AVLNode<T>[] } {
        const path: AVLNode<T>[] = [];
        if (!this.#root) return { found: null, path };
        const queue: AVLNode<T>[] = [this.#root];
        for (let i = 0; i < queue.length; i++) {
            const node = queue[i];
            const cmp = this.#ctx.compare(element, node.val);
            if (cmp === 0) return { found: node, path };
            path.push(node);
            const next = cmp > 0 ? node.right : node.left;
            if (next) queue.push(next);
        }
        return { found: null, path };
    }

    /**
     * Insert element; no-op if an equal element is present. Complexity: O(log N).
     * Both strategies place the element identically: `dfs` recurses, `bfs`
     * locates the leaf position with a queue scan and rebalances the recorded path.
     *
     * @throws UsageError if `strategy` is not a known tag.
     */
    insert(element: T, strategy: SearchStrategy = 'dfs'): void {
        const resolved = parseSearchStrategy(strategy);
        const mutation = newMutation<T>();
        if (!this.#root) {
            // Lets the comparator reject an element it cannot order
            this.#ctx.compare(element, element);
            this.#root = new AVLNode(element);
            mutation.applied = true;
        } else if (resolved === 'dfs') {
            this.#root = insertNode(this.#ctx, this.#root, element, mutation);
        } else {
            this.#insertBFS(element, mutation);
        }
        if (mutation.applied) this.#size++;
        this.#notify(mutation);
    }

    #insertBFS(element: T, mutation: Mutation<T>) {
        const { found, path } = this.#scanBFS(element);
        if (found || path.length === 0) return;

        const parent = path[path.length - 1];
        const leaf = new AVLNode(element);
        if (this.#ctx.compare(element, parent.val) > 0) parent.right = leaf;
        else parent.left = leaf;
        mutation.applied = true;

        this.#root = rebalancePath(path, mutation);
    }

    /**
     * Remove element; no-op if absent. Complexity: O(log N).
     * @throws UsageError if `strategy` is not a known tag.
     */
    remove(element: T, strategy: SearchStrategy = 'dfs'): void {
        const resolved = parseSearchStrategy(strategy);
        if (!this.#root) return;
        const mutation = newMutation<T>();
        if (resolved === 'dfs') {
            this.#root = removeNode(this.#ctx, this.#root, element, mutation);
        } else {
            this.#removeBFS(element, mutation);
        }
        if (mutation.applied) this.#size--;
        this.#notify(mutation);
    }

    #removeBFS(element: T, mutation: Mutation<T>) {
        const { found: target, path } = this.#scanBFS(element);
        if (!target) return;
        mutation.applied = true;

        let spliced: AVLNode<T> = target;
        let replacement: AVLNode<T> | null;
        if (target.left && target.right) {
            // Walk down to the in-order predecessor, keeping the path for rebalancing
            path.push(target);
            let predecessor = target.left;
            while (predecessor.right) {
                path.push(predecessor);
                predecessor = predecessor.right;
            }
            target.val = predecessor.val;
            spliced = predecessor;
            replacement = predecessor.left;
        } else {
            replacement = target.left ? target.left : target.right;
        }

        if (path.length === 0) {
            this.#root = replacement;
            return;
        }
        const parent = path[path.length - 1];
        if (parent.left === spliced) parent.left = replacement;
        else parent.right = replacement;

        this.#root = rebalancePath(path, mutation);
    }

    /** Reports rotations once `#root` and `#size` are final. */
    #notify(mutation: Mutation<T>) {
        const { onRotate } = this.#ctx.hooks;
        if (!onRotate) return;
        for (const [kind, pivot] of mutation.rotations) onRotate(kind, pivot);
    }

    /** Releases every node bottom-up. */
    clear(): void {
        this.#size -= releaseTree(this.#root);
        this.#root = null;
    }

    min(): T | undefined { return this.#root ? minNode(this.#root).val : undefined; }
    max(): T | undefined { return this.#root ? maxNode(this.#root).val : undefined; }

    /**
     * True if every node's subtrees differ in height by at most one.
     * Recomputes heights instead of trusting the cached ones. O(N).
     */
    isBalanced(): boolean {
        return measureBalanced(this.#root) !== null;
    }

    /**
     * Elements in the requested depth-first order, as a fresh array on every call.
     * @throws UsageError if `order` is not a known tag.
     */
    traverse(order: TraversalOrder): T[] {
        const resolved = parseTraversalOrder(order);
        const res: T[] = [];
        visit(this.#root, resolved, res);
        return res;
    }

    /** Formats a traversal as `[1-2-3]`. The empty tree prints as the empty string. */
    print(order: TraversalOrder, delimiter: string = '-'): string {
        const values = this.traverse(order);
        if (values.length === 0) return '';
        return `[${values.join(delimiter)}]`;
    }

    /** Returns elements as a sorted array. */
    toArray(): T[] { return this.traverse('in'); }

    /**
     * Structural equality: same elements at the same positions.
     * Walks both trees level by level in lockstep, so equal sets with different shapes are not equal.
     */
    equals(other: AVLTree<T>): boolean {
        if (this === other) return true;
        if (this.#size !== other.#size) return false;

        const queueA: AVLNode<T>[] = this.#root ? [this.#root] : [];
        const queueB: AVLNode<T>[] = other.#root ? [other.#root] : [];
        if (queueA.length !== queueB.length) return false;

        for (let i = 0; i < queueA.length; i++) {
            const a = queueA[i];
            const b = queueB[i];
            if (this.#ctx.compare(a.val, b.val) !== 0) return false;
            if ((a.left === null) !== (b.left === null)) return false;
            if ((a.right === null) !== (b.right === null)) return false;
            if (a.left && b.left) { queueA.push(a.left); queueB.push(b.left); }
            if (a.right && b.right) { queueA.push(a.right); queueB.push(b.right); }
        }
        return queueA.length === queueB.length;
    }

    /**
     * Independent copy built by replaying insertions in level order.
     * Parents are always placed before their children, so no rotation fires and the shape is preserved.
     */
    clone(): AVLTree<T> {
        const copy = new AVLTree<T>(this.#ctx.compare, this.#ctx.hooks);
        for (const val of this.#levelOrder()) copy.insert(val);
        return copy;
    }

    *#levelOrder(): Generator<T> {
        if (!this.#root) return;
        const queue: AVLNode<T>[] = [this.#root];
        for (let i = 0; i < queue.length; i++) {
            const node = queue[i];
            yield node.val;
            if (node.left) queue.push(node.left);
            if (node.right) queue.push(node.right);
        }
    }

    /** In-order iteration without recursion. */
    *[Symbol.iterator](): Iterator<T> {
        const stack: AVLNode<T>[] = [];
        let curr = this.#root;
        while (curr || stack.length) {
            while (curr) { stack.push(curr); curr = curr.left; }
            const top = stack.pop();
            if (!top) break;
            yield top.val;
            curr = top.right;
        }
    }

    toString(): string { return `{${this.toArray().join(', ')}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
