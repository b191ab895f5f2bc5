import { UsageError } from './errors';

/** Depth-first visiting orders used by `traverse` and `print`. */
export type TraversalOrder = 'pre' | 'in' | 'post';

/** Lookup strategies used by `search`. */
export type SearchStrategy = 'dfs' | 'bfs';

export const TRAVERSAL_ORDERS: readonly TraversalOrder[] = ['pre', 'in', 'post'];
export const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['dfs', 'bfs'];

function isTraversalOrder(tag: string): tag is TraversalOrder {
    return TRAVERSAL_ORDERS.some(order => order === tag);
}

function isSearchStrategy(tag: string): tag is SearchStrategy {
    return SEARCH_STRATEGIES.some(strategy => strategy === tag);
}

/**
 * Parses a case-insensitive order tag (`'Pre'`, `'in'`, `'POST'`).
 * @throws UsageError for anything else.
 */
export function parseTraversalOrder(tag: string): TraversalOrder {
    const normalized = tag.trim().toLowerCase();
    if (isTraversalOrder(normalized)) return normalized;
    throw new UsageError(`Unknown traversal order "${tag}". Expected one of: ${TRAVERSAL_ORDERS.join(', ')}.`);
}

/**
 * Parses a case-insensitive strategy tag (`'DFS'`, `'bfs'`).
 * @throws UsageError for anything else.
 */
export function parseSearchStrategy(tag: string): SearchStrategy {
    const normalized = tag.trim().toLowerCase();
    if (isSearchStrategy(normalized)) return normalized;
    throw new UsageError(`Unknown search strategy "${tag}". Expected one of: ${SEARCH_STRATEGIES.join(', ')}.`);
}
