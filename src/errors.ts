/**
 * Error taxonomy of the library.
 *
 * "Not found" situations (empty tree, absent element) are never thrown;
 * they are reported through return values (`false`, `undefined`).
 * The category travels as the message prefix; `name` stays `Error`.
 */

/** Rejected request: unknown tag or an element the comparator cannot order. */
export class UsageError extends Error {
    constructor(message: string) {
        super(`UsageError: ${message}`);
    }
}

/**
 * Height/balance/order bookkeeping is inconsistent.
 * Indicates a bug in the tree, never a usage error. Raised by `checkInvariants` only.
 */
export class InvariantViolation extends Error {
    constructor(readonly invariant: string, message: string) {
        super(`InvariantViolation (${invariant}): ${message}`);
    }
}
