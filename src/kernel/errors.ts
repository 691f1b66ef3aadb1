/**
 * Error taxonomy for the set cover kernel.
 *
 * Every failure is deterministic for a given input, so nothing here is
 * retryable. Callers switch on `code`.
 */

export type SetCoverErrorCode = 'INVALID_INSTANCE' | 'UNSOLVABLE' | 'MALFORMED_INPUT';

export abstract class SetCoverError extends Error {
    abstract readonly code: SetCoverErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Universe size is not a positive integer, an element id falls outside the
 * universe, or the weights do not match the subsets.
 */
export class InvalidInstanceError extends SetCoverError {
    readonly code = 'INVALID_INSTANCE';
}

/**
 * No remaining subset covers any remaining element.
 */
export class UnsolvableError extends SetCoverError {
    readonly code = 'UNSOLVABLE';

    constructor(readonly uncovered: readonly number[], readonly selected: readonly number[]) {
        super(
            `Instance is not coverable: ${uncovered.length} element(s) remain uncovered ` +
            `after ${selected.length} selection(s) (first: ${uncovered.slice(0, 10).join(', ')})`
        );
    }
}

/**
 * A file or argument could not be parsed.
 */
export class MalformedInputError extends SetCoverError {
    readonly code = 'MALFORMED_INPUT';

    constructor(readonly source: string, detail: string) {
        super(`${source}: ${detail}`);
    }
}

export function isSetCoverError(error: unknown): error is SetCoverError {
    return error instanceof SetCoverError;
}
