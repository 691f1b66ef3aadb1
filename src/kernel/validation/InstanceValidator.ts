/**
 * InstanceValidator - precondition checks run before any greedy step
 *
 * Checks:
 * - universe size is a positive integer
 * - every element id is an integer inside [0, universeSize)
 * - weights (when given) are one finite positive number per subset
 *
 * Used by:
 * - GreedyCoverSolver (before the loop)
 * - ORLibraryFile (after parsing)
 */

import { InvalidInstanceError } from '../errors';
import { SubsetLike } from '../../core/types';

export interface InstanceCheckResult {
    valid: boolean;
    errors: string[];
}

export class InstanceValidator {
    /**
     * Errors are capped so one broken file does not produce megabytes of text
     */
    private static readonly MAX_REPORTED_ERRORS = 20;

    static check(
        universeSize: number,
        subsets: ReadonlyArray<SubsetLike>,
        weights?: readonly number[]
    ): InstanceCheckResult {
        const errors: string[] = [];
        const push = (message: string) => {
            if (errors.length < this.MAX_REPORTED_ERRORS) {
                errors.push(message);
            }
        };

        if (!Number.isInteger(universeSize) || universeSize < 1) {
            push(`universe size must be a positive integer, got ${universeSize}`);
            // Element ranges are meaningless without a universe
            return { valid: false, errors };
        }

        subsets.forEach((subset, index) => {
            for (const element of subset) {
                if (!Number.isInteger(element)) {
                    push(`subset ${index}: element ${element} is not an integer`);
                } else if (element < 0 || element >= universeSize) {
                    push(`subset ${index}: element ${element} outside universe [0, ${universeSize})`);
                }
            }
        });

        if (weights !== undefined) {
            if (weights.length !== subsets.length) {
                push(`expected ${subsets.length} weight(s), got ${weights.length}`);
            } else {
                weights.forEach((weight, index) => {
                    if (!Number.isFinite(weight) || weight <= 0) {
                        push(`subset ${index}: weight ${weight} must be a positive number`);
                    }
                });
            }
        }

        return { valid: errors.length === 0, errors };
    }

    /**
     * @throws InvalidInstanceError listing every problem found
     */
    static assertValid(
        universeSize: number,
        subsets: ReadonlyArray<SubsetLike>,
        weights?: readonly number[]
    ): void {
        const result = this.check(universeSize, subsets, weights);
        if (!result.valid) {
            throw new InvalidInstanceError(`Invalid set cover instance: ${result.errors.join('; ')}`);
        }
    }
}
