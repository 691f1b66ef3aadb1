/**
 * GreedyCoverSolver - classic greedy approximation for Set Cover
 *
 * Each step takes the unselected subset covering the most still-uncovered
 * elements. Ties go to the lowest index: the scan only replaces the
 * incumbent on a strictly better score, so the result never depends on
 * container iteration order.
 *
 * Guarantee: |cover| <= H(max subset size) * optimum.
 *
 * Strategies:
 * - max-coverage    largest marginal gain (default)
 * - cost-effective  smallest weight / gain, for weighted instances
 */

import { GreedyStep, SolveOptions, SolveTrace, SubsetLike } from '../core/types';
import { InstanceValidator } from './validation/InstanceValidator';
import { UnsolvableError } from './errors';

/**
 * Solve and return only the chosen subset indices, in selection order.
 *
 * @throws InvalidInstanceError before the loop starts
 * @throws UnsolvableError when some element belongs to no subset
 */
export function solve(
    universeSize: number,
    subsets: ReadonlyArray<SubsetLike>,
    options: SolveOptions = {}
): number[] {
    return solveWithTrace(universeSize, subsets, options).cover;
}

export function solveWithTrace(
    universeSize: number,
    subsets: ReadonlyArray<SubsetLike>,
    options: SolveOptions = {}
): SolveTrace {
    const strategy = options.strategy ?? 'max-coverage';
    const weights = strategy === 'cost-effective'
        ? options.weights ?? subsets.map(() => 1)
        : undefined;

    InstanceValidator.assertValid(universeSize, subsets, weights);

    // Private copies: inputs are never touched
    const members: ReadonlyArray<ReadonlySet<number>> = subsets.map(s => new Set(s));
    const uncovered = new Set<number>();
    for (let element = 0; element < universeSize; element++) {
        uncovered.add(element);
    }

    const chosen = new Array<boolean>(members.length).fill(false);
    const cover: number[] = [];
    const steps: GreedyStep[] = [];

    while (uncovered.size > 0) {
        let best = -1;
        let bestGain = 0;

        for (let index = 0; index < members.length; index++) {
            if (chosen[index]) {
                continue;
            }
            const gain = marginalGain(members[index], uncovered);
            if (gain === 0) {
                continue;
            }
            if (best === -1 || isBetter(gain, index, bestGain, best, weights)) {
                best = index;
                bestGain = gain;
            }
        }

        if (best === -1) {
            throw new UnsolvableError(
                Array.from(uncovered).sort((a, b) => a - b),
                cover.slice()
            );
        }

        chosen[best] = true;
        cover.push(best);
        for (const element of members[best]) {
            uncovered.delete(element);
        }
        steps.push({
            step: steps.length + 1,
            subsetIndex: best,
            gain: bestGain,
            uncoveredAfter: uncovered.size
        });
    }

    return { cover, steps };
}

/**
 * Number of elements of `subset` still in `uncovered`
 */
export function marginalGain(subset: ReadonlySet<number>, uncovered: ReadonlySet<number>): number {
    let gain = 0;
    for (const element of subset) {
        if (uncovered.has(element)) {
            gain++;
        }
    }
    return gain;
}

/**
 * Candidate beats incumbent only when strictly better; candidates are
 * scanned in ascending index order, so ties keep the lower index.
 */
function isBetter(
    gain: number,
    index: number,
    incumbentGain: number,
    incumbent: number,
    weights: readonly number[] | undefined
): boolean {
    if (weights === undefined) {
        return gain > incumbentGain;
    }
    // weight/gain < incumbentWeight/incumbentGain, without division
    return weights[index] * incumbentGain < weights[incumbent] * gain;
}
