/**
 * CoverVerifier - checks any proposed cover against an instance
 *
 * Works on covers from any source (greedy output, hand-written, deliberately
 * wrong). A bad cover is reported through `valid: false`, never thrown.
 */

import { CoverVerification, SubsetLike } from '../core/types';

/**
 * H(n) = 1 + 1/2 + ... + 1/n, with H(0) = 0
 */
export function harmonicNumber(n: number): number {
    let sum = 0;
    for (let k = 1; k <= n; k++) {
        sum += 1 / k;
    }
    return sum;
}

/**
 * Size of the largest subset, counting distinct elements
 */
export function maxSubsetSize(subsets: ReadonlyArray<SubsetLike>): number {
    let max = 0;
    for (const subset of subsets) {
        max = Math.max(max, new Set(subset).size);
    }
    return max;
}

/**
 * coverSize / referenceOptimum, or null without a positive optimum
 */
export function approximationRatio(coverSize: number, referenceOptimum?: number | null): number | null {
    if (referenceOptimum === undefined || referenceOptimum === null || referenceOptimum <= 0) {
        return null;
    }
    return coverSize / referenceOptimum;
}

export function verify(
    universeSize: number,
    subsets: ReadonlyArray<SubsetLike>,
    cover: readonly number[],
    referenceOptimum?: number | null
): CoverVerification {
    const covered = new Set<number>();
    const invalidIndices: number[] = [];
    const duplicateIndices: number[] = [];
    const seen = new Set<number>();

    for (const index of cover) {
        if (!Number.isInteger(index) || index < 0 || index >= subsets.length) {
            invalidIndices.push(index);
            continue;
        }
        if (seen.has(index)) {
            if (!duplicateIndices.includes(index)) {
                duplicateIndices.push(index);
            }
            continue;
        }
        seen.add(index);
        for (const element of subsets[index]) {
            if (element >= 0 && element < universeSize) {
                covered.add(element);
            }
        }
    }

    const missingElements: number[] = [];
    for (let element = 0; element < universeSize; element++) {
        if (!covered.has(element)) {
            missingElements.push(element);
        }
    }

    const ratio = approximationRatio(cover.length, referenceOptimum);
    const greedyBound = harmonicNumber(maxSubsetSize(subsets));

    return {
        valid: missingElements.length === 0 && invalidIndices.length === 0,
        coverSize: cover.length,
        coveredCount: covered.size,
        missingElements,
        invalidIndices,
        duplicateIndices,
        ratio,
        greedyBound,
        withinGreedyBound: ratio === null ? null : ratio <= greedyBound
    };
}
