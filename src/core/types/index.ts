// Stable data model shared by the loader, the solver and the verifier

/**
 * A subset as accepted by the solver: a Set, or any array of element ids.
 * Arrays may repeat an id; it is counted once.
 */
export type SubsetLike = ReadonlySet<number> | readonly number[];

export type SelectionStrategy = 'max-coverage' | 'cost-effective';

export type OutputFormat = 'text' | 'json' | 'yaml';

export type InstanceFormat = 'orlib' | 'setfile' | 'json';

export interface SetCoverInstance {
    name?: string;
    universeSize: number;
    subsets: ReadonlyArray<ReadonlySet<number>>;
    weights: readonly number[];   // one positive weight per subset
    format: InstanceFormat;       // format the instance was read from
}

export interface GreedyStep {
    step: number;            // 1-based
    subsetIndex: number;
    gain: number;            // newly covered elements
    uncoveredAfter: number;  // |uncovered| after the selection
}

export interface SolveOptions {
    strategy?: SelectionStrategy;
    weights?: readonly number[];
}

export interface SolveTrace {
    cover: number[];
    steps: GreedyStep[];
}

export interface CoverVerification {
    valid: boolean;
    coverSize: number;
    coveredCount: number;
    missingElements: number[];
    invalidIndices: number[];
    duplicateIndices: number[];
    ratio: number | null;
    greedyBound: number;
    withinGreedyBound: boolean | null;
}

export interface SolveReport {
    instance: string;
    universeSize: number;
    subsetCount: number;
    strategy: SelectionStrategy;
    cover: number[];
    totalWeight: number;
    elapsedSeconds: number;
    referenceOptimum: number | null;
    verification: CoverVerification | null;
    steps: GreedyStep[];
}
