/**
 * SetCoverAPI - public entry point tying loader, solver, verifier and ledger together
 *
 * Endpoints: load, solve, verify, run, readCover, convert, verifyLedger
 */

import * as fs from 'fs/promises';
import { performance } from 'perf_hooks';
import { ORLibraryFile } from '../core/ORLibraryFile';
import { ReferenceOptima } from '../core/ReferenceOptima';
import {
    CoverVerification,
    InstanceFormat,
    SelectionStrategy,
    SetCoverInstance,
    SolveReport
} from '../core/types';
import { SolverConfig } from './config';
import { approximationRatio, verify as verifyCover } from './CoverVerifier';
import { MalformedInputError } from './errors';
import { solveWithTrace } from './GreedyCoverSolver';
import { LedgerVerification, RunLedger } from './RunLedger';
import { SolverLogger } from './SolverLogger';

export interface RunOptions {
    strategy?: SelectionStrategy;
    check?: boolean;
    optimum?: number | null;
    optimaPath?: string | null;
    record?: boolean;
}

export interface RunResult {
    instance: SetCoverInstance;
    report: SolveReport;
}

export class SetCoverAPI {
    constructor(
        private logger: SolverLogger,
        private config: SolverConfig,
        private ledger: RunLedger
    ) {}

    async load(inputPath: string): Promise<SetCoverInstance> {
        const instance = await ORLibraryFile.read(inputPath);
        this.logger.system(`Loaded ${inputPath} (${instance.format}): ${instance.universeSize} element(s), ${instance.subsets.length} subset(s)`);
        return instance;
    }

    /**
     * Run the greedy solver, timing it and logging every step
     *
     * @throws InvalidInstanceError, UnsolvableError
     */
    solve(
        instance: SetCoverInstance,
        strategy: SelectionStrategy = this.config.strategy,
        referenceOptimum: number | null = null,
        check: boolean = false
    ): SolveReport {
        const name = instance.name ?? '<instance>';
        this.logger.solveStart(name, instance.universeSize, instance.subsets.length, strategy);

        const start = performance.now();
        const { cover, steps } = solveWithTrace(instance.universeSize, instance.subsets, {
            strategy,
            weights: instance.weights
        });
        const elapsedSeconds = (performance.now() - start) / 1000;

        steps.forEach(step => this.logger.step(step));
        this.logger.solveEnd(cover.length, elapsedSeconds);

        const verification = check
            ? this.verify(instance, cover, referenceOptimum)
            : null;

        return {
            instance: name,
            universeSize: instance.universeSize,
            subsetCount: instance.subsets.length,
            strategy,
            cover,
            totalWeight: cover.reduce((sum, index) => sum + instance.weights[index], 0),
            elapsedSeconds,
            referenceOptimum,
            verification,
            steps
        };
    }

    verify(instance: SetCoverInstance, cover: readonly number[], referenceOptimum: number | null = null): CoverVerification {
        const result = verifyCover(instance.universeSize, instance.subsets, cover, referenceOptimum);
        this.logger.verification(result);
        return result;
    }

    /**
     * Explicit value first, then the CSV table, then the test-N file name
     */
    async resolveOptimum(inputPath: string, optimum?: number | null, optimaPath?: string | null): Promise<number | null> {
        if (optimum !== undefined && optimum !== null) {
            return optimum;
        }
        const table = optimaPath ? await ReferenceOptima.load(optimaPath) : ReferenceOptima.empty();
        return table.lookup(inputPath);
    }

    /**
     * load -> solve -> (verify) -> (record)
     */
    async run(inputPath: string, options: RunOptions = {}): Promise<RunResult> {
        const instance = await this.load(inputPath);
        const optimum = await this.resolveOptimum(inputPath, options.optimum, options.optimaPath);
        const report = this.solve(
            instance,
            options.strategy ?? this.config.strategy,
            optimum,
            options.check ?? false
        );

        if (options.record ?? this.config.RECORD_RUNS) {
            const record = await this.ledger.append({
                instance: report.instance,
                strategy: report.strategy,
                cover: report.cover,
                optimum,
                ratio: report.verification
                    ? report.verification.ratio
                    : approximationRatio(report.cover.length, optimum)
            });
            this.logger.system(`Recorded run ${record.id} in ${this.ledger.path}`);
        }

        return { instance, report };
    }

    /**
     * Whitespace-separated subset indices; `#` lines are comments
     */
    async readCover(coverPath: string): Promise<number[]> {
        let text: string;
        try {
            text = await fs.readFile(coverPath, 'utf-8');
        } catch (error) {
            throw new MalformedInputError(coverPath, `cannot read cover (${error instanceof Error ? error.message : String(error)})`);
        }
        return parseCover(text, coverPath);
    }

    async convert(inputPath: string, outputPath: string, format: InstanceFormat): Promise<SetCoverInstance> {
        const instance = await this.load(inputPath);
        await ORLibraryFile.write(instance, outputPath, format);
        this.logger.system(`Wrote ${outputPath} (${format})`);
        return instance;
    }

    async verifyLedger(): Promise<LedgerVerification> {
        return this.ledger.verify();
    }
}

export function parseCover(text: string, source: string = '<cover>'): number[] {
    const cover: number[] = [];
    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }
        for (const token of line.split(/\s+/)) {
            if (!/^\d+$/.test(token)) {
                throw new MalformedInputError(source, `"${token}" is not a subset index`);
            }
            cover.push(Number(token));
        }
    }
    return cover;
}
