/**
 * Set Cover Kit - Main Entry Point
 *
 * Exports all kernel and core components
 */

export { solve, solveWithTrace, marginalGain } from './GreedyCoverSolver';
export { verify, harmonicNumber, maxSubsetSize, approximationRatio } from './CoverVerifier';
export { InstanceValidator } from './validation/InstanceValidator';
export type { InstanceCheckResult } from './validation/InstanceValidator';
export {
    SetCoverError,
    InvalidInstanceError,
    UnsolvableError,
    MalformedInputError,
    isSetCoverError
} from './errors';
export type { SetCoverErrorCode } from './errors';
export { SetCoverAPI, parseCover } from './SetCoverAPI';
export type { RunOptions, RunResult } from './SetCoverAPI';
export { SolverLogger, ConsoleChannel, MemoryChannel } from './SolverLogger';
export type { LogChannel, LogLevel, SolverLoggerOptions } from './SolverLogger';
export { RunLedger } from './RunLedger';
export type { RunInput, LedgerVerification } from './RunLedger';
export { AppendOnlyWriter } from './AppendOnlyWriter';
export type { AppendOptions, ReadOptions } from './AppendOnlyWriter';
export { ReportFormatter, NOT_A_SOLUTION } from './ReportFormatter';
export { loadSolverConfig, DEFAULT_CONFIG } from './config';
export type { SolverConfig } from './config';
export { runCli } from './CliCommands';

// Core
export { ORLibraryFile, IntStream, findRepeatedSubset } from '../core/ORLibraryFile';
export { ReferenceOptima, optimumFromFileName } from '../core/ReferenceOptima';
export type * from '../core/types';
