/**
 * SolverLogger - leveled output for solve runs
 *
 * Features:
 * - Levels: [SOLVE] → [STEP] → [VERIFY] → [OUTPUT], plus SYSTEM / WARNING / ERROR
 * - Minimal mode (default): run headers, warnings and errors; everything else indented
 * - Verbose mode: every line with its level and metrics, including each greedy step
 * - Optional structured JSONL next to the human-readable channel
 */

import * as fs from 'fs';
import * as path from 'path';
import { CoverVerification, GreedyStep } from '../core/types';

export type LogLevel = 'SOLVE' | 'STEP' | 'SYSTEM' | 'VERIFY' | 'OUTPUT' | 'WARNING' | 'ERROR';

export type LogMetrics = Record<string, string | number | boolean | null>;

export interface StructuredLogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    metrics?: LogMetrics;
}

/**
 * Anything that accepts whole lines
 */
export interface LogChannel {
    appendLine(line: string): void;
}

/**
 * Writes to stderr so stdout carries only the report
 */
export class ConsoleChannel implements LogChannel {
    constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

    appendLine(line: string): void {
        this.stream.write(line + '\n');
    }
}

/**
 * Keeps lines in memory; handy for tests and for embedding
 */
export class MemoryChannel implements LogChannel {
    readonly lines: string[] = [];

    appendLine(line: string): void {
        this.lines.push(line);
    }
}

export interface SolverLoggerOptions {
    channel?: LogChannel;
    minimal?: boolean;
    verbose?: boolean;
    structuredLogPath?: string | null;
    now?: () => Date;
}

export class SolverLogger {
    private channel: LogChannel;
    private useMinimalLogs: boolean;
    private useVerboseLogs: boolean;
    private structuredLogPath: string | null;
    private now: () => Date;

    private readonly emojis: Record<LogLevel, string> = {
        SOLVE: '🧩',
        STEP: '➕',
        SYSTEM: '⚙️',
        VERIFY: '🔍',
        OUTPUT: '📤',
        WARNING: '⚠️',
        ERROR: '❌'
    };

    constructor(options: SolverLoggerOptions = {}) {
        this.channel = options.channel ?? new ConsoleChannel();
        this.useMinimalLogs = options.minimal ?? true;
        this.useVerboseLogs = options.verbose ?? false;
        this.structuredLogPath = options.structuredLogPath ?? null;
        this.now = options.now ?? (() => new Date());

        if (this.structuredLogPath) {
            fs.mkdirSync(path.dirname(this.structuredLogPath), { recursive: true });
        }
    }

    /**
     * HH:MM:SS.mmm
     */
    private formatTimestamp(date: Date): string {
        return date.toISOString().substring(11, 23);
    }

    log(level: LogLevel, message: string, metrics?: LogMetrics): void {
        const date = this.now();
        const entry: StructuredLogEntry = {
            timestamp: date.toISOString(),
            level,
            message,
            ...(metrics ? { metrics } : {})
        };
        this.appendStructuredLog(entry);

        const timestamp = this.formatTimestamp(date);
        const emoji = this.emojis[level];

        if (this.useVerboseLogs) {
            this.channel.appendLine(`[${timestamp}] ${emoji} [${level}] ${message}`);
            if (metrics && Object.keys(metrics).length > 0) {
                this.channel.appendLine(`[${timestamp}]     Metrics: ${JSON.stringify(metrics)}`);
            }
            return;
        }

        if (!this.useMinimalLogs || level === 'STEP') {
            // Structured log only
            return;
        }

        if (level === 'SOLVE' || level === 'WARNING' || level === 'ERROR') {
            this.channel.appendLine(`[${timestamp}] ${emoji} ${message}`);
        } else {
            this.channel.appendLine(`[${timestamp}]   ↳ ${message}`);
        }
    }

    solveStart(instance: string, universeSize: number, subsetCount: number, strategy: string): void {
        this.log('SOLVE', `Solving ${instance}: ${universeSize} element(s), ${subsetCount} subset(s), strategy ${strategy}`, {
            universe_size: universeSize,
            subsets: subsetCount,
            strategy
        });
    }

    step(step: GreedyStep): void {
        this.log('STEP', `Step ${step.step}: subset ${step.subsetIndex} covers ${step.gain} new, ${step.uncoveredAfter} left`, {
            step: step.step,
            subset: step.subsetIndex,
            gain: step.gain,
            uncovered: step.uncoveredAfter
        });
    }

    solveEnd(coverSize: number, elapsedSeconds: number): void {
        this.log('OUTPUT', `Cover of ${coverSize} subset(s) in ${elapsedSeconds.toFixed(3)}s`, {
            cover_size: coverSize,
            duration_ms: Math.round(elapsedSeconds * 1000)
        });
    }

    verification(result: CoverVerification): void {
        if (!result.valid) {
            const missing = result.missingElements.length;
            const invalid = result.invalidIndices.length;
            this.log('WARNING', `Cover is not valid: ${missing} element(s) uncovered, ${invalid} invalid index(es)`, {
                missing,
                invalid
            });
            return;
        }
        const ratio = result.ratio === null ? 'no reference optimum' : `ratio ${result.ratio.toFixed(3)}`;
        this.log('VERIFY', `Cover is valid (${result.coverSize} subset(s), ${ratio})`, {
            cover_size: result.coverSize,
            ratio: result.ratio,
            greedy_bound: Number(result.greedyBound.toFixed(6))
        });
    }

    system(message: string): void {
        this.log('SYSTEM', message);
    }

    warning(message: string): void {
        this.log('WARNING', message);
    }

    error(message: string): void {
        this.log('ERROR', message);
    }

    private appendStructuredLog(entry: StructuredLogEntry): void {
        if (!this.structuredLogPath) {
            return;
        }
        try {
            fs.appendFileSync(this.structuredLogPath, JSON.stringify(entry) + '\n', 'utf-8');
        } catch (error) {
            // Stop writing rather than fail every later log call
            const failedPath = this.structuredLogPath;
            this.structuredLogPath = null;
            this.channel.appendLine(`⚠️ Structured log disabled (${failedPath}): ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
