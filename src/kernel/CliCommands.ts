/**
 * CliCommands - argument parsing and command dispatch for the setcover CLI
 *
 * Usage:
 *   setcover solve data/test-4.txt --check
 *   setcover verify data/test-4.txt cover.txt --optimum 4
 *   setcover convert data/scp41.txt scp41.set --to setfile
 *   setcover ledger verify
 */

import * as path from 'path';
import { CONFIG_DIR, loadSolverConfig } from './config';
import { isSetCoverError } from './errors';
import { ReportFormatter } from './ReportFormatter';
import { RunLedger } from './RunLedger';
import { SetCoverAPI } from './SetCoverAPI';
import { ConsoleChannel, LogChannel, SolverLogger } from './SolverLogger';
import { InstanceFormat, OutputFormat, SelectionStrategy } from '../core/types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = `
Set Cover CLI

Usage:
  setcover solve <input> [--check] [--skip-print] [--optimum N] [--optima file.csv]
                         [--strategy max-coverage|cost-effective] [--format text|json|yaml]
                         [--trace] [--record]
  setcover verify <input> <cover-file> [--optimum N] [--optima file.csv] [--format text|json|yaml]
  setcover convert <input> <output> [--to orlib|setfile|json]
  setcover ledger verify
  setcover help
`;

export interface CliIO {
    stdout: (text: string) => void;
    channel?: LogChannel;
    cwd?: string;
}

class UsageError extends Error {}

interface ParsedArgs {
    positional: string[];
    flags: Set<string>;
    values: Map<string, string>;
}

const BOOLEAN_FLAGS = new Set(['check', 'skip-print', 'trace', 'record']);
const VALUE_FLAGS = new Set(['optimum', 'optima', 'strategy', 'format', 'to']);

function parseArgs(argv: readonly string[]): ParsedArgs {
    const parsed: ParsedArgs = { positional: [], flags: new Set(), values: new Map() };
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            parsed.positional.push(arg);
            continue;
        }
        // --skip_print is accepted as an alias of --skip-print
        const [rawName, inline] = arg.slice(2).split('=', 2);
        const name = rawName.replace(/_/g, '-');
        if (BOOLEAN_FLAGS.has(name)) {
            parsed.flags.add(name);
        } else if (VALUE_FLAGS.has(name)) {
            const value = inline ?? argv[++i];
            if (value === undefined) {
                throw new UsageError(`--${name} needs a value`);
            }
            parsed.values.set(name, value);
        } else {
            throw new UsageError(`Unknown option --${rawName}`);
        }
    }
    return parsed;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], option: string): T | undefined {
    if (value === undefined) {
        return undefined;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new UsageError(`--${option} must be one of ${allowed.join(', ')}`);
    }
    return match;
}

function positiveInt(value: string | undefined, option: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!/^\d+$/.test(value) || Number(value) < 1) {
        throw new UsageError(`--${option} must be a positive integer`);
    }
    return Number(value);
}

function requirePositional(args: ParsedArgs, count: number, command: string): string[] {
    if (args.positional.length !== count) {
        throw new UsageError(`${command} expects ${count} argument(s), got ${args.positional.length}`);
    }
    return args.positional;
}

/**
 * Run one CLI command and return its exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
    const workspaceRoot = io.cwd ?? process.cwd();
    const channel = io.channel ?? new ConsoleChannel();
    const command = argv.length > 0 ? argv[0] : undefined;
    const rest = argv.slice(1);

    let args: ParsedArgs;
    try {
        args = parseArgs(rest);
    } catch (error) {
        channel.appendLine(`❌ ${error instanceof Error ? error.message : String(error)}`);
        io.stdout(USAGE);
        return EXIT_USAGE;
    }

    const config = loadSolverConfig(workspaceRoot, message => channel.appendLine(message));
    const logger = new SolverLogger({
        channel,
        minimal: config.USE_MINIMAL_LOGS,
        verbose: config.USE_VERBOSE_LOGS || args.flags.has('trace'),
        structuredLogPath: config.STRUCTURED_LOGS
            ? path.join(workspaceRoot, CONFIG_DIR, 'logs', 'structured.jsonl')
            : null
    });
    const ledger = new RunLedger(workspaceRoot, config.ledger_max_size_mb);
    const api = new SetCoverAPI(logger, config, ledger);

    try {
        const format: OutputFormat = pick(args.values.get('format'), ['text', 'json', 'yaml'] as const, 'format')
            ?? config.output_format;

        switch (command) {
            case 'solve': {
                const [input] = requirePositional(args, 1, 'solve');
                const strategy: SelectionStrategy | undefined = pick(
                    args.values.get('strategy'),
                    ['max-coverage', 'cost-effective'] as const,
                    'strategy'
                );
                const { instance, report } = await api.run(path.resolve(workspaceRoot, input), {
                    strategy,
                    check: args.flags.has('check'),
                    optimum: positiveInt(args.values.get('optimum'), 'optimum'),
                    optimaPath: optimaPath(args, workspaceRoot),
                    record: args.flags.has('record') || undefined
                });
                io.stdout(ReportFormatter.formatSolve(report, instance, {
                    format,
                    skipPrint: args.flags.has('skip-print')
                }));
                return EXIT_OK;
            }

            case 'verify': {
                const [input, coverFile] = requirePositional(args, 2, 'verify');
                const inputPath = path.resolve(workspaceRoot, input);
                const instance = await api.load(inputPath);
                const cover = await api.readCover(path.resolve(workspaceRoot, coverFile));
                const optimum = await api.resolveOptimum(
                    inputPath,
                    positiveInt(args.values.get('optimum'), 'optimum'),
                    optimaPath(args, workspaceRoot)
                );
                const result = api.verify(instance, cover, optimum);
                io.stdout(ReportFormatter.formatVerification(result, instance.universeSize, format));
                return result.valid ? EXIT_OK : EXIT_FAILURE;
            }

            case 'convert': {
                const [input, output] = requirePositional(args, 2, 'convert');
                const to: InstanceFormat = pick(args.values.get('to'), ['orlib', 'setfile', 'json'] as const, 'to') ?? 'orlib';
                await api.convert(path.resolve(workspaceRoot, input), path.resolve(workspaceRoot, output), to);
                return EXIT_OK;
            }

            case 'ledger': {
                const [subcommand] = requirePositional(args, 1, 'ledger');
                if (subcommand !== 'verify') {
                    throw new UsageError(`Unknown ledger command "${subcommand}"`);
                }
                const verification = await api.verifyLedger();
                if (verification.valid) {
                    io.stdout(`✅ Run ledger: VALID (${verification.entries} run(s))\n`);
                    return EXIT_OK;
                }
                io.stdout(`❌ Run ledger: INVALID\n${verification.errors.map(err => `  - ${err}`).join('\n')}\n`);
                return EXIT_FAILURE;
            }

            case undefined:
            case 'help':
            case '--help':
                io.stdout(USAGE);
                return EXIT_OK;

            default:
                throw new UsageError(`Unknown command "${command}"`);
        }
    } catch (error) {
        if (error instanceof UsageError) {
            logger.error(error.message);
            io.stdout(USAGE);
            return EXIT_USAGE;
        }
        if (isSetCoverError(error)) {
            logger.error(`${error.code}: ${error.message}`);
            return EXIT_FAILURE;
        }
        throw error;
    }
}

function optimaPath(args: ParsedArgs, workspaceRoot: string): string | null {
    const value = args.values.get('optima');
    return value === undefined ? null : path.resolve(workspaceRoot, value);
}
