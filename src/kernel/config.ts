/**
 * Solver Configuration
 *
 * Loads from .setcover/config.json, merged over defaults.
 * Feature flags for logging and run recording.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SolverConfig, SolverConfigSchema, validateJSON } from '../core/validation/Schemas';

export type { SolverConfig };

export const CONFIG_DIR = '.setcover';

export const DEFAULT_CONFIG: Readonly<SolverConfig> = {
    strategy: 'max-coverage',
    output_format: 'text',
    USE_MINIMAL_LOGS: true,
    USE_VERBOSE_LOGS: false,
    STRUCTURED_LOGS: false,
    RECORD_RUNS: false,
    ledger_max_size_mb: 50
};

export function configPath(workspaceRoot: string): string {
    return path.join(workspaceRoot, CONFIG_DIR, 'config.json');
}

/**
 * Missing file means defaults. A broken file warns and also means defaults.
 */
export function loadSolverConfig(
    workspaceRoot: string,
    warn: (message: string) => void = message => console.warn(message)
): SolverConfig {
    const file = configPath(workspaceRoot);
    const defaults: SolverConfig = { ...DEFAULT_CONFIG };

    if (!fs.existsSync(file)) {
        return defaults;
    }

    try {
        const overrides: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        if (typeof overrides !== 'object' || overrides === null || Array.isArray(overrides)) {
            throw new Error('config root must be an object');
        }
        return validateJSON(SolverConfigSchema, { ...defaults, ...overrides }, 'config.json');
    } catch (error) {
        warn(`⚠️ Failed to load solver config, using defaults: ${error instanceof Error ? error.message : String(error)}`);
        return defaults;
    }
}
