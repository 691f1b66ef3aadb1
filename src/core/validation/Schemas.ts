/**
 * Validation Schemas - zod schemas for every JSON document the kit reads or writes
 *
 * Coverage:
 * - Solver configuration (.setcover/config.json)
 * - JSON instance files
 * - Reference optimum rows
 * - Run ledger records
 */

import { z } from 'zod';
import * as fs from 'fs';
import { promises as fsp } from 'fs';
import * as path from 'path';

// ==================== CONFIG ====================

export const SolverConfigSchema = z.object({
    strategy: z.enum(['max-coverage', 'cost-effective']),
    output_format: z.enum(['text', 'json', 'yaml']),
    USE_MINIMAL_LOGS: z.boolean(),
    USE_VERBOSE_LOGS: z.boolean(),
    STRUCTURED_LOGS: z.boolean(),
    RECORD_RUNS: z.boolean(),
    ledger_max_size_mb: z.number().positive()
});

export type SolverConfig = z.infer<typeof SolverConfigSchema>;

// ==================== INSTANCE ====================

export const InstanceJSONSchema = z.object({
    name: z.string().optional(),
    universeSize: z.number().int().positive(),
    subsets: z.array(z.array(z.number().int().nonnegative())),
    weights: z.array(z.number().positive()).optional()
}).refine(
    doc => doc.weights === undefined || doc.weights.length === doc.subsets.length,
    { message: 'weights must have one entry per subset', path: ['weights'] }
);

export type InstanceJSON = z.infer<typeof InstanceJSONSchema>;

// ==================== OPTIMA ====================

export const OptimumRowSchema = z.object({
    instance: z.string().min(1),
    optimum: z.coerce.number().int().positive()
});

export type OptimumRow = z.infer<typeof OptimumRowSchema>;

// ==================== LEDGER ====================

export const RunRecordSchema = z.object({
    id: z.string().uuid(),
    instance: z.string(),
    strategy: z.enum(['max-coverage', 'cost-effective']),
    coverSize: z.number().int().nonnegative(),
    cover: z.array(z.number().int().nonnegative()),
    optimum: z.number().int().positive().nullable(),
    ratio: z.number().nullable(),
    timestamp: z.string().datetime(),
    prevHash: z.string().nullable(),
    hash: z.string()
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

// ==================== VALIDATION HELPERS ====================

/**
 * Parse `data` with `schema`, flattening zod issues into one message
 *
 * @throws Error if validation fails
 */
export function validateJSON<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context?: string
): T {
    const result = schema.safeParse(data);
    if (result.success) {
        return result.data;
    }
    const errors = result.error.errors
        .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join(', ');
    throw new Error(`JSON validation failed${context ? ` for ${context}` : ''}: ${errors}`);
}

/**
 * Returns null instead of throwing
 */
export function safeValidateJSON<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown
): T | null {
    const result = schema.safeParse(data);
    return result.success ? result.data : null;
}

/**
 * Load and validate a JSON file; null when the file does not exist
 */
export async function loadValidatedJSON<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    filePath: string
): Promise<T | null> {
    if (!fs.existsSync(filePath)) {
        return null;
    }
    const raw = await fsp.readFile(filePath, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Invalid JSON in ${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return validateJSON(schema, data, path.basename(filePath));
}

/**
 * Validate before writing, creating the parent directory if needed
 */
export async function saveValidatedJSON<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    filePath: string
): Promise<void> {
    const validated = validateJSON(schema, data, path.basename(filePath));
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(filePath, JSON.stringify(validated, null, 2), 'utf-8');
}
