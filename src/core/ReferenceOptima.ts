/**
 * ReferenceOptima - precomputed optimal cover sizes
 *
 * Sources, in order:
 * 1. a CSV table `instance,optimum` keyed by instance file base name
 * 2. the `test-N.<ext>` naming convention, where N is the optimum
 *
 * Only used for reporting; the solver never sees these values.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { OptimumRow, OptimumRowSchema, validateJSON } from './validation/Schemas';
import { MalformedInputError } from '../kernel/errors';

const TEST_NAME_PATTERN = /^test-(\d+)(\.[^.]*)?$/;

export class ReferenceOptima {
    private constructor(private readonly table: ReadonlyMap<string, number>) {}

    static empty(): ReferenceOptima {
        return new ReferenceOptima(new Map());
    }

    /**
     * Parse CSV text. First non-comment line must be the `instance,optimum` header.
     */
    static parse(text: string, source: string = '<optima>'): ReferenceOptima {
        const table = new Map<string, number>();
        let headerSeen = false;

        text.split(/\r?\n/).forEach((rawLine, lineIndex) => {
            const line = rawLine.trim();
            if (line === '' || line.startsWith('#')) {
                return;
            }
            const cells = line.split(',').map(c => c.trim());
            if (!headerSeen) {
                if (cells.length !== 2 || cells[0] !== 'instance' || cells[1] !== 'optimum') {
                    throw new MalformedInputError(source, `line ${lineIndex + 1}: expected header "instance,optimum"`);
                }
                headerSeen = true;
                return;
            }
            if (cells.length !== 2) {
                throw new MalformedInputError(source, `line ${lineIndex + 1}: expected 2 columns, got ${cells.length}`);
            }
            let row: OptimumRow;
            try {
                row = validateJSON(OptimumRowSchema, { instance: cells[0], optimum: cells[1] }, `line ${lineIndex + 1}`);
            } catch (error) {
                throw new MalformedInputError(source, error instanceof Error ? error.message : String(error));
            }
            table.set(row.instance, row.optimum);
        });

        return new ReferenceOptima(table);
    }

    static async load(filePath: string): Promise<ReferenceOptima> {
        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new MalformedInputError(filePath, `cannot read optima (${error instanceof Error ? error.message : String(error)})`);
        }
        return this.parse(text, filePath);
    }

    /**
     * Known optimum for an instance path, or null
     */
    lookup(instancePath: string): number | null {
        const base = path.basename(instancePath);
        const fromTable = this.table.get(base);
        if (fromTable !== undefined) {
            return fromTable;
        }
        return optimumFromFileName(base);
    }

    get size(): number {
        return this.table.size;
    }
}

/**
 * `test-4.txt` -> 4; anything else -> null
 */
export function optimumFromFileName(fileName: string): number | null {
    const match = TEST_NAME_PATTERN.exec(path.basename(fileName));
    if (!match) {
        return null;
    }
    const value = Number(match[1]);
    return value > 0 ? value : null;
}
