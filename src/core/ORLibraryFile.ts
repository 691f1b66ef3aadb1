/**
 * ORLibraryFile - read and write set cover instances
 *
 * Formats:
 * - Beasley OR-Library: universe count, set count, one weight per set, then
 *   for each element a count followed by the 1-origin numbers of the sets
 *   containing it
 * - Set file (flagged by a `##setfile` line anywhere): same header, then for
 *   each set a count followed by its 0-origin elements. Repeated sets are
 *   rejected.
 * - JSON: `{ universeSize, subsets, weights? }`, selected by the .json extension
 *
 * Lines starting with `#` are comments. Blank lines are skipped.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { InstanceFormat, SetCoverInstance } from './types';
import { InstanceJSON, InstanceJSONSchema, loadValidatedJSON, saveValidatedJSON } from './validation/Schemas';
import { MalformedInputError } from '../kernel/errors';
import { InstanceValidator } from '../kernel/validation/InstanceValidator';

const SETFILE_PSEUDO_COMMENT = '##setfile';

/**
 * Stream of integers from a comment-bearing text file
 */
export class IntStream {
    readonly type: 'orlib' | 'setfile';
    private ints: number[] = [];
    private next = 0;

    constructor(text: string, private source: string) {
        let type: 'orlib' | 'setfile' = 'orlib';

        text.split(/\r?\n/).forEach((rawLine, lineIndex) => {
            const line = rawLine.trim();
            if (line === '') {
                return;
            }
            if (line.startsWith('#')) {
                if (line === SETFILE_PSEUDO_COMMENT) {
                    type = 'setfile';
                }
                return;
            }
            for (const token of line.split(/\s+/)) {
                if (!/^[+-]?\d+$/.test(token)) {
                    throw new MalformedInputError(this.source, `line ${lineIndex + 1}: "${token}" is not an integer`);
                }
                this.ints.push(Number(token));
            }
        });

        this.type = type;
    }

    getInt(what: string): number {
        if (this.next >= this.ints.length) {
            throw new MalformedInputError(this.source, `unexpected end of input while reading ${what}`);
        }
        return this.ints[this.next++];
    }

    getSeq(count: number, what: string): number[] {
        if (count < 0) {
            throw new MalformedInputError(this.source, `negative count ${count} for ${what}`);
        }
        if (this.next + count > this.ints.length) {
            throw new MalformedInputError(
                this.source,
                `unexpected end of input: ${what} needs ${count} value(s), ${this.ints.length - this.next} left`
            );
        }
        this.next += count;
        return this.ints.slice(this.next - count, this.next);
    }

    /**
     * Call after the last record to reject trailing values
     */
    assertEmpty(): void {
        if (this.next !== this.ints.length) {
            throw new MalformedInputError(this.source, `${this.ints.length - this.next} trailing value(s) after last record`);
        }
    }
}

export class ORLibraryFile {
    /**
     * Parse OR-Library or set-file text; the `##setfile` pseudo-comment decides
     */
    static parse(text: string, source: string = '<input>'): SetCoverInstance {
        const stream = new IntStream(text, source);
        const universeSize = stream.getInt('universe count');
        const setCount = stream.getInt('set count');
        if (setCount < 0) {
            throw new MalformedInputError(source, `negative set count ${setCount}`);
        }
        const weights = stream.getSeq(setCount, 'weights');

        const subsets = stream.type === 'setfile'
            ? this.readSetRecords(stream, source, universeSize, setCount)
            : this.readElementRecords(stream, source, universeSize, setCount);
        stream.assertEmpty();

        InstanceValidator.assertValid(universeSize, subsets, weights);

        return {
            name: path.basename(source),
            universeSize,
            subsets,
            weights,
            format: stream.type
        };
    }

    /**
     * OR-Library body: one record per element listing the sets that contain it
     */
    private static readElementRecords(
        stream: IntStream,
        source: string,
        universeSize: number,
        setCount: number
    ): Set<number>[] {
        const members = Array.from({ length: setCount }, () => new Set<number>());
        for (let element = 0; element < universeSize; element++) {
            const count = stream.getInt(`count for element ${element}`);
            for (const setNumber of stream.getSeq(count, `sets of element ${element}`)) {
                if (setNumber < 1 || setNumber > setCount) {
                    throw new MalformedInputError(source, `element ${element}: set number ${setNumber} outside 1..${setCount}`);
                }
                members[setNumber - 1].add(element);
            }
        }
        return members;
    }

    /**
     * Set-file body: one record per set listing its elements
     */
    private static readSetRecords(
        stream: IntStream,
        source: string,
        universeSize: number,
        setCount: number
    ): Set<number>[] {
        const members: Set<number>[] = [];
        for (let index = 0; index < setCount; index++) {
            const count = stream.getInt(`count for set ${index}`);
            const subset = new Set(stream.getSeq(count, `elements of set ${index}`));
            for (const element of subset) {
                if (element < 0 || element >= universeSize) {
                    throw new MalformedInputError(source, `set ${index}: element ${element} outside universe [0, ${universeSize})`);
                }
            }
            members.push(subset);
        }
        const repeat = findRepeatedSubset(members);
        if (repeat !== null) {
            throw new MalformedInputError(source, `set ${repeat.index} repeats set ${repeat.first}`);
        }
        return members;
    }

    /**
     * Read an instance from disk, picking the format from content or extension
     */
    static async read(filePath: string): Promise<SetCoverInstance> {
        if (path.extname(filePath).toLowerCase() === '.json') {
            let doc: InstanceJSON | null;
            try {
                doc = await loadValidatedJSON(InstanceJSONSchema, filePath);
            } catch (error) {
                throw new MalformedInputError(filePath, error instanceof Error ? error.message : String(error));
            }
            if (doc === null) {
                throw new MalformedInputError(filePath, 'file not found');
            }
            const subsets = doc.subsets.map(s => new Set(s));
            const weights = doc.weights ?? subsets.map(() => 1);
            InstanceValidator.assertValid(doc.universeSize, subsets, weights);
            return {
                name: doc.name ?? path.basename(filePath),
                universeSize: doc.universeSize,
                subsets,
                weights,
                format: 'json'
            };
        }

        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new MalformedInputError(filePath, `cannot read file (${error instanceof Error ? error.message : String(error)})`);
        }
        return this.parse(text, filePath);
    }

    /**
     * Render in OR-Library layout (1-origin set numbers per element)
     */
    static formatORLibrary(instance: SetCoverInstance): string {
        const items: number[][] = Array.from({ length: instance.universeSize }, () => []);
        instance.subsets.forEach((subset, index) => {
            for (const element of subset) {
                items[element].push(index + 1);
            }
        });

        const lines: string[] = [
            '# Universe count',
            String(instance.universeSize),
            '# Number of sets',
            String(instance.subsets.length),
            '# Weights',
            instance.weights.join(' ')
        ];
        items.forEach((sets, element) => {
            lines.push(`# Item ${element}`, String(sets.length), sets.join(' '));
        });
        return lines.join('\n') + '\n';
    }

    /**
     * Render in set-file layout (0-origin elements per set)
     */
    static formatSetFile(instance: SetCoverInstance): string {
        const lines: string[] = [
            SETFILE_PSEUDO_COMMENT,
            '# Universe count',
            String(instance.universeSize),
            '# Number of sets',
            String(instance.subsets.length),
            '# Weights',
            instance.weights.join(' ')
        ];
        instance.subsets.forEach((subset, index) => {
            const elements = Array.from(subset).sort((a, b) => a - b);
            lines.push(`# Set ${index}`, String(elements.length), elements.join(' '));
        });
        return lines.join('\n') + '\n';
    }

    static async write(instance: SetCoverInstance, filePath: string, format: InstanceFormat): Promise<void> {
        if (format === 'json') {
            await saveValidatedJSON(InstanceJSONSchema, {
                name: instance.name,
                universeSize: instance.universeSize,
                subsets: instance.subsets.map(s => Array.from(s).sort((a, b) => a - b)),
                weights: [...instance.weights]
            }, filePath);
            return;
        }
        if (format === 'setfile') {
            const repeat = findRepeatedSubset(instance.subsets);
            if (repeat !== null) {
                throw new MalformedInputError(
                    filePath,
                    `set ${repeat.index} repeats set ${repeat.first}; the set-file format cannot hold repeated sets`
                );
            }
        }
        const text = format === 'setfile' ? this.formatSetFile(instance) : this.formatORLibrary(instance);
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, text, 'utf-8');
    }
}

function canonicalKey(subset: ReadonlySet<number>): string {
    return Array.from(subset).sort((a, b) => a - b).join(',');
}

/**
 * First subset equal to an earlier one, by element content
 */
export function findRepeatedSubset(
    subsets: ReadonlyArray<ReadonlySet<number>>
): { index: number; first: number } | null {
    const seen = new Map<string, number>();
    for (let index = 0; index < subsets.length; index++) {
        const key = canonicalKey(subsets[index]);
        const first = seen.get(key);
        if (first !== undefined) {
            return { index, first };
        }
        seen.set(key, index);
    }
    return null;
}
