/**
 * RunLedger - append-only, hash-chained history of solve runs
 *
 * Each record carries the SHA-256 of its own body and the hash of the record
 * before it, so any edit or deletion inside .setcover/ledger/runs.jsonl shows
 * up in verify(). The chain runs through rotated files, oldest first.
 */

import * as crypto from 'crypto';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppendOnlyWriter } from './AppendOnlyWriter';
import { CONFIG_DIR } from './config';
import { RunRecord, RunRecordSchema, safeValidateJSON } from '../core/validation/Schemas';
import { SelectionStrategy } from '../core/types';

export interface RunInput {
    instance: string;
    strategy: SelectionStrategy;
    cover: readonly number[];
    optimum: number | null;
    ratio: number | null;
}

export interface LedgerVerification {
    valid: boolean;
    entries: number;
    errors: string[];
}

export class RunLedger {
    private writer: AppendOnlyWriter;
    private lastHash: string | null | undefined;  // undefined until loaded from disk

    /**
     * @param workspaceRootOrLedgerPath - workspace root, or a path ending in .jsonl
     */
    constructor(workspaceRootOrLedgerPath: string, maxSizeMB: number = 50) {
        const ledgerPath = workspaceRootOrLedgerPath.endsWith('.jsonl')
            ? workspaceRootOrLedgerPath
            : path.join(workspaceRootOrLedgerPath, CONFIG_DIR, 'ledger', 'runs.jsonl');
        this.writer = new AppendOnlyWriter(ledgerPath, maxSizeMB);
    }

    get path(): string {
        return this.writer.path;
    }

    async append(run: RunInput): Promise<RunRecord> {
        const prevHash = await this.head();
        const body = {
            id: uuidv4(),
            instance: run.instance,
            strategy: run.strategy,
            coverSize: run.cover.length,
            cover: [...run.cover],
            optimum: run.optimum,
            ratio: run.ratio,
            timestamp: new Date().toISOString(),
            prevHash
        };
        const record: RunRecord = { ...body, hash: calculateHash(body) };

        await this.writer.append(record, { fsync: true });
        this.lastHash = record.hash;
        return record;
    }

    /**
     * Hash of the newest record, null for an empty ledger
     */
    async head(): Promise<string | null> {
        if (this.lastHash === undefined) {
            const records = await this.readAll();
            this.lastHash = records.length > 0 ? records[records.length - 1].hash : null;
        }
        return this.lastHash;
    }

    async readAll(): Promise<RunRecord[]> {
        const raw = await this.writer.readAll(undefined, { includeRotated: true });
        const records: RunRecord[] = [];
        for (const entry of raw) {
            const record = safeValidateJSON(RunRecordSchema, entry);
            if (record !== null) {
                records.push(record);
            }
        }
        return records;
    }

    async verify(): Promise<LedgerVerification> {
        const errors: string[] = [];
        const raw = await this.writer.readAll((_line, lineNumber, file) => {
            const where = file === this.writer.path ? '' : ` of ${path.basename(file)}`;
            errors.push(`Line ${lineNumber}${where} is not valid JSON`);
        }, { includeRotated: true });

        let prevHash: string | null = null;
        let entries = 0;
        raw.forEach((entry, index) => {
            const record = safeValidateJSON(RunRecordSchema, entry);
            if (record === null) {
                errors.push(`Entry ${index + 1} does not match the run record schema`);
                return;
            }
            entries++;
            const { hash, ...body } = record;
            if (calculateHash(body) !== hash) {
                errors.push(`Hash mismatch for run ${record.id}`);
            }
            if (record.prevHash !== prevHash) {
                errors.push(`Broken chain at run ${record.id}`);
            }
            prevHash = hash;
        });

        return { valid: errors.length === 0, entries, errors };
    }
}

/**
 * SHA-256 over a key-sorted serialization
 */
export function calculateHash(data: unknown): string {
    return crypto.createHash('sha256').update(stableStringify(data)).digest('hex');
}

export function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (Array.isArray(value)) {
        return '[' + value.map(item => stableStringify(item)).join(',') + ']';
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([key, v]) => `${JSON.stringify(key)}:${stableStringify(v)}`).join(',') + '}';
}
