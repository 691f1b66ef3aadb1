/**
 * AppendOnlyWriter - JSONL Append-Only Writer with Rotation
 *
 * Features:
 * - Append-only (no array rewrite)
 * - Rotation once the file reaches its size limit
 * - Reads span rotated files on request
 * - fsync on request
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';

export interface AppendOptions {
    fsync?: boolean;      // Force fsync after this append
}

export interface ReadOptions {
    includeRotated?: boolean;  // Read rotated files before the live one
}

const ROTATED_STAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z)(?:-(\d+))?$/;

export class AppendOnlyWriter {
    private buffer: string[] = [];
    private bufferSize = 0;
    private readonly maxBufferLines = 10;

    constructor(private readonly filePath: string, private readonly maxSizeMB: number = 50) {}

    get path(): string {
        return this.filePath;
    }

    /**
     * Buffer one entry; flushes every `maxBufferLines` lines or on fsync
     */
    async append(data: object, options: AppendOptions = {}): Promise<void> {
        const line = JSON.stringify(data) + '\n';
        this.buffer.push(line);
        this.bufferSize += line.length;

        if (options.fsync || this.buffer.length >= this.maxBufferLines) {
            await this.flush(options.fsync ?? false);
        }
    }

    async flush(withFsync: boolean = false): Promise<void> {
        if (this.buffer.length === 0) {
            return;
        }

        await this.rotateIfNeeded();
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.appendFile(this.filePath, this.buffer.join(''), 'utf-8');

        if (withFsync) {
            const fd = await fs.open(this.filePath, 'r+');
            try {
                await fd.sync();
            } finally {
                await fd.close();
            }
        }

        this.buffer = [];
        this.bufferSize = 0;
    }

    /**
     * file.jsonl -> file.YYYY-MM-DDTHH-mm-ss-SSSZ.jsonl, with -1, -2, ... on a name clash
     */
    private async rotateIfNeeded(): Promise<void> {
        if (!fsSync.existsSync(this.filePath)) {
            return;
        }

        const stats = await fs.stat(this.filePath);
        const sizeMB = stats.size / 1024 / 1024;
        if (sizeMB < this.maxSizeMB) {
            return;
        }

        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        const { base, ext } = this.splitName();
        let target = `${base}.${timestamp}${ext}`;
        for (let n = 1; fsSync.existsSync(target); n++) {
            target = `${base}.${timestamp}-${n}${ext}`;
        }
        await fs.rename(this.filePath, target);
    }

    /**
     * Rotated files oldest first, then the live file when it exists
     */
    async segments(): Promise<string[]> {
        const dir = path.dirname(this.filePath);
        if (!fsSync.existsSync(dir)) {
            return [];
        }

        const { ext } = this.splitName();
        const prefix = path.basename(this.filePath, ext) + '.';
        const rotated = (await fs.readdir(dir))
            .filter(name => name.startsWith(prefix) && name.endsWith(ext))
            .map(name => ({ name, match: ROTATED_STAMP.exec(name.slice(prefix.length, name.length - ext.length)) }))
            .flatMap(({ name, match }) => match === null
                ? []
                : [{ name, timestamp: match[1], clash: match[2] === undefined ? 0 : Number(match[2]) }])
            .sort((a, b) => a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : a.clash - b.clash)
            .map(({ name }) => path.join(dir, name));

        return fsSync.existsSync(this.filePath) ? [...rotated, this.filePath] : rotated;
    }

    /**
     * Parsed lines in file order; unparseable lines are reported through `onInvalid`
     */
    async readAll(
        onInvalid?: (line: string, lineNumber: number, file: string) => void,
        options: ReadOptions = {}
    ): Promise<unknown[]> {
        const files = options.includeRotated
            ? await this.segments()
            : fsSync.existsSync(this.filePath) ? [this.filePath] : [];

        const entries: unknown[] = [];
        for (const file of files) {
            const content = await fs.readFile(file, 'utf-8');
            content.split('\n').forEach((line, index) => {
                if (line.trim() === '') {
                    return;
                }
                try {
                    entries.push(JSON.parse(line));
                } catch {
                    onInvalid?.(line, index + 1, file);
                }
            });
        }
        return entries;
    }

    getBufferStatus(): { lines: number; bytes: number } {
        return {
            lines: this.buffer.length,
            bytes: this.bufferSize
        };
    }

    private splitName(): { base: string; ext: string } {
        const ext = path.extname(this.filePath);
        return { base: this.filePath.slice(0, this.filePath.length - ext.length), ext };
    }
}
