import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AppendOnlyWriter } from '../../src/kernel/AppendOnlyWriter';
import { RunLedger, calculateHash, stableStringify } from '../../src/kernel/RunLedger';

describe('RunLedger', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'setcover-ledger-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const run = (cover: number[]) => ({
    instance: 'test-3.txt',
    strategy: 'max-coverage' as const,
    cover,
    optimum: 3,
    ratio: cover.length / 3,
  });

  it('stores runs under .setcover/ledger and chains their hashes', async () => {
    const ledger = new RunLedger(root);
    const first = await ledger.append(run([0, 1, 2]));
    const second = await ledger.append(run([0, 1, 2, 3]));

    expect(ledger.path).toBe(path.join(root, '.setcover', 'ledger', 'runs.jsonl'));
    expect(first.prevHash).toBeNull();
    expect(second.prevHash).toBe(first.hash);
    expect(second.coverSize).toBe(4);

    const reopened = new RunLedger(root);
    expect(await reopened.head()).toBe(second.hash);
    expect((await reopened.readAll()).map(r => r.id)).toEqual([first.id, second.id]);
    expect(await reopened.verify()).toEqual({ valid: true, entries: 2, errors: [] });
  });

  it('detects an edited record', async () => {
    const ledger = new RunLedger(root);
    const first = await ledger.append(run([0, 1, 2]));
    await ledger.append(run([2, 1, 0]));

    const lines = fs.readFileSync(ledger.path, 'utf-8').trim().split('\n');
    lines[0] = lines[0].replace('"coverSize":3', '"coverSize":2');
    fs.writeFileSync(ledger.path, lines.join('\n') + '\n');

    expect(await new RunLedger(ledger.path).verify()).toEqual({
      valid: false,
      entries: 2,
      errors: [`Hash mismatch for run ${first.id}`],
    });
  });

  it('follows the chain across rotated files', async () => {
    const ledger = new RunLedger(root, 0);
    const first = await ledger.append(run([0]));
    const second = await ledger.append(run([1]));
    const third = await ledger.append(run([2]));

    expect(await new AppendOnlyWriter(ledger.path).segments()).toHaveLength(3);
    const reopened = new RunLedger(root, 0);
    expect(await reopened.verify()).toEqual({ valid: true, entries: 3, errors: [] });
    expect((await reopened.readAll()).map(r => r.id)).toEqual([first.id, second.id, third.id]);

    const fourth = await reopened.append(run([3]));
    expect(fourth.prevHash).toBe(third.hash);
  });

  it('detects a missing rotated file and bad lines inside rotated files', async () => {
    const ledger = new RunLedger(root, 0);
    await ledger.append(run([0]));
    const second = await ledger.append(run([1]));
    await ledger.append(run([2]));

    const [oldest, middle] = await new AppendOnlyWriter(ledger.path).segments();
    fs.rmSync(oldest);
    fs.appendFileSync(middle, '{oops\n');

    expect(await new RunLedger(root).verify()).toEqual({
      valid: false,
      entries: 2,
      errors: [`Line 2 of ${path.basename(middle)} is not valid JSON`, `Broken chain at run ${second.id}`],
    });
  });

  it('detects a deleted record and lines that are not JSON', async () => {
    const ledger = new RunLedger(root);
    await ledger.append(run([0]));
    const second = await ledger.append(run([1]));

    const lines = fs.readFileSync(ledger.path, 'utf-8').trim().split('\n');
    fs.writeFileSync(ledger.path, [lines[1], '{oops'].join('\n') + '\n');

    expect(await new RunLedger(ledger.path).verify()).toEqual({
      valid: false,
      entries: 1,
      errors: ['Line 2 is not valid JSON', `Broken chain at run ${second.id}`],
    });
  });
});

describe('stableStringify', () => {
  it('sorts keys and drops undefined values', () => {
    expect(stableStringify({ b: 1, a: [true, null], c: undefined })).toBe('{"a":[true,null],"b":1}');
    expect(calculateHash({ x: 1, y: 2 })).toBe(calculateHash({ y: 2, x: 1 }));
  });
});

describe('AppendOnlyWriter', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'setcover-writer-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('buffers until flushed', async () => {
    const writer = new AppendOnlyWriter(path.join(root, 'nested', 'log.jsonl'));
    await writer.append({ n: 1 });

    expect(writer.getBufferStatus()).toEqual({ lines: 1, bytes: '{"n":1}\n'.length });
    expect(await writer.readAll()).toEqual([]);

    await writer.flush();
    expect(await writer.readAll()).toEqual([{ n: 1 }]);
    expect(writer.getBufferStatus()).toEqual({ lines: 0, bytes: 0 });
  });

  it('rotates a file that reached its size limit', async () => {
    const file = path.join(root, 'log.jsonl');
    fs.writeFileSync(file, '{"old":true}\n');
    const writer = new AppendOnlyWriter(file, 0);

    await writer.append({ fresh: true }, { fsync: true });

    expect(await writer.readAll()).toEqual([{ fresh: true }]);
    const rotated = fs.readdirSync(root).filter(name => name !== 'log.jsonl');
    expect(rotated).toHaveLength(1);
    expect(rotated[0]).toMatch(/^log\.\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z\.jsonl$/);
  });

  it('never overwrites a rotated file from the same millisecond', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-10-19T03:04:05.678Z'));
    try {
      const file = path.join(root, 'log.jsonl');
      fs.writeFileSync(file, '{"old":true}\n');
      const writer = new AppendOnlyWriter(file, 0);

      for (const n of [1, 2, 3]) {
        await writer.append({ n }, { fsync: true });
      }

      expect((await writer.segments()).map(segment => path.basename(segment))).toEqual([
        'log.2026-10-19T03-04-05-678Z.jsonl',
        'log.2026-10-19T03-04-05-678Z-1.jsonl',
        'log.2026-10-19T03-04-05-678Z-2.jsonl',
        'log.jsonl',
      ]);
      expect(await writer.readAll(undefined, { includeRotated: true })).toEqual([
        { old: true },
        { n: 1 },
        { n: 2 },
        { n: 3 },
      ]);
      expect(await writer.readAll()).toEqual([{ n: 3 }]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('lists no segments before anything is written', async () => {
    expect(await new AppendOnlyWriter(path.join(root, 'missing', 'log.jsonl')).segments()).toEqual([]);
  });
});
