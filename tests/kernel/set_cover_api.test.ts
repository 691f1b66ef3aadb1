import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG } from '../../src/kernel/config';
import { RunLedger } from '../../src/kernel/RunLedger';
import { SetCoverAPI } from '../../src/kernel/SetCoverAPI';
import { MemoryChannel, SolverLogger } from '../../src/kernel/SolverLogger';

const fixture = (name: string) => path.join(__dirname, '..', 'fixtures', name);

describe('SetCoverAPI.run', () => {
  let root: string;
  let ledger: RunLedger;
  let api: SetCoverAPI;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'setcover-api-'));
    ledger = new RunLedger(root);
    api = new SetCoverAPI(new SolverLogger({ channel: new MemoryChannel() }), DEFAULT_CONFIG, ledger);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('records the ratio the verifier reported', async () => {
    const { report } = await api.run(fixture('greedy-gap.txt'), { check: true, optimum: 2, record: true });

    expect(report.verification?.ratio).toBe(1.5);
    const [record] = await ledger.readAll();
    expect(record.ratio).toBe(1.5);
    expect(record.optimum).toBe(2);
  });

  it('records the same ratio when no check ran', async () => {
    const { report } = await api.run(fixture('greedy-gap.txt'), { optimum: 2, record: true });

    expect(report.verification).toBeNull();
    const [record] = await ledger.readAll();
    expect(record.ratio).toBe(1.5);
  });

  it('records a null ratio without a known optimum', async () => {
    await api.run(fixture('weighted.txt'), { record: true });

    const [record] = await ledger.readAll();
    expect(record.optimum).toBeNull();
    expect(record.ratio).toBeNull();
  });

  it('leaves the ledger alone unless recording is enabled', async () => {
    await api.run(fixture('test-3.txt'));

    expect(fs.existsSync(ledger.path)).toBe(false);
  });
});
