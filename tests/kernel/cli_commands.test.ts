import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ORLibraryFile } from '../../src/core/ORLibraryFile';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../../src/kernel/CliCommands';
import { NOT_A_SOLUTION } from '../../src/kernel/ReportFormatter';
import { MemoryChannel } from '../../src/kernel/SolverLogger';

const fixture = (name: string) => path.join(__dirname, '..', 'fixtures', name);

describe('runCli', () => {
  let cwd: string;
  let channel: MemoryChannel;
  let output: string;

  const run = (...argv: string[]) =>
    runCli(argv, {
      cwd,
      channel,
      stdout: text => {
        output += text;
      },
    });

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'setcover-cli-'));
    channel = new MemoryChannel();
    output = '';
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  describe('solve', () => {
    it('prints size and ratio, taking the optimum from the test-N file name', async () => {
      const code = await run('solve', fixture('test-3.txt'), '--check', '--skip-print');

      expect(code).toBe(EXIT_OK);
      const lines = output.split('\n');
      expect(lines[0]).toMatch(/^\d+\.\d{6}$/);
      expect(lines.slice(1)).toEqual(['3', 'optimum 3, ratio 1.000', '']);
    });

    it('prints the chosen subsets unless skip_print is given', async () => {
      await run('solve', fixture('test-2.txt'));

      expect(output.split('\n').slice(1)).toEqual(['2', 'optimum 2, ratio 1.000', '0 1 2', '3 4 5', '']);
    });

    it('renders JSON with the optimum from an optima table', async () => {
      const code = await run('solve', fixture('greedy-gap.txt'), '--format', 'json', '--optima', fixture('optima.csv'));

      expect(code).toBe(EXIT_OK);
      const doc = JSON.parse(output);
      expect(doc.cover).toEqual([2, 0, 1]);
      expect(doc.referenceOptimum).toBe(2);
      expect(doc.subsets).toEqual([[0, 1, 3, 4], [0, 1, 2], [3, 4, 5]]);
    });

    it('uses the cost-effective strategy when asked', async () => {
      await run('solve', fixture('weighted.txt'), '--strategy=cost-effective', '--format=json');

      const doc = JSON.parse(output);
      expect(doc.cover).toEqual([1, 2]);
      expect(doc.totalWeight).toBe(6);
    });

    it('exits with failure and no report on an uncoverable instance', async () => {
      const code = await run('solve', fixture('unsolvable.txt'));

      expect(code).toBe(EXIT_FAILURE);
      expect(output).toBe('');
      expect(channel.lines.some(line => line.includes('❌ UNSOLVABLE: Instance is not coverable'))).toBe(true);
    });

    it('exits with failure on a missing input file', async () => {
      const code = await run('solve', fixture('nope.txt'));

      expect(code).toBe(EXIT_FAILURE);
      expect(channel.lines.some(line => line.includes('❌ MALFORMED_INPUT:'))).toBe(true);
    });
  });

  describe('verify', () => {
    it('accepts a valid cover', async () => {
      const code = await run('verify', fixture('greedy-gap.txt'), fixture('gap-cover.txt'), '--optimum', '2');

      expect(code).toBe(EXIT_OK);
      expect(output).toBe('Cover is valid: 2 subset(s) cover all 6 element(s)\nratio 1.000 (greedy bound 2.083)\n');
    });

    it('rejects a cover with an out-of-range index', async () => {
      const code = await run('verify', fixture('greedy-gap.txt'), fixture('bad-cover.txt'));

      expect(code).toBe(EXIT_FAILURE);
      expect(output).toBe(
        [NOT_A_SOLUTION, 'covered 3/6 element(s) with 2 subset(s)', 'missing elements: 3 4 5', 'invalid indices: 7'].join(
          '\n'
        ) + '\n'
      );
    });
  });

  describe('convert', () => {
    it('writes an instance that reads back the same', async () => {
      const target = path.join(cwd, 'small.set');
      const code = await run('convert', fixture('small.json'), target, '--to', 'setfile');

      expect(code).toBe(EXIT_OK);
      const converted = await ORLibraryFile.read(target);
      expect(converted.format).toBe('setfile');
      expect(converted.universeSize).toBe(5);
      expect(converted.subsets.map(s => Array.from(s).sort((a, b) => a - b))).toEqual([[0, 1, 2], [2, 3], [3, 4]]);
    });

    it('fails without writing when the set-file target cannot hold repeated sets', async () => {
      const input = path.join(cwd, 'dup.txt');
      const target = path.join(cwd, 'dup.set');
      fs.writeFileSync(input, '2 3\n1 1 1\n2 1 2\n1 3\n');

      expect(await run('convert', input, target, '--to', 'setfile')).toBe(EXIT_FAILURE);
      expect(fs.existsSync(target)).toBe(false);
      expect(channel.lines.some(line => line.includes('❌ MALFORMED_INPUT:') && line.includes('set 1 repeats set 0'))).toBe(
        true
      );
    });
  });

  describe('ledger verify', () => {
    it('reports an empty ledger as valid', async () => {
      expect(await run('ledger', 'verify')).toBe(EXIT_OK);
      expect(output).toBe('✅ Run ledger: VALID (0 run(s))\n');
    });

    it('counts recorded runs', async () => {
      await run('solve', fixture('test-3.txt'), '--record', '--skip-print');
      await run('solve', fixture('test-2.txt'), '--record', '--skip-print');
      output = '';

      expect(await run('ledger', 'verify')).toBe(EXIT_OK);
      expect(output).toBe('✅ Run ledger: VALID (2 run(s))\n');
    });

    it('reports a tampered ledger', async () => {
      await run('solve', fixture('test-3.txt'), '--record', '--skip-print');
      const ledgerPath = path.join(cwd, '.setcover', 'ledger', 'runs.jsonl');
      fs.writeFileSync(ledgerPath, fs.readFileSync(ledgerPath, 'utf-8').replace('"test-3.txt"', '"test-4.txt"'));
      output = '';

      expect(await run('ledger', 'verify')).toBe(EXIT_FAILURE);
      expect(output.startsWith('❌ Run ledger: INVALID\n  - Hash mismatch for run ')).toBe(true);
    });
  });

  describe('usage', () => {
    it('prints usage for help and with no command', async () => {
      expect(await run('help')).toBe(EXIT_OK);
      expect(output).toContain('setcover solve <input>');
      output = '';
      expect(await run()).toBe(EXIT_OK);
      expect(output).toContain('setcover ledger verify');
    });

    it('rejects unknown options', async () => {
      expect(await run('solve', fixture('test-3.txt'), '--bogus')).toBe(EXIT_USAGE);
      expect(channel.lines).toEqual(['❌ Unknown option --bogus']);
    });

    it('rejects unknown commands and bad option values', async () => {
      expect(await run('frobnicate')).toBe(EXIT_USAGE);
      expect(await run('solve', fixture('test-3.txt'), '--strategy', 'random')).toBe(EXIT_USAGE);
      expect(await run('solve', fixture('test-3.txt'), '--optimum', '0')).toBe(EXIT_USAGE);
      expect(await run('verify', fixture('test-3.txt'))).toBe(EXIT_USAGE);
    });
  });
});
