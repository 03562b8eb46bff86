/**
 * Map Command Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { checkMap, generateMap } from '../../src/cli/maps';
import type { CliOutput } from '../../src/cli/utils';

describe('Map commands', () => {
  let root: string;
  let lines: string[];
  let errors: string[];
  let output: CliOutput;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'colonysim-maps-'));
    lines = [];
    errors = [];
    output = {
      out: (line) => { lines.push(line); },
      err: (line) => { errors.push(line); },
    };
    process.env.NO_COLOR = '1';
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    delete process.env.NO_COLOR;
  });

  describe('checkMap', () => {
    it('should print a summary table', async () => {
      const path = join(root, 'world.map');
      writeFileSync(path, 'Fizz north=Buzz\nBuzz south=Fizz\nLone\n');

      await checkMap(path, output);

      const row = (metric: string, value: number) => `${metric.padEnd(21)}  ${String(value).padStart(5)}`;
      expect(lines).toEqual([
        `✓ ${path} is a valid map`,
        `${'Metric'.padEnd(21)}  Value`,
        `${'-'.repeat(21)}  -----`,
        row('Colonies', 3),
        row('Tunnels', 2),
        row('Dead ends', 1),
        row('One-way tunnels', 0),
        row('Unreachable dead ends', 1),
      ]);
    });

    it('should fail on a malformed map', async () => {
      const path = join(root, 'broken.map');
      writeFileSync(path, 'Fizz north=Buzz\nFizz south=Buzz\n');

      await expect(checkMap(path, output)).rejects.toThrow("line 2: colony 'Fizz' already defined on line 1");
      expect(lines).toEqual([]);
    });
  });

  describe('generateMap', () => {
    it('should print a full grid to stdout', async () => {
      const result = await generateMap({ width: '2', seed: 'test-seed' }, output);

      expect(lines).toEqual([
        'R0C0 south=R1C0 east=R0C1',
        'R0C1 south=R1C1 west=R0C0',
        'R1C0 north=R0C0 east=R1C1',
        'R1C1 north=R0C1 west=R1C0',
      ]);
      expect(result).toEqual(lines);
      expect(errors).toEqual([]);
    });

    it('should write to a file and report where', async () => {
      const path = join(root, 'grid.map');

      await generateMap({ width: '3', height: '1', seed: 'test-seed', out: path }, output);

      expect(readFileSync(path, 'utf-8')).toBe('R0C0 east=R0C1\nR0C1 east=R0C2 west=R0C0\nR0C2 west=R0C1\n');
      expect(lines).toEqual([]);
      expect(errors).toEqual([`Wrote 3 colonies to ${path} (seed test-seed)`]);
    });

    it('should produce the same sparse grid for the same seed', async () => {
      const first = await generateMap({ width: '5', density: '0.5', seed: 'test-seed' }, output);
      const second = await generateMap({ width: '5', density: '0.5', seed: 'test-seed' }, output);
      expect(second).toEqual(first);
    });

    it('should reject bad sizes', async () => {
      await expect(generateMap({ width: 'wide' }, output)).rejects.toThrow("--width must be an integer, got 'wide'");
      await expect(generateMap({ width: '2', density: '2' }, output))
        .rejects.toThrow('density must be between 0 and 1, got 2');
    });
  });
});
