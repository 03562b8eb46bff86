/**
 * Map Commands
 * `check` validates and summarizes a map; `generate` writes a grid map for benchmarking
 */

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { loadMapFile } from '../core/map-parser';
import { formatMap, summarizeMap } from '../core/map-format';
import { generateGridMap } from '../core/map-generator';
import { createRandom } from '../core/random';
import { InvalidConfigurationError } from '../core/errors';
import { consoleOutput, dim, formatTable, parseIntegerOption, parseNumberOption, success, type CliOutput } from './utils';

// ---------------------------------------------------------------------------
// Check
// ---------------------------------------------------------------------------

export async function checkMap(path: string, output: CliOutput = consoleOutput): Promise<void> {
  const graph = await loadMapFile(path);
  const summary = summarizeMap(graph);

  output.out(`${success('✓')} ${path} is a valid map`);
  const rows = [
    { metric: 'Colonies', value: summary.colonies },
    { metric: 'Tunnels', value: summary.tunnels },
    { metric: 'Dead ends', value: summary.deadEnds },
    { metric: 'One-way tunnels', value: summary.oneWay },
    { metric: 'Unreachable dead ends', value: summary.isolated },
  ];
  const columns = [
    { header: 'Metric', key: 'metric' },
    { header: 'Value', key: 'value', align: 'right' as const },
  ];
  for (const line of formatTable(columns, rows)) output.out(line);
}

// ---------------------------------------------------------------------------
// Generate
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  width?: string;
  height?: string;
  density?: string;
  seed?: string;
  out?: string;
}

export async function generateMap(options: GenerateOptions, output: CliOutput = consoleOutput): Promise<string[]> {
  const width = parseIntegerOption('--width', options.width) ?? 10;
  const height = parseIntegerOption('--height', options.height) ?? width;
  const density = parseNumberOption('--density', options.density) ?? 1;
  const random = createRandom(options.seed);

  const lines = formatMap(generateGridMap({ width, height, density, random }));

  if (options.out) {
    if (options.out.trim() === '') throw new InvalidConfigurationError('--out needs a file path');
    await writeFile(options.out, lines.join('\n') + '\n', 'utf-8');
    output.err(dim(`Wrote ${lines.length} colonies to ${options.out} (seed ${random.seed})`));
  } else {
    for (const line of lines) output.out(line);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerMapCommands(program: Command): void {
  program
    .command('check <map>')
    .description('Validate a map file and print its shape')
    .action(async (path: string) => {
      await checkMap(path);
    });

  program
    .command('generate')
    .description('Generate a grid map')
    .option('-w, --width <n>', 'Columns', '10')
    .option('--height <n>', 'Rows (defaults to width)')
    .option('-d, --density <p>', 'Probability each tunnel is kept', '1')
    .option('-s, --seed <seed>', 'Seed for tunnel selection')
    .option('-o, --out <path>', 'Write to a file instead of stdout')
    .action(async (options: GenerateOptions) => {
      await generateMap(options);
    });
}
