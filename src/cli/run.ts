/**
 * Simulation Commands
 * `run` loads a map, places the ants and reports every destroyed colony
 */

import { Command } from 'commander';
import { loadConfig, setConfig, type ConfigLoaderOptions } from '../core/config';
import { createEventBus } from '../core/event-bus';
import { InvalidConfigurationError } from '../core/errors';
import { loadMapFile } from '../core/map-parser';
import { formatMap } from '../core/map-format';
import { MovePool } from '../core/move-pool';
import { createRandom } from '../core/random';
import { SimulationEngine, type SimulationResult } from '../core/simulation-engine';
import { PlacementPolicySchema, type Config, type PlacementPolicy } from '../core/types';
import { getLogger, initLogger } from '../infra/logger';
import { attachReporter, buildJsonReport, formatSummary } from './report';
import { consoleOutput, parseIntegerOption, type CliOutput } from './utils';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RunOptions {
  ants?: string;
  map?: string;
  seed?: string;
  maxTicks?: string;
  placement?: string;
  concurrency?: string;
  chunkSize?: string;
  quiet?: boolean;
  json?: boolean;
}

export interface RunContext {
  output?: CliOutput;
  configOptions?: ConfigLoaderOptions;
}

function parsePlacement(raw: string | undefined): PlacementPolicy | undefined {
  if (raw === undefined) return undefined;
  const result = PlacementPolicySchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(`placement must be 'distinct' or 'shared', got '${raw}'`);
  }
  return result.data;
}

/** CLI flags take precedence over every other configuration source. */
function resolveConfig(options: RunOptions, configOptions?: ConfigLoaderOptions): Config {
  loadConfig(configOptions);
  return setConfig({
    seed: options.seed,
    maxTicks: parseIntegerOption('--max-ticks', options.maxTicks),
    placement: parsePlacement(options.placement),
    moveConcurrency: parseIntegerOption('--concurrency', options.concurrency),
    moveChunkSize: parseIntegerOption('--chunk-size', options.chunkSize),
  });
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export async function runSimulation(options: RunOptions, context: RunContext = {}): Promise<SimulationResult> {
  const output = context.output ?? consoleOutput;
  const config = resolveConfig(options, context.configOptions);

  // --debug may already have opened a session log
  if (config.debug && !getLogger().isLevelEnabled('error')) {
    await initLogger({ level: config.logLevel, dataDir: config.dataDir });
  }
  const log = getLogger().child('run');

  if (options.ants === undefined) throw new InvalidConfigurationError('--ants is required');
  if (options.map === undefined) throw new InvalidConfigurationError('--map is required');
  const antCount = parseIntegerOption('--ants', options.ants) ?? 0;
  if (antCount < 1) {
    throw new InvalidConfigurationError(`--ants must be a positive integer, got '${options.ants}'`);
  }

  const eventBus = createEventBus();
  const graph = await loadMapFile(options.map, { eventBus });

  const random = createRandom(config.seed);
  log.info('Starting run', {
    ants: antCount,
    map: options.map,
    seed: random.seed,
    placement: config.placement,
    maxTicks: config.maxTicks,
  });

  const engine = new SimulationEngine({
    graph,
    random,
    eventBus,
    maxTicks: config.maxTicks,
    movePool: new MovePool({ concurrency: config.moveConcurrency, chunkSize: config.moveChunkSize }),
  });
  engine.populate(antCount, config.placement);

  if (!options.quiet && !options.json) {
    attachReporter(eventBus, output.out);
  }

  const startedAt = performance.now();
  const result = await engine.run();
  const summary = { seed: random.seed, elapsedMs: performance.now() - startedAt };

  if (options.json) {
    output.out(JSON.stringify(buildJsonReport(result, summary), null, 2));
    return result;
  }

  if (!options.quiet && result.events.length > 0) output.out('');
  for (const line of formatMap(result.graph)) output.out(line);
  output.err(formatSummary(result, summary));

  return result;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRunCommands(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Run a simulation on a map')
    .option('-a, --ants <count>', 'Number of ants to place')
    .option('-m, --map <path>', 'Path to the map file')
    .option('-s, --seed <seed>', 'Seed for a reproducible run')
    .option('--max-ticks <n>', 'Stop after this many ticks')
    .option('--placement <policy>', "Starting placement: 'distinct' or 'shared'")
    .option('--concurrency <n>', 'Move chunks resolved in parallel')
    .option('--chunk-size <n>', 'Ants per move chunk')
    .option('-q, --quiet', 'Do not print destruction events')
    .option('--json', 'Print a single JSON report')
    .action(async (options: RunOptions) => {
      await runSimulation(options);
    });
}
