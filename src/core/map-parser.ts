/**
 * Map Parser
 * Builds a ColonyGraph from map text, one colony per line:
 *
 *   Fizz north=Buzz west=Bar
 *   Buzz south=Fizz
 *
 * Colonies that only appear as tunnel targets are created implicitly.
 */

import { readFile } from 'fs/promises';
import type { ColonyName, Direction } from '@colonysim/types';
import { ColonyGraph } from './colony-graph';
import { InvalidConfigurationError, MapParseError } from './errors';
import type { EventBus } from './event-bus';
import { getLogger } from '../infra/logger';

interface ParsedLine {
  line: number;
  colony: ColonyName;
  tunnels: Array<{ direction: Direction; target: ColonyName }>;
}

export interface ParseOptions {
  /** Name used in log and event output. */
  source?: string;
  eventBus?: EventBus;
}

function parseLine(text: string, line: number): ParsedLine | null {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return null;

  const [colony, ...tokens] = trimmed.split(/\s+/);
  if (colony === undefined) return null;
  if (colony.includes('=')) {
    throw new MapParseError(`expected a colony name before tunnels, got '${colony}'`, line);
  }

  const tunnels: ParsedLine['tunnels'] = [];
  const directions = new Set<Direction>();
  for (const token of tokens) {
    const separator = token.indexOf('=');
    const direction = separator > 0 ? token.slice(0, separator) : '';
    const target = separator > 0 ? token.slice(separator + 1) : '';
    if (direction === '' || target === '' || target.includes('=')) {
      throw new MapParseError(`malformed tunnel '${token}', expected direction=Colony`, line);
    }
    if (directions.has(direction)) {
      throw new MapParseError(`direction '${direction}' given twice for ${colony}`, line);
    }
    directions.add(direction);
    tunnels.push({ direction, target });
  }

  return { line, colony, tunnels };
}

export async function parseMap(text: string, options: ParseOptions = {}): Promise<ColonyGraph> {
  const graph = new ColonyGraph();
  const definedAt = new Map<ColonyName, number>();
  const parsed: ParsedLine[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const entry = parseLine(lines[i] ?? '', i + 1);
    if (!entry) continue;

    const previous = definedAt.get(entry.colony);
    if (previous !== undefined) {
      throw new MapParseError(`colony '${entry.colony}' already defined on line ${previous}`, entry.line);
    }
    definedAt.set(entry.colony, entry.line);
    graph.addColony(entry.colony);
    parsed.push(entry);
  }

  // Second pass so a target defined further down keeps its own line's position
  for (const entry of parsed) {
    for (const { direction, target } of entry.tunnels) {
      if (!graph.exists(target)) {
        graph.addColony(target);
        await options.eventBus?.emit('map:implicit-colony', { colony: target, line: entry.line });
      }
      graph.addEdge(entry.colony, direction, target);
    }
  }

  const source = options.source ?? '<inline>';
  getLogger().child('map').debug('Map parsed', {
    source,
    colonies: graph.colonyCount(),
    edges: graph.edgeCount(),
  });
  await options.eventBus?.emit('map:loaded', {
    source,
    colonies: graph.colonyCount(),
    edges: graph.edgeCount(),
  });

  return graph;
}

export async function loadMapFile(path: string, options: Omit<ParseOptions, 'source'> = {}): Promise<ColonyGraph> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`cannot read map file ${path}: ${reason}`);
  }
  return parseMap(text, { ...options, source: path });
}
