/**
 * Grid Map Generator
 * Produces benchmark maps: a width x height grid with compass tunnels between neighbours.
 */

import { ColonyGraph } from './colony-graph';
import { InvalidConfigurationError } from './errors';
import type { RandomSource } from './random';

export interface GridMapOptions {
  width: number;
  height: number;
  /** Probability that each tunnel is kept, in [0, 1]. */
  density?: number;
  random: RandomSource;
}

const COMPASS: ReadonlyArray<{ direction: string; dx: number; dy: number }> = [
  { direction: 'north', dx: 0, dy: -1 },
  { direction: 'south', dx: 0, dy: 1 },
  { direction: 'east', dx: 1, dy: 0 },
  { direction: 'west', dx: -1, dy: 0 },
];

export const gridColonyName = (x: number, y: number): string => `R${y}C${x}`;

export function generateGridMap(options: GridMapOptions): ColonyGraph {
  const { width, height, random } = options;
  const density = options.density ?? 1;

  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new InvalidConfigurationError(`grid size must be positive integers, got ${width}x${height}`);
  }
  if (!(density >= 0 && density <= 1)) {
    throw new InvalidConfigurationError(`density must be between 0 and 1, got ${density}`);
  }

  const graph = new ColonyGraph();
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) graph.addColony(gridColonyName(x, y));
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      for (const { direction, dx, dy } of COMPASS) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        if (density < 1 && random.next() >= density) continue;
        graph.addEdge(gridColonyName(x, y), direction, gridColonyName(nx, ny));
      }
    }
  }

  return graph;
}
