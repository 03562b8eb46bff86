/**
 * benchmark.simulation.test.ts
 * Timed silent runs: no reporter attached, the way `run --quiet` wires the engine.
 *
 * Each case builds a fresh map, places the ants and runs to termination several times, then
 * logs the median wall time. Assertions cover only what must hold for any seed: every run
 * ends, and every ant is either destroyed or still standing.
 */

import { describe, it, expect } from 'vitest';
import type { PlacementPolicy } from '@colonysim/types';
import { ColonyGraph } from '../../src/core/colony-graph';
import { MovePool } from '../../src/core/move-pool';
import { SeededRandom } from '../../src/core/random';
import { generateGridMap } from '../../src/core/map-generator';
import { SimulationEngine, type SimulationResult } from '../../src/core/simulation-engine';

const ANT_COUNTS = [3, 6, 9];
const ITERATIONS = 5;

interface BenchCase {
  name: string;
  placement: PlacementPolicy;
  buildMap: (seed: string) => ColonyGraph;
}

function pairMap(): ColonyGraph {
  const graph = new ColonyGraph();
  graph.addColony('A');
  graph.addColony('B');
  graph.addEdge('A', 'north', 'B');
  graph.addEdge('B', 'south', 'A');
  return graph;
}

const CASES: BenchCase[] = [
  { name: 'pair', placement: 'shared', buildMap: () => pairMap() },
  {
    name: 'grid 20x20',
    placement: 'distinct',
    buildMap: (seed) => generateGridMap({ width: 20, height: 20, random: new SeededRandom(`map:${seed}`) }),
  },
  {
    name: 'sparse grid 30x30',
    placement: 'distinct',
    buildMap: (seed) => generateGridMap({ width: 30, height: 30, density: 0.6, random: new SeededRandom(`map:${seed}`) }),
  },
];

async function runSilent(bench: BenchCase, ants: number, seed: string): Promise<{ result: SimulationResult; ms: number }> {
  const graph = bench.buildMap(seed);
  const start = performance.now();
  const engine = new SimulationEngine({
    graph,
    random: new SeededRandom(seed),
    movePool: new MovePool({ concurrency: 4, chunkSize: 1024 }),
  });
  engine.populate(ants, bench.placement);
  const result = await engine.run();
  return { result, ms: performance.now() - start };
}

const median = (values: number[]) => {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)] ?? 0;
};

describe('Simulation benchmarks', () => {
  for (const bench of CASES) {
    for (const ants of ANT_COUNTS) {
      it(`${bench.name} / ${ants} ants`, async () => {
        const timings: number[] = [];

        for (let i = 0; i < ITERATIONS; i++) {
          const { result, ms } = await runSilent(bench, ants, `bench-${i}`);
          timings.push(ms);

          expect(result.ticks).toBeLessThanOrEqual(10_000);
          const destroyed = result.events.reduce((sum, event) => sum + event.agents.length, 0);
          expect(destroyed + result.survivors.length).toBe(ants);
        }

        console.log(`[bench] ${bench.name} / ${ants} ants: median ${median(timings).toFixed(2)}ms over ${ITERATIONS} runs`);
      });
    }
  }

  it('should replay identical runs for a seed', async () => {
    const grid = CASES[1];
    if (!grid) throw new Error('grid case missing');

    const first = await runSilent(grid, 9, 'replay');
    const second = await runSilent(grid, 9, 'replay');

    expect(second.result.ticks).toBe(first.result.ticks);
    expect(second.result.events).toEqual(first.result.events);
    expect(second.result.survivors).toEqual(first.result.survivors);
  });
});
