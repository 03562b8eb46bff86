/**
 * Small hand-built maps shared by engine tests.
 */

import { ColonyGraph } from '../../src/core/colony-graph';

/** Build a graph from `[from, direction, to]` triples; endpoints are created on demand. */
export function buildGraph(edges: Array<[string, string, string]>, extraColonies: string[] = []): ColonyGraph {
  const graph = new ColonyGraph();
  for (const [from, , to] of edges) {
    graph.addColony(from);
    graph.addColony(to);
  }
  for (const name of extraColonies) graph.addColony(name);
  for (const [from, direction, to] of edges) graph.addEdge(from, direction, to);
  return graph;
}

export const fizzBuzz = () => buildGraph([
  ['Fizz', 'north', 'Buzz'],
  ['Buzz', 'south', 'Fizz'],
]);

export const threeCycle = () => buildGraph([
  ['A', 'east', 'B'],
  ['B', 'east', 'C'],
  ['C', 'east', 'A'],
]);

/** A 3x3 grid with tunnels both ways between orthogonal neighbours. */
export function grid3x3(): ColonyGraph {
  const edges: Array<[string, string, string]> = [];
  const name = (x: number, y: number) => `G${x}${y}`;
  for (let y = 0; y < 3; y++) {
    for (let x = 0; x < 3; x++) {
      if (x < 2) {
        edges.push([name(x, y), 'east', name(x + 1, y)]);
        edges.push([name(x + 1, y), 'west', name(x, y)]);
      }
      if (y < 2) {
        edges.push([name(x, y), 'south', name(x, y + 1)]);
        edges.push([name(x, y + 1), 'north', name(x, y)]);
      }
    }
  }
  return buildGraph(edges);
}
