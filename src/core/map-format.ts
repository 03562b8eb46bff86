/**
 * Map Format
 * Renders a graph back to map-file lines and summarizes its shape.
 */

import type { ColonyGraph } from './colony-graph';

export function formatColony(graph: ColonyGraph, colony: string): string {
  const tunnels = graph.neighbors(colony).map(t => `${t.direction}=${t.target}`);
  return [colony, ...tunnels].join(' ');
}

/** One line per surviving colony, in the order the colonies were loaded. */
export function formatMap(graph: ColonyGraph): string[] {
  return graph.colonies().map(colony => formatColony(graph, colony));
}

export interface MapSummary {
  colonies: number;
  tunnels: number;
  deadEnds: number;
  /** Tunnels whose target has no tunnel leading back. */
  oneWay: number;
  isolated: number;
}

export function summarizeMap(graph: ColonyGraph): MapSummary {
  let deadEnds = 0;
  let oneWay = 0;
  let isolated = 0;

  for (const colony of graph.colonies()) {
    const tunnels = graph.neighbors(colony);
    if (tunnels.length === 0) {
      deadEnds++;
      if (graph.sourcesOf(colony).length === 0) isolated++;
    }
    for (const { target } of tunnels) {
      if (!graph.neighbors(target).some(back => back.target === colony)) oneWay++;
    }
  }

  return {
    colonies: graph.colonyCount(),
    tunnels: graph.edgeCount(),
    deadEnds,
    oneWay,
    isolated,
  };
}
