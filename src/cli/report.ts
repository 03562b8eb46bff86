/**
 * Run Reporter
 * Turns destruction events and the final state into the text a user reads.
 */

import type { AgentId, DestructionEvent, TerminationReason } from '@colonysim/types';
import type { EventBus } from '../core/event-bus';
import type { SimulationResult } from '../core/simulation-engine';
import { formatMap } from '../core/map-format';
import { dim } from './utils';

const REASON_TEXT: Record<TerminationReason, string> = {
  'no-ants': 'every ant was destroyed',
  'all-trapped': 'no ant has a tunnel left',
  'tick-limit': 'tick limit reached',
};

export function formatAgents(agents: readonly AgentId[]): string {
  const names = agents.map(agent => `ant ${agent}`);
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

export function formatDestruction(event: DestructionEvent): string {
  return `${event.colony} has been destroyed by ${formatAgents(event.agents)}!`;
}

/** Print each destruction as it happens. Returns the unsubscribe function. */
export function attachReporter(eventBus: EventBus, write: (line: string) => void): () => void {
  return eventBus.on('colony:destroyed', (event) => {
    write(formatDestruction(event));
  });
}

export interface RunSummary {
  seed: string;
  elapsedMs: number;
}

export function formatSummary(result: SimulationResult, summary: RunSummary): string {
  const ticks = `${result.ticks} tick${result.ticks === 1 ? '' : 's'}`;
  const elapsed = `${summary.elapsedMs.toFixed(1)}ms`;
  return dim(
    `Simulation completed in ${ticks} (${REASON_TEXT[result.reason]}) | ` +
    `Destroyed: ${result.events.length} | Survivors: ${result.survivors.length} | ` +
    `Seed: ${summary.seed} | Time: ${elapsed}`
  );
}

export interface JsonReport {
  seed: string;
  ticks: number;
  reason: TerminationReason;
  elapsedMs: number;
  events: DestructionEvent[];
  survivors: SimulationResult['survivors'];
  map: string[];
}

export function buildJsonReport(result: SimulationResult, summary: RunSummary): JsonReport {
  return {
    seed: summary.seed,
    ticks: result.ticks,
    reason: result.reason,
    elapsedMs: summary.elapsedMs,
    events: result.events,
    survivors: result.survivors,
    map: formatMap(result.graph),
  };
}
