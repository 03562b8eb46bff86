/**
 * Shared Type Contracts for colonysim
 * Type-only module: consumers import with `import type`
 */

// ---------------------------------------------------------------------------
// Graph Identities
// ---------------------------------------------------------------------------

export type ColonyName = string;

/** Tunnel label such as `north`; opaque to the engine beyond uniqueness per colony. */
export type Direction = string;

export interface Tunnel {
  direction: Direction;
  target: ColonyName;
}

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

export type AgentId = number;

export interface AgentPosition {
  agent: AgentId;
  colony: ColonyName;
}

export type PlacementPolicy = 'distinct' | 'shared';

// ---------------------------------------------------------------------------
// Simulation Lifecycle
// ---------------------------------------------------------------------------

export type SimulationState = 'running' | 'terminated';

export type TerminationReason = 'no-ants' | 'all-trapped' | 'tick-limit';

export interface DestructionEvent {
  /** Tick the collision happened on; 0 for ants that were placed together. */
  tick: number;
  colony: ColonyName;
  /** Ascending. */
  agents: AgentId[];
}

export interface TickReport {
  tick: number;
  moved: number;
  destroyed: DestructionEvent[];
  activeAgents: number;
  colonies: number;
  state: SimulationState;
}

// ---------------------------------------------------------------------------
// Log Levels
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
