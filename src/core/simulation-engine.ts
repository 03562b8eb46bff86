/**
 * Simulation Engine
 * Drives ticks over a colony graph: parallel move phase, then a single serial pass that
 * resolves encounters and collisions and destroys colonies.
 */

import type {
  AgentId,
  AgentPosition,
  ColonyName,
  DestructionEvent,
  PlacementPolicy,
  SimulationState,
  TerminationReason,
  TickReport,
} from '@colonysim/types';
import type { ColonyGraph } from './colony-graph';
import type { EventBus } from './event-bus';
import type { RandomSource } from './random';
import { AntRoster } from './ant-roster';
import { MovePool, type Move, type MoveRequest } from './move-pool';
import { InvalidConfigurationError, UnknownColonyError } from './errors';
import { getLogger, type ScopedLogger } from '../infra/logger';

export const DEFAULT_MAX_TICKS = 10_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SimulationOptions {
  graph: ColonyGraph;
  random: RandomSource;
  /** Runs with no collisions and no dead ends never end on their own. */
  maxTicks?: number;
  eventBus?: EventBus;
  movePool?: MovePool;
}

export interface SimulationResult {
  ticks: number;
  reason: TerminationReason;
  events: DestructionEvent[];
  /** The surviving map; the same instance the engine mutated. */
  graph: ColonyGraph;
  survivors: AgentPosition[];
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class SimulationEngine {
  readonly graph: ColonyGraph;
  readonly roster = new AntRoster();
  private random: RandomSource;
  private eventBus: EventBus | null;
  private movePool: MovePool;
  private maxTicks: number;
  private state: SimulationState = 'running';
  private reason: TerminationReason | null = null;
  private tick = 0;
  private started = false;
  private events: DestructionEvent[] = [];
  private log = getLogger().child('engine');

  constructor(options: SimulationOptions) {
    this.graph = options.graph;
    this.random = options.random;
    this.eventBus = options.eventBus ?? null;
    this.movePool = options.movePool ?? new MovePool();
    this.maxTicks = options.maxTicks ?? DEFAULT_MAX_TICKS;

    if (!Number.isInteger(this.maxTicks) || this.maxTicks < 1) {
      throw new InvalidConfigurationError(`maxTicks must be a positive integer, got ${this.maxTicks}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Placement
  // ---------------------------------------------------------------------------

  /**
   * Place ants `0..count-1` on random colonies.
   * `distinct` gives every ant its own colony; `shared` draws a colony per ant.
   */
  populate(count: number, placement: PlacementPolicy): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidConfigurationError(`ant count must be a positive integer, got ${count}`);
    }

    const colonies = this.graph.colonies();
    if (colonies.length === 0) {
      throw new InvalidConfigurationError('map has no colonies to place ants on');
    }

    if (placement === 'distinct') {
      if (count > colonies.length) {
        throw new InvalidConfigurationError(
          `${count} ants need distinct colonies but the map has only ${colonies.length}`
        );
      }
      // Partial Fisher-Yates: the first `count` slots end up a uniform sample
      for (let i = 0; i < count; i++) {
        const j = i + this.random.nextInt(colonies.length - i);
        const picked = colonies[j];
        const current = colonies[i];
        if (picked === undefined || current === undefined) break;
        colonies[i] = picked;
        colonies[j] = current;
        this.place(i, picked);
      }
      return;
    }

    for (let i = 0; i < count; i++) {
      const colony = colonies[this.random.nextInt(colonies.length)];
      if (colony !== undefined) this.place(i, colony);
    }
  }

  place(agent: AgentId, colony: ColonyName): void {
    if (!this.graph.exists(colony)) throw new UnknownColonyError(colony);
    this.roster.place(agent, colony);
  }

  // ---------------------------------------------------------------------------
  // Stepping
  // ---------------------------------------------------------------------------

  async run(): Promise<SimulationResult> {
    await this.start();
    while (this.state === 'running') {
      await this.step();
    }
    return this.result();
  }

  async step(): Promise<TickReport> {
    await this.start();
    if (this.state === 'terminated') return this.report([], 0);

    this.tick++;

    // Rolls are drawn serially in roster order so the parallel phase cannot reorder them
    const requests: MoveRequest[] = [];
    for (const agent of this.roster.activeAgents()) {
      const from = this.roster.positionOf(agent);
      if (from === null || this.graph.outDegree(from) === 0) continue;
      requests.push({ agent, from, roll: this.random.next() });
    }

    const planned = await this.movePool.plan(requests, this.graph);
    const moves = planned.filter((move): move is Move => move !== null);

    for (const move of moves) {
      this.roster.place(move.agent, move.to);
    }
    this.resolveEncounters(moves);

    const destroyed = await this.resolveCollisions();
    const report = this.report(destroyed, moves.length);

    await this.eventBus?.emit('tick:completed', { report });
    await this.evaluateTermination();
    report.state = this.state;
    return report;
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  getState(): SimulationState {
    return this.state;
  }

  getTerminationReason(): TerminationReason | null {
    return this.reason;
  }

  getTick(): number {
    return this.tick;
  }

  /** Copies; the engine keeps appending to its own log. */
  getEvents(): DestructionEvent[] {
    return this.events.map(copyEvent);
  }

  /** True when some active ant still has a tunnel to take. */
  hasMovableAnt(): boolean {
    for (const agent of this.roster.activeAgents()) {
      const colony = this.roster.positionOf(agent);
      if (colony !== null && this.graph.outDegree(colony) > 0) return true;
    }
    return false;
  }

  /** Final outcome; only available once the run has terminated. */
  result(): SimulationResult {
    if (this.reason === null) {
      throw new Error(`Simulation is still running at tick ${this.tick}`);
    }
    return {
      ticks: this.tick,
      reason: this.reason,
      events: this.getEvents(),
      graph: this.graph,
      survivors: this.roster.entries(),
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Announce the run, settle ants placed on the same colony, and check for a trivial end. */
  private async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.log.debug('Simulation starting', {
      ants: this.roster.size,
      colonies: this.graph.colonyCount(),
      maxTicks: this.maxTicks,
      concurrency: this.movePool.concurrency,
    });
    await this.eventBus?.emit('simulation:started', {
      antCount: this.roster.size,
      colonyCount: this.graph.colonyCount(),
    });

    await this.resolveCollisions();
    await this.evaluateTermination();
  }

  /**
   * Ants crossing the same pair of colonies in opposite directions meet in the tunnel.
   * All of them end the tick at the destination of the lowest-id ant among them.
   */
  private resolveEncounters(moves: readonly Move[]): void {
    const byPair = new Map<string, Move[]>();
    for (const move of moves) {
      if (move.from === move.to) continue;
      const key = move.from < move.to ? `${move.from}\u0000${move.to}` : `${move.to}\u0000${move.from}`;
      const group = byPair.get(key);
      if (group) {
        group.push(move);
      } else {
        byPair.set(key, [move]);
      }
    }

    for (const group of byPair.values()) {
      const first = group[0];
      if (!first || !group.some(move => move.from !== first.from)) continue;

      const leader = group.reduce((low, move) => (move.agent < low.agent ? move : low), first);
      for (const move of group) {
        this.roster.place(move.agent, leader.to);
      }
      this.tickLog().debug('Head-on encounter', {
        colony: leader.to,
        agents: group.map(move => move.agent),
      });
    }
  }

  /** Destroy every colony holding two or more ants, in roster order of discovery. */
  private async resolveCollisions(): Promise<DestructionEvent[]> {
    const crowded: ColonyName[] = [];
    const seen = new Set<ColonyName>();
    for (const agent of this.roster.activeAgents()) {
      const colony = this.roster.positionOf(agent);
      if (colony === null || seen.has(colony)) continue;
      seen.add(colony);
      if (this.roster.occupants(colony).size >= 2) crowded.push(colony);
    }

    const destroyed: DestructionEvent[] = [];
    for (const colony of crowded) {
      const agents = Array.from(this.roster.occupants(colony)).sort((a, b) => a - b);
      for (const agent of agents) this.roster.remove(agent);
      this.graph.destroy(colony);

      const event: DestructionEvent = { tick: this.tick, colony, agents };
      destroyed.push(copyEvent(event));
      this.events.push(event);
      this.tickLog().debug('Colony destroyed', { colony, agents });
      await this.eventBus?.emit('colony:destroyed', copyEvent(event));
    }
    return destroyed;
  }

  private async evaluateTermination(): Promise<void> {
    if (this.state === 'terminated') return;

    let reason: TerminationReason | null = null;
    if (this.roster.size === 0) {
      reason = 'no-ants';
    } else if (!this.hasMovableAnt()) {
      reason = 'all-trapped';
    } else if (this.tick >= this.maxTicks) {
      reason = 'tick-limit';
    }
    if (reason === null) return;

    this.state = 'terminated';
    this.reason = reason;

    if (reason === 'tick-limit') {
      this.tickLog().warn('Tick limit reached with ants still moving', {
        maxTicks: this.maxTicks,
        ants: this.roster.size,
      });
    }
    this.tickLog().info('Simulation terminated', { reason, survivors: this.roster.size });
    await this.eventBus?.emit('simulation:terminated', {
      reason,
      ticks: this.tick,
      survivors: this.roster.size,
      colonies: this.graph.colonyCount(),
    });
  }

  private tickLog(): ScopedLogger {
    return this.log.with({ tick: this.tick });
  }

  private report(destroyed: DestructionEvent[], moved: number): TickReport {
    return {
      tick: this.tick,
      moved,
      destroyed,
      activeAgents: this.roster.size,
      colonies: this.graph.colonyCount(),
      state: this.state,
    };
  }
}

function copyEvent(event: DestructionEvent): DestructionEvent {
  return { tick: event.tick, colony: event.colony, agents: [...event.agents] };
}
