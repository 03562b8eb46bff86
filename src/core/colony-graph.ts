/**
 * Colony Graph
 * Mutable directed graph of colonies and the labelled tunnels between them.
 *
 * Outgoing tunnels are kept per colony as direction -> target. A reverse index
 * (target -> source -> directions) lets destroy() drop every incoming tunnel in
 * O(in-degree) instead of scanning all colonies.
 */

import type { ColonyName, Direction, Tunnel } from '@colonysim/types';
import { UnknownColonyError } from './errors';

const EMPTY: readonly Tunnel[] = Object.freeze([]);

export class ColonyGraph {
  private outgoing: Map<ColonyName, Map<Direction, ColonyName>> = new Map();
  private incoming: Map<ColonyName, Map<ColonyName, Set<Direction>>> = new Map();
  private edges = 0;

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /** Idempotent; an existing colony keeps its edges and its position. */
  addColony(name: ColonyName): void {
    if (this.outgoing.has(name)) return;
    this.outgoing.set(name, new Map());
    this.incoming.set(name, new Map());
  }

  /** Record `from --direction--> to`, replacing any edge already using that direction. */
  addEdge(from: ColonyName, direction: Direction, to: ColonyName): void {
    const tunnels = this.outgoing.get(from);
    if (!tunnels) throw new UnknownColonyError(from);
    if (!this.outgoing.has(to)) throw new UnknownColonyError(to);

    const previous = tunnels.get(direction);
    if (previous === undefined) {
      this.edges++;
    } else {
      this.dropReference(previous, from, direction);
    }

    // Map.set on an existing key keeps the direction's position
    tunnels.set(direction, to);
    this.referencesTo(to, from).add(direction);
  }

  removeEdge(from: ColonyName, direction: Direction): boolean {
    const tunnels = this.outgoing.get(from);
    const target = tunnels?.get(direction);
    if (!tunnels || target === undefined) return false;

    tunnels.delete(direction);
    this.edges--;
    this.dropReference(target, from, direction);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  exists(name: ColonyName): boolean {
    return this.outgoing.has(name);
  }

  colonyCount(): number {
    return this.outgoing.size;
  }

  edgeCount(): number {
    return this.edges;
  }

  /** Colonies in the order they were first added. */
  colonies(): ColonyName[] {
    return Array.from(this.outgoing.keys());
  }

  neighbors(name: ColonyName): readonly Tunnel[] {
    const tunnels = this.outgoing.get(name);
    if (!tunnels || tunnels.size === 0) return EMPTY;

    const result: Tunnel[] = [];
    for (const [direction, target] of tunnels) {
      result.push({ direction, target });
    }
    return result;
  }

  outDegree(name: ColonyName): number {
    return this.outgoing.get(name)?.size ?? 0;
  }

  /** Colonies that have at least one tunnel leading into `name`. */
  sourcesOf(name: ColonyName): ColonyName[] {
    return Array.from(this.incoming.get(name)?.keys() ?? []);
  }

  // ---------------------------------------------------------------------------
  // Destruction
  // ---------------------------------------------------------------------------

  /**
   * Remove a colony together with every tunnel into or out of it.
   * Returns false when the colony is already gone.
   */
  destroy(name: ColonyName): boolean {
    const tunnels = this.outgoing.get(name);
    const sources = this.incoming.get(name);
    if (!tunnels || !sources) return false;

    for (const [source, directions] of sources) {
      if (source === name) continue;
      const sourceTunnels = this.outgoing.get(source);
      if (!sourceTunnels) continue;
      for (const direction of directions) {
        sourceTunnels.delete(direction);
        this.edges--;
      }
    }

    for (const target of tunnels.values()) {
      this.edges--;
      if (target === name) continue;
      this.incoming.get(target)?.delete(name);
    }

    this.outgoing.delete(name);
    this.incoming.delete(name);
    return true;
  }

  clone(): ColonyGraph {
    const copy = new ColonyGraph();
    for (const name of this.outgoing.keys()) copy.addColony(name);
    for (const [from, tunnels] of this.outgoing) {
      for (const [direction, to] of tunnels) copy.addEdge(from, direction, to);
    }
    return copy;
  }

  private dropReference(target: ColonyName, source: ColonyName, direction: Direction): void {
    const sources = this.incoming.get(target);
    const directions = sources?.get(source);
    if (!sources || !directions) return;
    directions.delete(direction);
    if (directions.size === 0) sources.delete(source);
  }

  private referencesTo(target: ColonyName, source: ColonyName): Set<Direction> {
    let sources = this.incoming.get(target);
    if (!sources) {
      sources = new Map();
      this.incoming.set(target, sources);
    }
    let directions = sources.get(source);
    if (!directions) {
      directions = new Set();
      sources.set(source, directions);
    }
    return directions;
  }
}
