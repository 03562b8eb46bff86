/**
 * Ant Roster
 * Active ants and where they stand, indexed both ways.
 */

import type { AgentId, AgentPosition, ColonyName } from '@colonysim/types';

const NOBODY: ReadonlySet<AgentId> = new Set();

export class AntRoster {
  private positions: Map<AgentId, ColonyName> = new Map();
  private occupancy: Map<ColonyName, Set<AgentId>> = new Map();

  get size(): number {
    return this.positions.size;
  }

  /** Assign or relocate an ant. Sharing a colony is allowed; that is how collisions are found. */
  place(agent: AgentId, colony: ColonyName): void {
    const previous = this.positions.get(agent);
    if (previous === colony) return;
    if (previous !== undefined) this.leave(agent, previous);

    this.positions.set(agent, colony);
    let occupants = this.occupancy.get(colony);
    if (!occupants) {
      occupants = new Set();
      this.occupancy.set(colony, occupants);
    }
    occupants.add(agent);
  }

  remove(agent: AgentId): boolean {
    const colony = this.positions.get(agent);
    if (colony === undefined) return false;
    this.positions.delete(agent);
    this.leave(agent, colony);
    return true;
  }

  occupants(colony: ColonyName): ReadonlySet<AgentId> {
    return this.occupancy.get(colony) ?? NOBODY;
  }

  positionOf(agent: AgentId): ColonyName | null {
    return this.positions.get(agent) ?? null;
  }

  has(agent: AgentId): boolean {
    return this.positions.has(agent);
  }

  /** Ids in placement order. Relocation does not change an ant's place in this order. */
  activeAgents(): AgentId[] {
    return Array.from(this.positions.keys());
  }

  entries(): AgentPosition[] {
    return Array.from(this.positions, ([agent, colony]) => ({ agent, colony }));
  }

  private leave(agent: AgentId, colony: ColonyName): void {
    const occupants = this.occupancy.get(colony);
    if (!occupants) return;
    occupants.delete(agent);
    if (occupants.size === 0) this.occupancy.delete(colony);
  }
}
