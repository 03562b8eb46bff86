/**
 * Move Pool
 * Resolves a tick's moves in parallel chunks against a graph that is read-only for the phase.
 *
 * Each request already carries its roll, drawn in roster order by the engine, so the
 * resulting moves do not depend on how chunks are scheduled or in which order they finish.
 * Results are written by request index; plan() resolves only after every chunk is done.
 */

import type { AgentId, ColonyName, Direction } from '@colonysim/types';
import type { ColonyGraph } from './colony-graph';
import { pickIndex } from './random';

export interface MoveRequest {
  agent: AgentId;
  from: ColonyName;
  /** Uniform in [0, 1). */
  roll: number;
}

export interface Move {
  agent: AgentId;
  from: ColonyName;
  direction: Direction;
  to: ColonyName;
}

export interface MovePoolOptions {
  /** Chunks allowed in flight at once. */
  concurrency?: number;
  /** Requests per chunk. */
  chunkSize?: number;
  /** Awaited by every chunk before it runs; lets other work interleave. */
  yieldFn?: () => Promise<void>;
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class MovePool {
  readonly concurrency: number;
  readonly chunkSize: number;
  private yieldFn: () => Promise<void>;

  constructor(options: MovePoolOptions = {}) {
    this.concurrency = options.concurrency ?? 4;
    this.chunkSize = options.chunkSize ?? 1024;
    this.yieldFn = options.yieldFn ?? yieldToEventLoop;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
  }

  /**
   * Resolve every request to a move, or null when its colony has no tunnel left.
   * The output is index-aligned with `requests`.
   */
  async plan(requests: readonly MoveRequest[], graph: ColonyGraph): Promise<Array<Move | null>> {
    const results: Array<Move | null> = new Array<Move | null>(requests.length).fill(null);
    if (requests.length === 0) return results;

    const chunkCount = Math.ceil(requests.length / this.chunkSize);
    let nextChunk = 0;

    const worker = async (): Promise<void> => {
      while (nextChunk < chunkCount) {
        const chunk = nextChunk++;
        await this.yieldFn();
        const start = chunk * this.chunkSize;
        const end = Math.min(start + this.chunkSize, requests.length);
        for (let i = start; i < end; i++) {
          const request = requests[i];
          if (request) results[i] = resolveMove(request, graph);
        }
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.concurrency, chunkCount); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);
    return results;
  }
}

export function resolveMove(request: MoveRequest, graph: ColonyGraph): Move | null {
  const tunnels = graph.neighbors(request.from);
  if (tunnels.length === 0) return null;

  const tunnel = tunnels[pickIndex(request.roll, tunnels.length)];
  if (!tunnel) return null;
  return {
    agent: request.agent,
    from: request.from,
    direction: tunnel.direction,
    to: tunnel.target,
  };
}
