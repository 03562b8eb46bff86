/**
 * Simulation Events
 * Typed pub/sub between the engine, the map loader and whatever reports on a run.
 *
 * `emit` awaits each handler in subscription order, so a reporter sees destructions in the
 * order the engine produced them. A failing handler does not stop the ones after it; the first
 * failure is rethrown once they have all run.
 */

import type {
  ColonyName,
  DestructionEvent,
  TerminationReason,
  TickReport,
} from '@colonysim/types';

export interface EventMap {
  'simulation:started': { antCount: number; colonyCount: number };
  'simulation:terminated': {
    reason: TerminationReason;
    ticks: number;
    survivors: number;
    colonies: number;
  };
  'tick:completed': { report: TickReport };
  'colony:destroyed': DestructionEvent;
  'map:loaded': { source: string; colonies: number; edges: number };
  'map:implicit-colony': { colony: ColonyName; line: number };
}

export type EventName = keyof EventMap;
export type EventPayload<E extends EventName> = EventMap[E];
export type EventHandler<E extends EventName> = (payload: EventPayload<E>) => void | Promise<void>;

interface Subscription<E extends EventName> {
  handler: EventHandler<E>;
  once: boolean;
}

type SubscriptionTable = { [E in EventName]?: Array<Subscription<E>> };

export class EventBus {
  private table: SubscriptionTable = {};

  /** Returns the unsubscribe function. */
  on<E extends EventName>(event: E, handler: EventHandler<E>): () => void {
    return this.subscribe(event, { handler, once: false });
  }

  once<E extends EventName>(event: E, handler: EventHandler<E>): () => void {
    return this.subscribe(event, { handler, once: true });
  }

  async emit<E extends EventName>(event: E, payload: EventPayload<E>): Promise<void> {
    const subscriptions = this.table[event];
    if (!subscriptions || subscriptions.length === 0) return;

    // Handlers subscribed during this emit wait for the next one
    let failure: { error: unknown } | null = null;
    for (const subscription of [...subscriptions]) {
      if (subscription.once) this.unsubscribe(event, subscription);
      try {
        await subscription.handler(payload);
      } catch (error) {
        failure ??= { error };
      }
    }

    if (failure) throw failure.error;
  }

  private subscribe<E extends EventName>(event: E, subscription: Subscription<E>): () => void {
    const table: { [K in E]?: Array<Subscription<K>> } = this.table;
    const subscriptions = table[event] ?? [];
    subscriptions.push(subscription);
    table[event] = subscriptions;
    return () => this.unsubscribe(event, subscription);
  }

  private unsubscribe<E extends EventName>(event: E, subscription: Subscription<E>): void {
    const subscriptions = this.table[event];
    const index = subscriptions?.indexOf(subscription) ?? -1;
    if (subscriptions && index !== -1) subscriptions.splice(index, 1);
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}
