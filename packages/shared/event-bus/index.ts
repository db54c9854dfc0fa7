/**
 * Inkline Event Bus — Cross-Package Communication
 *
 * In-process pub/sub. No broker, no network.
 *
 * Pipeline publishes: run.started, run.step_recorded, run.gate_failed,
 *                     run.completed, run.failed, run.cancelled
 * Jobs publishes:     job.created, job.updated, job.expired
 *
 * A handler that throws is logged and skipped; it never reaches the publisher.
 */

import type { EventChannel, EventPayloads, EventSource, BusEvent, EventHandler } from '../types/index.js';
import type { Logger } from '../logger/index.js';
import { createLogger } from '../logger/index.js';

export type ChannelPattern = EventChannel | '*' | 'run.*' | 'job.*';

interface Subscription {
  id: string;
  channel: ChannelPattern;
  handler: EventHandler;
  once: boolean;
}

export function isChannel<C extends EventChannel>(event: BusEvent, channel: C): event is BusEvent<C> {
  return event.channel === channel;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<ChannelPattern, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;
  private logger: Logger;

  constructor(opts?: { maxHistory?: number; logger?: Logger }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
    this.logger = opts?.logger ?? createLogger({ service: 'event-bus' });
  }

  /**
   * Subscribe to one channel. Returns unsubscribe function.
   */
  on<C extends EventChannel>(channel: C, handler: EventHandler<BusEvent<C>>): () => void {
    return this.subscribe(channel, narrow(channel, handler), false);
  }

  /**
   * Subscribe to one channel for exactly one event.
   */
  once<C extends EventChannel>(channel: C, handler: EventHandler<BusEvent<C>>): () => void {
    return this.subscribe(channel, narrow(channel, handler), true);
  }

  /**
   * Subscribe to every event ('*') or to a channel family ('run.*', 'job.*').
   */
  onPattern(pattern: '*' | 'run.*' | 'job.*', handler: EventHandler): () => void {
    return this.subscribe(pattern, handler, false);
  }

  /**
   * Publish an event. Exact, family and wildcard subscribers are notified in
   * subscription order.
   */
  async emit(event: BusEvent): Promise<void> {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    const channelSubs = this.channelIndex.get(event.channel);
    if (channelSubs) {
      for (const id of channelSubs) matchingIds.add(id);
    }

    for (const [channel, subIds] of this.channelIndex) {
      if (channel === '*') {
        for (const id of subIds) matchingIds.add(id);
      } else if (channel.endsWith('.*') && event.channel.startsWith(channel.slice(0, -1))) {
        for (const id of subIds) matchingIds.add(id);
      }
    }

    const ordered = [...matchingIds].sort((a, b) => subNumber(a) - subNumber(b));

    const toRemove: string[] = [];
    for (const id of ordered) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.handler(event);
      } catch (err) {
        this.logger.error({ channel: event.channel, runId: event.runId ?? undefined, error: err }, 'event handler failed');
      }

      if (sub.once) {
        toRemove.push(id);
      }
    }

    for (const id of toRemove) {
      this.unsubscribe(id);
    }
  }

  /**
   * Recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  /**
   * Count of active subscriptions per channel pattern.
   */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [channel, ids] of this.channelIndex) {
      stats[channel] = ids.size;
    }
    return stats;
  }

  clear(): void {
    this.subscriptions.clear();
    this.channelIndex.clear();
    this.history = [];
  }

  private subscribe(channel: ChannelPattern, handler: EventHandler, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    this.subscriptions.set(id, { id, channel, handler, once });

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

function narrow<C extends EventChannel>(channel: C, handler: EventHandler<BusEvent<C>>): EventHandler {
  return (event) => (isChannel(event, channel) ? handler(event) : undefined);
}

function subNumber(id: string): number {
  return Number(id.slice('sub_'.length));
}

/**
 * Process-wide bus for callers that do not inject their own.
 */
let _globalBus: EventBus | null = null;

export function getEventBus(): EventBus {
  if (!_globalBus) {
    _globalBus = new EventBus();
  }
  return _globalBus;
}

/**
 * Build a typed event with the envelope filled in.
 */
export function createEvent<C extends EventChannel>(
  channel: C,
  source: EventSource,
  payload: EventPayloads[C],
  opts?: { runId?: string }
): BusEvent<C> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    runId: opts?.runId ?? null,
    payload,
  };
}
