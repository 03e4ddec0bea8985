/**
 * Edit tracking keeps the bot's response in sync with edits to the
 * message that triggered it.
 *
 * Every trigger/response pair is kept for `maxDurationMs` after the
 * trigger's last edit. Entries live in memory only; a restart starts with
 * an empty cache.
 *
 * All methods are synchronous, so each call runs to completion without
 * interleaving with other event handlers. Callers that await between a
 * lookup and a write must look the entry up again afterwards.
 */

import { logger } from '../middleware/logger.js';
import {
  cloneMessage,
  createEmptyMessage,
  lastUpdatedAt,
  mergeMessageUpdate,
  type Message,
  type MessageUpdate,
} from './message.js';

export const PURGE_INTERVAL_MS = 60_000;

export interface TrackedExchange {
  trigger: Message;
  response: Message;
}

export class EditTracker {
  private readonly exchanges: TrackedExchange[] = [];

  constructor(readonly maxDurationMs: number) {}

  static forTimespan(maxDurationMs: number): EditTracker {
    return new EditTracker(maxDurationMs);
  }

  get size(): number {
    return this.exchanges.length;
  }

  /**
   * Append a trigger/response pair. Does not check for an existing entry
   * with the same trigger; lookups return the oldest one.
   */
  record(trigger: Message, response: Message): void {
    this.exchanges.push({ trigger: cloneMessage(trigger), response: cloneMessage(response) });
  }

  /**
   * Merge a partial update into the tracked trigger and return a copy of the
   * result. Untracked messages get a fresh message built from the update alone.
   */
  applyUpdate(update: MessageUpdate): Message {
    const exchange = this.findResponse(update.id);
    if (exchange) {
      mergeMessageUpdate(exchange.trigger, update);
      return cloneMessage(exchange.trigger);
    }

    const message = createEmptyMessage(update.id, update.channelId);
    mergeMessageUpdate(message, update);
    return message;
  }

  /** Mutable access to the exchange for a trigger message. */
  findResponse(triggerId: string): TrackedExchange | undefined {
    return this.exchanges.find((exchange) => exchange.trigger.id === triggerId);
  }

  /** Stop tracking a deleted trigger and return the response that belonged to it. */
  takeResponse(triggerId: string): Message | undefined {
    const index = this.exchanges.findIndex((exchange) => exchange.trigger.id === triggerId);
    if (index < 0) return undefined;
    const [removed] = this.exchanges.splice(index, 1);
    return removed?.response;
  }

  /**
   * Drop every exchange whose trigger was last updated `maxDurationMs` or
   * more before `now`. Timestamps in the future count as expired.
   *
   * @returns number of removed exchanges
   */
  purge(now: number = Date.now()): number {
    const before = this.exchanges.length;
    let kept = 0;
    for (const exchange of this.exchanges) {
      const age = now - lastUpdatedAt(exchange.trigger);
      if (age >= 0 && age < this.maxDurationMs) {
        this.exchanges[kept++] = exchange;
      }
    }
    this.exchanges.length = kept;
    return before - kept;
  }
}

export interface PurgeTask {
  stop(): void;
}

/**
 * Purge the tracker now and then every `intervalMs` until stopped.
 */
export function startPurgeTask(tracker: EditTracker, intervalMs: number = PURGE_INTERVAL_MS): PurgeTask {
  const runPurge = () => {
    const removed = tracker.purge(Date.now());
    if (removed > 0) {
      logger.debug({ removed, remaining: tracker.size }, 'Purged expired edit-tracking entries');
    }
  };

  runPurge();
  let timer: ReturnType<typeof setInterval> | null = setInterval(runPurge, intervalMs);
  timer.unref();

  return {
    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
