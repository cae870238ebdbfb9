/**
 * Typed publish/subscribe channel with an append-only, queryable history.
 *
 * One channel is created per run and handed to every component that needs
 * it; there is no module-level instance.
 *
 * Ordering:
 *   - history() returns events in publish order
 *   - handlers for a type run in registration order, synchronously, inside
 *     publish(); a query issued after publish() returns sees the event
 */

import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logging/index.js";
import {
  EventType,
  type EventHandler,
  type PipelineEvent,
} from "../types/index.js";
import {
  errorMessage,
  UpstreamFailedError,
  UpstreamTimeoutError,
} from "./errors.js";

export type EventPredicate = (event: PipelineEvent) => boolean;

/** An event before the channel stamps its sequence number. */
export type UnsequencedEvent = Omit<PipelineEvent, "sequence">;

export interface WaitForOptions {
  /** Upper bound on the wait */
  timeoutMs: number;
  /** Fixed interval between history checks */
  pollIntervalMs: number;
  /** Only accept events matching this predicate */
  predicate?: EventPredicate;
  /** Give up early when a stage-failed event matching this appears */
  failWhen?: EventPredicate;
}

/**
 * Build a new event with a fresh id and timestamp.
 */
export function createEvent(
  type: EventType,
  sourceStage: string,
  payload: Record<string, unknown> = {}
): UnsequencedEvent {
  return {
    id: randomUUID(),
    type,
    sourceStage,
    payload: Object.freeze({ ...payload }),
    timestamp: new Date().toISOString(),
  };
}

export class EventChannel {
  private readonly handlers = new Map<EventType, EventHandler[]>();
  private readonly events: PipelineEvent[] = [];
  private readonly seenIds = new Set<string>();

  constructor(private readonly logger: Logger) {}

  /**
   * Register a handler for one event type.
   *
   * @returns a function that removes the handler
   */
  subscribe(type: EventType, handler: EventHandler): () => void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
    this.logger.debug("Subscribed to event", { type });

    return () => {
      const current = this.handlers.get(type);
      if (!current) return;
      const index = current.indexOf(handler);
      if (index >= 0) current.splice(index, 1);
    };
  }

  /**
   * Append an event to history and deliver it to the type's handlers.
   * A handler that throws is logged; delivery continues with the next one.
   *
   * @returns the stored event, or undefined when the id was already published
   */
  publish(event: UnsequencedEvent): PipelineEvent | undefined {
    if (this.seenIds.has(event.id)) {
      this.logger.debug("Ignoring duplicate event", { id: event.id, type: event.type });
      return undefined;
    }

    const stored: PipelineEvent = Object.freeze({
      ...event,
      sequence: this.events.length + 1,
    });
    this.seenIds.add(stored.id);
    this.events.push(stored);
    this.logger.debug("Event published", {
      type: stored.type,
      source: stored.sourceStage,
      sequence: stored.sequence,
    });

    for (const handler of [...(this.handlers.get(stored.type) ?? [])]) {
      try {
        handler(stored);
      } catch (err) {
        this.logger.error("Event handler failed", {
          type: stored.type,
          error: errorMessage(err),
        });
      }
    }

    return stored;
  }

  /**
   * Create and publish an event in one step.
   */
  emit(
    type: EventType,
    sourceStage: string,
    payload: Record<string, unknown> = {}
  ): PipelineEvent | undefined {
    return this.publish(createEvent(type, sourceStage, payload));
  }

  /**
   * All events, or those of one type, in publish order.
   */
  history(type?: EventType): readonly PipelineEvent[] {
    if (type === undefined) {
      return [...this.events];
    }
    return this.events.filter((event) => event.type === type);
  }

  /**
   * Most recent event of a type (last write wins).
   */
  latest(type: EventType, predicate?: EventPredicate): PipelineEvent | undefined {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const event = this.events[i];
      if (event.type === type && (predicate === undefined || predicate(event))) {
        return event;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Poll history until a matching event shows up.
   *
   * @throws UpstreamTimeoutError when timeoutMs elapses first
   * @throws UpstreamFailedError when a matching stage-failed event appears first
   */
  async waitFor(type: EventType, options: WaitForOptions): Promise<PipelineEvent> {
    const deadline = Date.now() + options.timeoutMs;

    for (;;) {
      const found = this.latest(type, options.predicate);
      if (found) {
        return found;
      }

      if (options.failWhen) {
        const failure = this.latest(EventType.StageFailed, options.failWhen);
        if (failure) {
          const reason = failure.payload.error;
          throw new UpstreamFailedError(
            failure.sourceStage,
            type,
            typeof reason === "string" ? reason : undefined
          );
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new UpstreamTimeoutError(type, options.timeoutMs);
      }
      await sleep(Math.min(options.pollIntervalMs, remaining));
    }
  }
}
