import type { CycleOutcome, MonitoringStatistics } from "../types/monitoring.js";
import { logger } from "../utils/logger.js";

const log = logger.child("events");

export type MonitoringEvent =
  | { type: "stats:updated"; stats: MonitoringStatistics }
  | { type: "cycle:started"; trigger: CycleTrigger }
  | { type: "cycle:completed"; trigger: CycleTrigger; outcome: Extract<CycleOutcome, { ok: true }> }
  | { type: "cycle:failed"; trigger: CycleTrigger; outcome: Extract<CycleOutcome, { ok: false }> }
  | { type: "reply:sent"; contentItemId: string; commentId: string; private: boolean }
  | { type: "reply:failed"; contentItemId: string; commentId: string; private: boolean; error: string }
  | { type: "scheduler:started"; intervalSeconds: number }
  | { type: "scheduler:stopped" }
  | { type: "scheduler:interval_changed"; intervalSeconds: number };

export type CycleTrigger = "start" | "schedule" | "manual";

export type MonitoringEventType = MonitoringEvent["type"];

export type Stamped<E extends MonitoringEvent = MonitoringEvent> = E & { at: number };

type EventOf<T extends MonitoringEventType> = Extract<MonitoringEvent, { type: T }>;

type Listener = (event: Stamped) => void;

function hasType<T extends MonitoringEventType>(event: Stamped, type: T): event is Stamped<EventOf<T>> {
  return event.type === type;
}

/**
 * Fan-out channel for engine notifications. Listeners are isolated from one
 * another: a throwing listener is logged and the rest still run.
 */
export class MonitoringEventBus {
  private readonly listeners = new Set<Listener>();

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Subscribes to a single event type, narrowed. */
  on<T extends MonitoringEventType>(type: T, listener: (event: Stamped<EventOf<T>>) => void): () => void {
    return this.subscribe((event) => {
      if (hasType(event, type)) listener(event);
    });
  }

  emit(event: MonitoringEvent): void {
    const stamped: Stamped = { ...event, at: Date.now() };
    for (const listener of this.listeners) {
      try {
        listener(stamped);
      } catch (error) {
        log.error("event_listener_failed", {
          type: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }
}
