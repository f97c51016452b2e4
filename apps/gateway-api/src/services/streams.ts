import type { LiveEvent, StreamResetEvent } from "@cellgate/shared";

export type StreamEvent = {
  id: number;
  type: LiveEvent["type"];
  data: LiveEvent;
  ts: number;
};

type Listener = (event: StreamEvent) => void;

type StreamState = {
  nextId: number;
  buffer: StreamEvent[];
  listeners: Set<Listener>;
};

export type StreamLimits = {
  maxEvents: number;
  maxAgeMs: number;
};

// A snapshot per second; enough to cover a short client reconnect.
const DEFAULT_LIMITS: StreamLimits = { maxEvents: 300, maxAgeMs: 5 * 60 * 1000 };

export const LIVE_STREAM = "live";

export class StreamManager {
  private streams = new Map<string, StreamState>();

  constructor(
    private readonly limits: StreamLimits = DEFAULT_LIMITS,
    private readonly now: () => number = Date.now
  ) {}

  private ensure(key: string): StreamState {
    let state = this.streams.get(key);
    if (!state) {
      state = { nextId: 1, buffer: [], listeners: new Set() };
      this.streams.set(key, state);
    }
    return state;
  }

  private prune(state: StreamState) {
    const cutoff = this.now() - this.limits.maxAgeMs;
    while (state.buffer.length > 0) {
      if (state.buffer.length > this.limits.maxEvents || state.buffer[0].ts < cutoff) {
        state.buffer.shift();
        continue;
      }
      break;
    }
  }

  private toEvent(state: StreamState, data: LiveEvent): StreamEvent {
    return { id: state.nextId++, type: data.type, data, ts: this.now() };
  }

  private push(state: StreamState, event: StreamEvent) {
    state.buffer.push(event);
    this.prune(state);
    for (const listener of state.listeners) {
      listener(event);
    }
  }

  publish(streamKey: string, data: LiveEvent) {
    const state = this.ensure(streamKey);
    this.push(state, this.toEvent(state, data));
  }

  private emitReset(state: StreamState): StreamEvent {
    const reset: StreamResetEvent = {
      type: "stream_reset",
      reason: "history_unavailable",
      ts: new Date(this.now()).toISOString(),
    };
    const event = this.toEvent(state, reset);
    this.push(state, event);
    return event;
  }

  subscribe(
    streamKey: string,
    lastEventId: number | null,
    listener: Listener
  ): { unsubscribe: () => void } {
    const state = this.ensure(streamKey);
    if (lastEventId !== null && !Number.isNaN(lastEventId)) {
      const idx = state.buffer.findIndex((evt) => evt.id === lastEventId);
      if (idx >= 0) {
        state.buffer.slice(idx + 1).forEach((evt) => listener(evt));
      } else {
        listener(this.emitReset(state));
      }
    }
    state.listeners.add(listener);
    return {
      unsubscribe: () => {
        state.listeners.delete(listener);
      },
    };
  }

  listenerCount(streamKey: string) {
    return this.streams.get(streamKey)?.listeners.size ?? 0;
  }
}
