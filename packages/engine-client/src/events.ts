/**
 * Background event stream.
 *
 * One reader task per stream blocks on the server stream and hands every
 * notification either to the attached dispatcher or to a FIFO queue.
 *
 *   idle → starting → active → (closed | broken)
 */

import { randomUUID } from "node:crypto";
import { TransportError } from "./errors.ts";
import type { Channel, ServerStream } from "./channel.ts";
import type { EventStreamState } from "./types.ts";

export const EVENT_SCHEME = "objwire";

/** A fresh `objwire://<uuid>/` namespace for one session's notifications. */
export function createEventPrefix(): string {
  return `${EVENT_SCHEME}://${randomUUID()}/`;
}

export type EventDispatcher = (event: string) => void;

export interface EventStream {
  readonly prefix: string;
  readonly state: EventStreamState;
  /** Open the stream and start the reader. No-op while starting or active. */
  enable(): Promise<void>;
  isEnabled(): boolean;
  /** Oldest queued notification, removed from the queue */
  getEvent(): string | undefined;
  /** Number of queued notifications */
  pending(): number;
  /** Route notifications to `dispatcher` instead of the queue (null to stop) */
  setDispatcher(dispatcher: EventDispatcher | null): void;
  /** Cancel the stream and wait for the reader to stop */
  close(): Promise<void>;
}

export interface EventStreamOptions {
  prefix?: string;
  connectTimeout?: number;
}

export function createEventStream(
  channel: Channel,
  options: EventStreamOptions = {}
): EventStream {
  const prefix = options.prefix ?? createEventPrefix();
  const queue: string[] = [];

  let state: EventStreamState = "idle";
  let stream: ServerStream | null = null;
  let reader: Promise<void> | null = null;
  let starting: Promise<void> | null = null;
  let dispatcher: EventDispatcher | null = null;

  function deliver(event: string): void {
    if (!dispatcher) {
      queue.push(event);
      return;
    }
    try {
      dispatcher(event);
    } catch (err) {
      console.error("Event dispatcher failed:", err);
    }
  }

  async function pump(source: ServerStream): Promise<void> {
    for (;;) {
      let event: string;
      try {
        event = await source.read();
      } catch (err) {
        if (stream === source) {
          stream = null;
          reader = null;
          state = "broken";
          const reason = err instanceof Error ? err.message : String(err);
          console.warn(`Event stream stopped: ${reason}`);
        }
        return;
      }
      deliver(event);
    }
  }

  async function open(): Promise<void> {
    try {
      await channel.connect(options.connectTimeout);
      if (!channel.isConnected()) {
        throw new TransportError(`Unable to reach engine at ${channel.address}`);
      }
      const opened = await channel.openStream(prefix);
      if (state !== "starting") {
        // Closed while the stream was being opened
        opened.cancel();
        return;
      }
      stream = opened;
      state = "active";
      reader = pump(opened);
    } catch (err) {
      if (state === "starting") {
        state = "idle";
      }
      throw err;
    }
  }

  function enable(): Promise<void> {
    if (state === "active") {
      return Promise.resolve();
    }
    if (state === "starting" && starting) {
      return starting;
    }
    state = "starting";
    const attempt = open().finally(() => {
      if (starting === attempt) {
        starting = null;
      }
    });
    starting = attempt;
    return attempt;
  }

  async function close(): Promise<void> {
    const source = stream;
    const running = reader;
    stream = null;
    reader = null;
    if (state !== "idle") {
      state = "closed";
    }
    source?.cancel();
    await running;
  }

  return {
    prefix,
    get state() {
      return state;
    },
    enable,
    isEnabled: () => state === "starting" || state === "active",
    getEvent: () => queue.shift(),
    pending: () => queue.length,
    setDispatcher: (next) => {
      dispatcher = next;
    },
    close,
  };
}
