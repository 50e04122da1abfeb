/**
 * Types for the engine client.
 */

import type { RemoteObject, ObjectList } from "./proxy.ts";
import type { Literal } from "./repr.ts";
import type { SubtypeTable } from "./subtypes.ts";

// ============================================================================
// Options
// ============================================================================

export interface ChannelOptions {
  /** Unix socket path (takes precedence over host/port) */
  socket?: string;
  /** TCP host (default: 127.0.0.1) */
  host?: string;
  /** TCP port (default: 12345) */
  port?: number;
  /** Shared secret sent with every call; empty means no metadata */
  securityToken?: string;
}

export interface SessionOptions extends ChannelOptions {
  /** How long a single connect attempt may wait for readiness, in ms */
  connectTimeout?: number;
  /** How long the session keeps retrying before giving up, in ms */
  establishTimeout?: number;
  /** Pause between connection attempts, in ms */
  retryInterval?: number;
  /** Proxy cache size above which the cache is flushed */
  cacheLimit?: number;
  /** Name of the engine's scripting module (object API lives under `<apiModule>.objs`) */
  apiModule?: string;
  /** Polymorphic class table; defaults to the bundled table */
  subtypes?: SubtypeTable;
}

export interface ResolvedSessionOptions {
  socket: string | undefined;
  host: string;
  port: number;
  securityToken: string;
  connectTimeout: number;
  establishTimeout: number;
  retryInterval: number;
  cacheLimit: number;
  apiModule: string;
}

// ============================================================================
// Command Execution
// ============================================================================

/**
 * - `none`: run as a statement
 * - `evaluated`: evaluate, return the textual representation
 * - `structured`: evaluate, return the value as JSON
 */
export type ExecuteMode = "none" | "evaluated" | "structured";

export type CommandResult =
  | { mode: "none" }
  | { mode: "evaluated"; text: string }
  | { mode: "structured"; value: unknown };

export interface RenderOptions {
  width?: number;
  height?: number;
  /** Number of anti-aliasing passes */
  aaPasses?: number;
  /** PNG stream when true, raw RGB bytes otherwise */
  png?: boolean;
  /** Include selection highlighting */
  highlighting?: boolean;
}

// ============================================================================
// Marshalled Values
// ============================================================================

/**
 * A value reconstructed from an evaluated command result. A top-level list
 * comes back as an ObjectList.
 */
export type ResultValue = Literal<RemoteObject> | ObjectList;

// ============================================================================
// Events
// ============================================================================

export type EventStreamState = "idle" | "starting" | "active" | "closed" | "broken";

/** Called with the notification URL that fired. */
export type EventCallback = (url: string) => void;

export interface CallbackRegistration {
  /** The tag up to its first query separator */
  shortTag: string;
  /** Identity of the watch on the engine side */
  remoteId: ResultValue;
  target: string;
  attributes: readonly (string | number)[];
  callback: EventCallback;
  compress: boolean;
}

export interface RegisterOptions {
  /**
   * Collapse repeated notifications for the same watch into the latest one.
   * Applied by the engine, not locally. Default: true
   */
  compress?: boolean;
}
