/**
 * Session facade: one channel, one proxy cache, one event stream and the
 * callback registry, wired together.
 */

import { setTimeout as delay } from "node:timers/promises";
import {
  createCallbackRegistry,
  dispatchNotification,
  shortTag,
  type CallbackRegistry,
} from "./callbacks.ts";
import { createChannel } from "./channel.ts";
import { resolveSessionOptions } from "./config.ts";
import { ConnectionUnavailableError, PreconditionError, TransportError } from "./errors.ts";
import { createEventStream } from "./events.ts";
import { createCommandExecutor } from "./executor.ts";
import { createResultMarshaller } from "./marshaller.ts";
import { createProxyCache, type ObjectHost, type ProxyCache, type RemoteObject } from "./proxy.ts";
import { formatLiteral } from "./repr.ts";
import { DEFAULT_SUBTYPES } from "./subtypes.ts";
import type {
  CommandResult,
  EventCallback,
  EventStreamState,
  ExecuteMode,
  RegisterOptions,
  RenderOptions,
  ResolvedSessionOptions,
  ResultValue,
  SessionOptions,
} from "./types.ts";

export interface EstablishOptions {
  /** Run a version query once connected and keep the answer */
  validate?: boolean;
}

export interface EngineSession extends ObjectHost {
  readonly options: ResolvedSessionOptions;
  /** `objwire://<uuid>/`, the namespace of this session's notifications */
  readonly prefix: string;
  /** Engine version suffix, known after a validated connect */
  readonly engineVersion: string | undefined;
  /** Enum names to numeric ids, as last loaded by refreshEnums() */
  readonly enums: ReadonlyMap<string, number>;
  readonly cache: ProxyCache;
  readonly eventStreamState: EventStreamState;

  /**
   * Keep connecting until the engine answers or `establishTimeout` runs out.
   * @throws ConnectionUnavailableError
   */
  establishConnection(options?: EstablishOptions): Promise<void>;
  /** Single connect attempt; check isConnected() for the outcome */
  connect(): Promise<void>;
  isConnected(): boolean;
  /** Stop the event stream and release the channel, optionally stopping the engine */
  shutdown(stopRemote?: boolean): Promise<void>;
  /** Shut down and forget every handle and registration */
  close(): Promise<void>;

  execute(command: string, mode?: ExecuteMode): Promise<CommandResult>;
  render(options?: RenderOptions): Promise<Uint8Array>;
  geometry(): Promise<Uint8Array>;

  enableEvents(): Promise<void>;
  isEventStreamEnabled(): boolean;
  getEvent(): string | undefined;
  /**
   * Watch `attributes` of `target` and call `callback` with the notification
   * URL. `target` is a handle or an expression such as `ensight.objs.core`.
   */
  register(
    target: RemoteObject | string,
    tag: string,
    attributes: readonly (string | number)[],
    callback: EventCallback,
    options?: RegisterOptions
  ): Promise<void>;
  unregister(tag: string): Promise<void>;

  refreshEnums(): Promise<ReadonlyMap<string, number>>;
  /** The live handle already known for an identity, if any */
  objInstance(objectId: number): RemoteObject | undefined;
}

/**
 * Build a session without touching the network.
 */
export function createEngineSession(options: SessionOptions = {}): EngineSession {
  const resolved = resolveSessionOptions(options);
  const api = resolved.apiModule;

  const channel = createChannel(resolved);
  const executor = createCommandExecutor(channel, resolved.connectTimeout);
  const cache = createProxyCache(resolved.cacheLimit);
  const events = createEventStream(channel, { connectTimeout: resolved.connectTimeout });
  const registry: CallbackRegistry = createCallbackRegistry();
  // Short tags whose addcallback round-trip is still in flight
  const pendingTags = new Set<string>();

  let enums = new Map<string, number>();
  let engineVersion: string | undefined;

  const host: ObjectHost = {
    remoteObjectExpression: (objectId) => `${api}.objs.wrap_id(${objectId})`,
    cmd: (command) => cmd(command),
    run: (command) => run(command),
  };

  const marshaller = createResultMarshaller({
    cache,
    subtypes: options.subtypes ?? DEFAULT_SUBTYPES,
    host,
    evaluate: (command) => executor.evaluate(command),
    attributeId: (name) => enums.get(name) ?? `${api}.objs.enums.${name}`,
  });

  async function cmd(command: string): Promise<ResultValue> {
    return marshaller.marshal(await executor.evaluate(command));
  }

  async function run(command: string): Promise<void> {
    await executor.execute(command, "none");
  }

  async function establishConnection(establish: EstablishOptions = {}): Promise<void> {
    const deadline = Date.now() + resolved.establishTimeout;
    let lastError: unknown;

    while (Date.now() < deadline) {
      await channel.connect(Math.min(resolved.connectTimeout, Math.max(deadline - Date.now(), 1)));
      if (channel.isConnected()) {
        if (!establish.validate) {
          return;
        }
        try {
          engineVersion = String(await cmd(`${api}.version('suffix')`));
          return;
        } catch (err) {
          // The engine may accept connections before it answers commands
          if (!(err instanceof TransportError)) {
            throw err;
          }
          lastError = err;
        }
      }
      await delay(resolved.retryInterval);
    }

    throw new ConnectionUnavailableError(undefined, { cause: lastError });
  }

  async function refreshEnums(): Promise<ReadonlyMap<string, number>> {
    const result = await executor.execute(
      `{key: getattr(${api}.objs.enums, key) for key in dir(${api}.objs.enums)}`,
      "structured"
    );
    const next = new Map<string, number>();
    if (result.mode === "structured" && typeof result.value === "object" && result.value !== null) {
      for (const [key, value] of Object.entries(result.value)) {
        if (key.startsWith("__") && key !== "__OBJID__") continue;
        if (typeof value === "number") {
          next.set(key, value);
        }
      }
    }
    enums = next;
    return enums;
  }

  async function enableEvents(): Promise<void> {
    await events.enable();
  }

  async function register(
    target: RemoteObject | string,
    tag: string,
    attributes: readonly (string | number)[],
    callback: EventCallback,
    registerOptions: RegisterOptions = {}
  ): Promise<void> {
    const short = shortTag(tag);
    if (registry.has(short) || pendingTags.has(short)) {
      throw new PreconditionError(`A callback for tag '${short}' already exists`);
    }
    pendingTags.add(short);
    try {
      await establishConnection();
      const compress = registerOptions.compress ?? true;
      const expression = typeof target === "string" ? target : target.expression;
      const flags = compress ? `,flags=${api}.objs.EVENTMAP_FLAG_COMP_GLOBAL` : "";
      const remoteId = await cmd(
        `${api}.objs.addcallback(${expression},None,` +
          `${formatLiteral(events.prefix + tag)},attrs=${formatLiteral(attributes)}${flags})`
      );
      registry.add({ shortTag: short, remoteId, target: expression, attributes, callback, compress });
    } finally {
      pendingTags.delete(short);
    }

    if (registry.size === 1) {
      events.setDispatcher((event) => {
        dispatchNotification(registry, event);
      });
    }
    // Restarts a stream that broke since the last registration
    await events.enable();
  }

  async function unregister(tag: string): Promise<void> {
    const registration = registry.remove(shortTag(tag));
    await run(`${api}.objs.removecallback(${formatLiteral(registration.remoteId)})`);
  }

  async function shutdown(stopRemote = false): Promise<void> {
    await events.close();
    await channel.shutdown(stopRemote);
  }

  async function close(): Promise<void> {
    await shutdown(false);
    for (const registration of registry.entries()) {
      registry.remove(registration.shortTag);
    }
    cache.clear();
  }

  return {
    ...host,
    options: resolved,
    prefix: events.prefix,
    get engineVersion() {
      return engineVersion;
    },
    get enums() {
      return enums;
    },
    cache,
    get eventStreamState() {
      return events.state;
    },
    establishConnection,
    connect: () => channel.connect(resolved.connectTimeout),
    isConnected: () => channel.isConnected(),
    shutdown,
    close,
    execute: (command, mode) => executor.execute(command, mode),
    render: (renderOptions) => executor.render(renderOptions),
    geometry: () => executor.geometry(),
    enableEvents,
    isEventStreamEnabled: () => events.isEnabled(),
    getEvent: () => events.getEvent(),
    register,
    unregister,
    refreshEnums,
    objInstance: (objectId) => cache.get(objectId),
  };
}

/**
 * Build a session, wait for the engine to answer and load its enum table.
 */
export async function createSession(options: SessionOptions = {}): Promise<EngineSession> {
  const session = createEngineSession(options);
  await session.establishConnection({ validate: true });
  await session.refreshEnums();
  return session;
}
