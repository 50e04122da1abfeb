/**
 * @objwire/client
 *
 * Client runtime for a remote, stateful object engine: channel lifecycle,
 * command execution, live object handles and event callbacks.
 */

export { createSession, createEngineSession } from "./session.ts";
export type { EngineSession, EstablishOptions } from "./session.ts";

export { createChannel, DEFAULT_CONNECT_TIMEOUT } from "./channel.ts";
export type { Channel, ServerStream } from "./channel.ts";

export { createCommandExecutor } from "./executor.ts";
export type { CommandExecutor } from "./executor.ts";

export { createResultMarshaller } from "./marshaller.ts";
export type { ResultMarshaller, ResultMarshallerOptions } from "./marshaller.ts";

export { RemoteObject, ObjectList, createProxyCache, isRemoteObject } from "./proxy.ts";
export type { ObjectHost, ProxyCache, RemoteObjectInit } from "./proxy.ts";

export {
  scanObjectReferences,
  parseLiteral,
  parseLiteralText,
  formatLiteral,
} from "./repr.ts";
export type {
  ObjectReference,
  ScanToken,
  Literal,
  LiteralPiece,
  LiteralInput,
  LiteralSource,
  ParseOutcome,
} from "./repr.ts";

export { createSubtypeTable, resolveSubtype, DEFAULT_SUBTYPES } from "./subtypes.ts";
export type { SubtypeTable, SubtypeEntry, SubtypeDefinition } from "./subtypes.ts";

export { createEventStream, createEventPrefix, EVENT_SCHEME } from "./events.ts";
export type { EventStream, EventStreamOptions, EventDispatcher } from "./events.ts";

export {
  createCallbackRegistry,
  dispatchNotification,
  normalizeNotification,
  notificationTag,
  shortTag,
} from "./callbacks.ts";
export type { CallbackRegistry } from "./callbacks.ts";

export { DEFAULT_SESSION_OPTIONS, ENV, resolveSessionOptions } from "./config.ts";

export {
  TransportError,
  RemoteExecutionError,
  PreconditionError,
  MarshalError,
  ConnectionUnavailableError,
  isTransportError,
} from "./errors.ts";

export type {
  ChannelOptions,
  SessionOptions,
  ResolvedSessionOptions,
  ExecuteMode,
  CommandResult,
  RenderOptions,
  ResultValue,
  EventStreamState,
  EventCallback,
  CallbackRegistration,
  RegisterOptions,
} from "./types.ts";
