/**
 * Channel handling for the engine client.
 *
 * Owns the socket, correlates replies with requests, attaches the
 * authentication metadata and feeds server-pushed events into per-stream
 * receivers.
 */

import { connect as netConnect, type Socket } from "node:net";
import {
  buildFrame,
  createFrameParser,
  getMessageTypeName,
  ErrorCode,
  MessageType,
  SHARED_SECRET_KEY,
  type Message,
  type MetadataEntry,
  type OutgoingRequest,
  type PingMessage,
  type Request,
  type ResponseError,
} from "@objwire/protocol";
import { TransportError } from "./errors.ts";
import type { ChannelOptions } from "./types.ts";

export const DEFAULT_CONNECT_TIMEOUT = 15_000;

/**
 * A server-pushed sequence of notification strings.
 */
export interface ServerStream {
  readonly streamId: number;
  /**
   * Resolve the next item. Rejects with a TransportError once the stream has
   * ended, been cancelled, or the channel closed.
   */
  read(): Promise<string>;
  /** Ask the engine to stop the stream and fail any pending read. */
  cancel(): void;
  isEnded(): boolean;
}

export interface Channel {
  /** Socket path or host:port the channel talks to */
  readonly address: string;
  /**
   * Open the transport and wait up to `timeout` ms for readiness.
   * Never throws: a failed attempt leaves the channel disconnected.
   */
  connect(timeout?: number): Promise<void>;
  isConnected(): boolean;
  /** Optionally stop the engine, then release the transport. Idempotent. */
  shutdown(stopRemote?: boolean): Promise<void>;
  /** Metadata attached to every outgoing call */
  metadata(): MetadataEntry[];
  /** Unary request/reply. Resolves with the reply's `data`. */
  call(request: OutgoingRequest): Promise<unknown>;
  /** Open a server stream of notifications for the given prefix */
  openStream(prefix: string): Promise<ServerStream>;
}

interface PendingRequest {
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

interface StreamWaiter {
  resolve: (event: string) => void;
  reject: (error: Error) => void;
}

interface StreamReceiver {
  streamId: number;
  /** Items pushed before anyone asked for them */
  buffered: string[];
  waiters: StreamWaiter[];
  error: TransportError | null;
}

interface ChannelState {
  socket: Socket | null;
  pendingRequests: Map<number, PendingRequest>;
  streams: Map<number, StreamReceiver>;
  nextRequestId: number;
  connecting: Promise<void> | null;
}

/**
 * Create a channel. Nothing is opened until `connect` is called.
 */
export function createChannel(options: ChannelOptions = {}): Channel {
  const host = options.host ?? "127.0.0.1";
  const port = options.port ?? 12345;
  const token = options.securityToken ?? "";
  const address = options.socket ?? `${host}:${port}`;

  const state: ChannelState = {
    socket: null,
    pendingRequests: new Map(),
    streams: new Map(),
    nextRequestId: 1,
    connecting: null,
  };

  function metadata(): MetadataEntry[] {
    return token ? [[SHARED_SECRET_KEY, token]] : [];
  }

  async function connect(timeout = DEFAULT_CONNECT_TIMEOUT): Promise<void> {
    if (state.socket) {
      return;
    }
    if (!state.connecting) {
      state.connecting = establish(state, options, timeout).finally(() => {
        state.connecting = null;
      });
    }
    await state.connecting;
  }

  async function shutdown(stopRemote = false): Promise<void> {
    const socket = state.socket;
    if (!socket) {
      return;
    }
    try {
      if (stopRemote) {
        await call({ type: MessageType.EXIT });
      }
    } finally {
      teardown(state, socket, new TransportError("Channel shut down"));
    }
  }

  function call(request: OutgoingRequest): Promise<unknown> {
    const requestId = state.nextRequestId++;
    const entries = metadata();
    const message: Request =
      entries.length > 0
        ? { ...request, requestId, metadata: entries }
        : { ...request, requestId };
    return sendRequest(state, message);
  }

  async function openStream(prefix: string): Promise<ServerStream> {
    const requestId = state.nextRequestId++;
    const receiver: StreamReceiver = {
      streamId: requestId,
      buffered: [],
      waiters: [],
      error: null,
    };
    // Registered before the request goes out: pushes may follow the reply
    // in the same chunk
    state.streams.set(requestId, receiver);

    const entries = metadata();
    const message: Request = {
      type: MessageType.EVENT_STREAM_OPEN,
      requestId,
      prefix,
      ...(entries.length > 0 ? { metadata: entries } : {}),
    };

    try {
      await sendRequest(state, message);
    } catch (err) {
      state.streams.delete(requestId);
      throw err;
    }

    return {
      streamId: requestId,
      read: () => readStream(receiver),
      cancel: () => {
        if (receiver.error) {
          return;
        }
        const socket = state.socket;
        if (socket) {
          const cancelMessage: Message = {
            type: MessageType.EVENT_STREAM_CANCEL,
            requestId,
            ...(entries.length > 0 ? { metadata: entries } : {}),
          };
          sendMessage(socket, cancelMessage);
        }
        endStream(state, receiver, new TransportError("Event stream cancelled"));
      },
      isEnded: () => receiver.error !== null,
    };
  }

  return {
    address,
    connect,
    isConnected: () => state.socket !== null,
    shutdown,
    metadata,
    call,
    openStream,
  };
}

/**
 * Open the socket and run the PING/PONG readiness handshake, both bounded
 * by `timeout`. Leaves `state.socket` null on any failure.
 */
async function establish(
  state: ChannelState,
  options: ChannelOptions,
  timeout: number
): Promise<void> {
  const deadline = Date.now() + timeout;

  let socket: Socket;
  try {
    socket = await createSocket(options, timeout);
  } catch {
    // Timeout and refusal are both reported through isConnected()
    return;
  }

  attachSocket(state, socket);

  try {
    const remaining = Math.max(deadline - Date.now(), 1);
    await sendRequest(
      state,
      { type: MessageType.PING, requestId: state.nextRequestId++ },
      remaining
    );
  } catch {
    // No PONG in time: the peer is not ready for calls
    teardown(state, socket, new TransportError("Engine did not become ready"));
  }
}

/**
 * Create a socket connection.
 */
function createSocket(options: ChannelOptions, timeout: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = options.socket
      ? netConnect(options.socket)
      : netConnect(options.port ?? 12345, options.host ?? "127.0.0.1");

    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      reject(new TransportError(`Unable to connect: ${err.message}`, { cause: err }));
    };

    const timeoutId = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(new TransportError("Connection timeout"));
    }, timeout);

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timeoutId);
      socket.removeListener("error", onError);
      resolve(socket);
    });
  });
}

function attachSocket(state: ChannelState, socket: Socket): void {
  const parser = createFrameParser();
  let lastError: Error | undefined;

  state.socket = socket;

  socket.on("data", (data: Buffer) => {
    try {
      for (const frame of parser.feed(new Uint8Array(data))) {
        handleMessage(frame.message, state);
      }
    } catch (err) {
      console.error("Error parsing frame:", err);
      teardown(
        state,
        socket,
        new TransportError("Malformed frame from engine", { cause: err })
      );
    }
  });

  socket.on("error", (err) => {
    // The close event that follows reports the failure to callers
    lastError = err;
  });

  socket.on("close", () => {
    teardown(
      state,
      socket,
      new TransportError("Connection closed", {
        code: ErrorCode.CONNECTION_LOST,
        cause: lastError,
      })
    );
  });
}

/**
 * Release the socket and fail everything that was waiting on it.
 */
function teardown(state: ChannelState, socket: Socket, error: TransportError): void {
  if (state.socket === socket) {
    state.socket = null;
  }
  socket.destroy();

  for (const [, pending] of state.pendingRequests) {
    if (pending.timeoutId) {
      clearTimeout(pending.timeoutId);
    }
    pending.reject(error);
  }
  state.pendingRequests.clear();

  for (const receiver of [...state.streams.values()]) {
    endStream(state, receiver, error);
  }
}

/**
 * Handle an incoming message from the engine.
 */
function handleMessage(message: Message, state: ChannelState): void {
  switch (message.type) {
    case MessageType.RESPONSE_OK:
    case MessageType.PONG: {
      const pending = takePending(state, message.requestId);
      pending?.resolve(message.type === MessageType.RESPONSE_OK ? message.data : undefined);
      break;
    }

    case MessageType.RESPONSE_ERROR: {
      const pending = takePending(state, message.requestId);
      pending?.reject(toTransportError(message));
      break;
    }

    case MessageType.EVENT_PUSH: {
      const receiver = state.streams.get(message.requestId);
      if (receiver) {
        pushStream(receiver, message.event);
      }
      break;
    }

    case MessageType.EVENT_STREAM_END: {
      const receiver = state.streams.get(message.requestId);
      if (receiver) {
        endStream(
          state,
          receiver,
          new TransportError(message.reason ?? "Event stream ended", {
            code: ErrorCode.STREAM_CLOSED,
          })
        );
      }
      break;
    }

    default:
      console.warn(
        `Unexpected message from engine: ${getMessageTypeName(message.type)}`
      );
  }
}

function takePending(state: ChannelState, requestId: number): PendingRequest | undefined {
  const pending = state.pendingRequests.get(requestId);
  if (pending) {
    state.pendingRequests.delete(requestId);
    if (pending.timeoutId) clearTimeout(pending.timeoutId);
  }
  return pending;
}

function toTransportError(response: ResponseError): TransportError {
  const error = new TransportError(response.message, { code: response.code });
  if (response.details?.stack) {
    error.stack = response.details.stack;
  }
  return error;
}

/**
 * Send a message to the engine.
 */
function sendMessage(socket: Socket, message: Message): void {
  socket.write(buildFrame(message));
}

/**
 * Send a request and wait for its reply. Without a timeout the call waits
 * until the reply arrives or the transport fails.
 */
function sendRequest(
  state: ChannelState,
  message: Request | PingMessage,
  timeout?: number
): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const socket = state.socket;
    if (!socket) {
      reject(new TransportError("Not connected"));
      return;
    }

    const requestId = message.requestId;
    const pending: PendingRequest = { resolve, reject };

    if (timeout !== undefined) {
      pending.timeoutId = setTimeout(() => {
        state.pendingRequests.delete(requestId);
        reject(new TransportError("Request timeout"));
      }, timeout);
    }

    state.pendingRequests.set(requestId, pending);

    try {
      sendMessage(socket, message);
    } catch (err) {
      takePending(state, requestId);
      reject(new TransportError("Unable to send request", { cause: err }));
    }
  });
}

// ============================================================================
// Stream receivers
// ============================================================================

function pushStream(receiver: StreamReceiver, event: string): void {
  const waiter = receiver.waiters.shift();
  if (waiter) {
    waiter.resolve(event);
  } else {
    receiver.buffered.push(event);
  }
}

function readStream(receiver: StreamReceiver): Promise<string> {
  const next = receiver.buffered.shift();
  if (next !== undefined) {
    return Promise.resolve(next);
  }
  if (receiver.error) {
    return Promise.reject(receiver.error);
  }
  return new Promise((resolve, reject) => {
    receiver.waiters.push({ resolve, reject });
  });
}

function endStream(state: ChannelState, receiver: StreamReceiver, error: TransportError): void {
  state.streams.delete(receiver.streamId);
  if (receiver.error) {
    return;
  }
  receiver.error = error;
  for (const waiter of receiver.waiters.splice(0)) {
    waiter.reject(error);
  }
}
