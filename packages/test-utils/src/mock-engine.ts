import { createServer, type Server, type Socket } from "node:net";
import { unlink } from "node:fs/promises";
import {
  buildFrame,
  createErrorRef,
  createFrameParser,
  getMessageTypeName,
  ErrorCode,
  ImageFormat,
  MessageType,
  SHARED_SECRET_KEY,
  type EventStreamCancel,
  type ExecuteReply,
  type ExecuteRequest,
  type Message,
  type MetadataEntry,
  type RenderRequest,
  type Request,
} from "@objwire/protocol";

/**
 * Answer an EXECUTE request. Returning undefined falls through to the
 * canned replies.
 */
export type ExecuteHandler = (
  request: ExecuteRequest
) => ExecuteReply | undefined | Promise<ExecuteReply | undefined>;

export interface MockEngineOptions {
  /** Unix socket path to listen on */
  socketPath: string;
  /** When set, every request must carry this shared secret */
  securityToken?: string;
  onExecute?: ExecuteHandler;
  /** Canned `value` per command text, merged over the defaults */
  replies?: Record<string, string>;
  /** Answer the readiness PING (default: true) */
  ready?: boolean;
  /** Log listen/stop lines */
  verbose?: boolean;
}

export interface RecordedRequest {
  name: string;
  requestId: number;
  metadata: MetadataEntry[];
  message: Request | EventStreamCancel;
}

export interface MockEngine {
  readonly socketPath: string;
  /** Every request received, in arrival order */
  getRequests(): RecordedRequest[];
  /** Command text of every EXECUTE received, in arrival order */
  getCommands(): string[];
  clearRequests(): void;
  /** Number of event streams currently open */
  streamCount(): number;
  /** Push `<prefix><tag>` on every open stream; returns the number of streams */
  emit(tag: string): number;
  /** Push `event` verbatim on every open stream */
  pushEvent(event: string): number;
  /** End every open stream from the engine side */
  endStreams(reason?: string): void;
  /** Destroy every client socket without closing the server */
  dropConnections(): void;
  setReady(ready: boolean): void;
  close(): Promise<void>;
}

/** Enum table served for the default enum query */
export const MOCK_ENUMS: Readonly<Record<string, number | string>> = {
  PARTTYPE: 1075,
  ANNOTTYPE: 1500,
  TOOLTYPE: 1610,
  PARTS: 1020,
  VISIBLE: 1030,
  DESCRIPTION: 1040,
  __OBJID__: 1,
  __doc__: "Engine enums",
};

export const MOCK_VERSION = "251";

/** Deterministic bytes for image and geometry replies */
export const PNG_SIGNATURE = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
export const GLB_HEADER = new Uint8Array([0x67, 0x6c, 0x54, 0x46, 0x02, 0x00, 0x00, 0x00]);

/**
 * Canned replies for the commands a session sends on its own.
 */
export function defaultReplies(apiModule = "ensight"): Record<string, string> {
  return {
    [`${apiModule}.version('suffix')`]: `'${MOCK_VERSION}'`,
    [`{key: getattr(${apiModule}.objs.enums, key) for key in dir(${apiModule}.objs.enums)}`]:
      JSON.stringify(MOCK_ENUMS),
  };
}

interface OpenStream {
  socket: Socket;
  requestId: number;
  prefix: string;
}

function renderBytes(request: RenderRequest): Uint8Array {
  if (request.format === ImageFormat.PNG) {
    return PNG_SIGNATURE;
  }
  return new Uint8Array(request.width * request.height * 3).fill(0x7f);
}

function readSecret(metadata: MetadataEntry[]): string | undefined {
  return metadata.find(([key]) => key === SHARED_SECRET_KEY)?.[1];
}

/**
 * Start an in-process engine that speaks the wire protocol on a Unix socket.
 *
 * @example
 * const engine = await startMockEngine({
 *   socketPath: tempSocketPath("session"),
 *   replies: { "1+1": "2" },
 * });
 * const session = await createSession({ socket: engine.socketPath });
 * await session.cmd("1+1"); // 2
 * await engine.close();
 */
export async function startMockEngine(options: MockEngineOptions): Promise<MockEngine> {
  const replies: Record<string, string> = { ...defaultReplies(), ...options.replies };
  const requests: RecordedRequest[] = [];
  const connections = new Set<Socket>();
  const streams = new Map<string, OpenStream>();
  let ready = options.ready ?? true;
  let nextSocketId = 1;
  const socketIds = new WeakMap<Socket, number>();

  function streamKey(socket: Socket, requestId: number): string {
    return `${socketIds.get(socket) ?? 0}:${requestId}`;
  }

  function send(socket: Socket, message: Message): void {
    if (!socket.destroyed) {
      socket.write(buildFrame(message));
    }
  }

  function fail(socket: Socket, requestId: number, code: ErrorCode, message: string): void {
    send(socket, { type: MessageType.RESPONSE_ERROR, requestId, code, message });
  }

  async function execute(request: ExecuteRequest): Promise<ExecuteReply> {
    const handled = await options.onExecute?.(request);
    if (handled) {
      return handled;
    }
    const value = replies[request.command];
    return value === undefined ? { error: -1, value: "" } : { error: 0, value };
  }

  async function handleMessage(socket: Socket, message: Message): Promise<void> {
    if (message.type === MessageType.PING) {
      if (ready) {
        send(socket, { type: MessageType.PONG, requestId: message.requestId });
      }
      return;
    }

    if (
      message.type !== MessageType.EXECUTE &&
      message.type !== MessageType.RENDER &&
      message.type !== MessageType.GEOMETRY &&
      message.type !== MessageType.EXIT &&
      message.type !== MessageType.EVENT_STREAM_OPEN &&
      message.type !== MessageType.EVENT_STREAM_CANCEL
    ) {
      fail(
        socket,
        message.requestId,
        ErrorCode.UNKNOWN_MESSAGE_TYPE,
        `Unexpected message: ${getMessageTypeName(message.type)}`
      );
      return;
    }

    const metadata = message.metadata ?? [];
    requests.push({
      name: getMessageTypeName(message.type),
      requestId: message.requestId,
      metadata,
      message,
    });

    if (options.securityToken && readSecret(metadata) !== options.securityToken) {
      fail(socket, message.requestId, ErrorCode.UNAUTHENTICATED, "Invalid shared secret");
      return;
    }

    switch (message.type) {
      case MessageType.EXECUTE: {
        try {
          const reply = await execute(message);
          send(socket, { type: MessageType.RESPONSE_OK, requestId: message.requestId, data: reply });
        } catch (err) {
          const error = err instanceof Error ? err : new Error(String(err));
          send(socket, {
            type: MessageType.RESPONSE_ERROR,
            requestId: message.requestId,
            code: ErrorCode.ENGINE_FAILURE,
            message: error.message,
            details: createErrorRef(error.name, error.message, error.stack),
          });
        }
        break;
      }

      case MessageType.RENDER:
        send(socket, {
          type: MessageType.RESPONSE_OK,
          requestId: message.requestId,
          data: { value: renderBytes(message) },
        });
        break;

      case MessageType.GEOMETRY:
        send(socket, {
          type: MessageType.RESPONSE_OK,
          requestId: message.requestId,
          data: { value: GLB_HEADER },
        });
        break;

      case MessageType.EXIT:
        send(socket, { type: MessageType.RESPONSE_OK, requestId: message.requestId });
        socket.end();
        break;

      case MessageType.EVENT_STREAM_OPEN:
        streams.set(streamKey(socket, message.requestId), {
          socket,
          requestId: message.requestId,
          prefix: message.prefix,
        });
        send(socket, { type: MessageType.RESPONSE_OK, requestId: message.requestId });
        break;

      case MessageType.EVENT_STREAM_CANCEL:
        streams.delete(streamKey(socket, message.requestId));
        break;
    }
  }

  const server: Server = createServer((socket) => {
    connections.add(socket);
    socketIds.set(socket, nextSocketId++);
    const parser = createFrameParser();

    socket.on("data", (data) => {
      try {
        for (const frame of parser.feed(new Uint8Array(data))) {
          handleMessage(socket, frame.message).catch((err) => {
            console.error("Error handling message:", err);
          });
        }
      } catch (err) {
        console.error("Error parsing frame:", err);
        socket.destroy();
      }
    });

    socket.on("error", (err) => {
      if (options.verbose) {
        console.log("Mock engine socket error:", err.message);
      }
    });

    socket.on("close", () => {
      connections.delete(socket);
      for (const [key, stream] of streams) {
        if (stream.socket === socket) {
          streams.delete(key);
        }
      }
    });
  });

  await removeSocketFile(options.socketPath);

  await new Promise<void>((resolve, reject) => {
    server.on("error", reject);
    server.listen(options.socketPath, () => {
      server.removeListener("error", reject);
      resolve();
    });
  });

  if (options.verbose) {
    console.log(`Mock engine listening on ${options.socketPath}`);
  }

  function push(render: (stream: OpenStream) => string): number {
    let count = 0;
    for (const stream of streams.values()) {
      send(stream.socket, {
        type: MessageType.EVENT_PUSH,
        requestId: stream.requestId,
        event: render(stream),
      });
      count++;
    }
    return count;
  }

  return {
    socketPath: options.socketPath,
    getRequests: () => [...requests],
    getCommands: () =>
      requests.flatMap((request) =>
        request.message.type === MessageType.EXECUTE ? [request.message.command] : []
      ),
    clearRequests: () => {
      requests.length = 0;
    },
    streamCount: () => streams.size,
    emit: (tag) => push((stream) => `${stream.prefix}${tag}`),
    pushEvent: (event) => push(() => event),
    endStreams: (reason) => {
      for (const stream of streams.values()) {
        send(stream.socket, {
          type: MessageType.EVENT_STREAM_END,
          requestId: stream.requestId,
          ...(reason !== undefined ? { reason } : {}),
        });
      }
      streams.clear();
    },
    dropConnections: () => {
      for (const socket of connections) {
        socket.destroy();
      }
      connections.clear();
      streams.clear();
    },
    setReady: (value) => {
      ready = value;
    },
    async close() {
      for (const socket of connections) {
        socket.destroy();
      }
      connections.clear();
      streams.clear();

      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      await removeSocketFile(options.socketPath);

      if (options.verbose) {
        console.log("Mock engine stopped");
      }
    },
  };
}

async function removeSocketFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
  }
}
