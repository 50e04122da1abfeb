import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { connect, type Socket } from "node:net";
import {
  buildFrame,
  createFrameParser,
  ErrorCode,
  ExecMode,
  MessageType,
  type Message,
} from "@objwire/protocol";
import {
  startMockEngine,
  tempSocketPath,
  waitFor,
  MOCK_ENUMS,
  type MockEngine,
} from "./index.ts";

/**
 * Minimal raw client: sends frames and collects every decoded reply.
 */
async function openRawClient(path: string): Promise<{ socket: Socket; received: Message[] }> {
  const received: Message[] = [];
  const parser = createFrameParser();
  const socket = connect(path);
  socket.on("data", (data: Buffer) => {
    for (const frame of parser.feed(new Uint8Array(data))) {
      received.push(frame.message);
    }
  });
  await new Promise<void>((resolve, reject) => {
    socket.once("connect", () => resolve());
    socket.once("error", reject);
  });
  return { socket, received };
}

describe("tempSocketPath", () => {
  test("returns a distinct path per call", () => {
    const a = tempSocketPath("x");
    const b = tempSocketPath("x");
    assert.notStrictEqual(a, b);
    assert.ok(a.endsWith(".sock"));
  });
});

describe("waitFor", () => {
  test("resolves once the predicate holds", async () => {
    let calls = 0;
    await waitFor(() => ++calls === 3);
    assert.strictEqual(calls, 3);
  });

  test("rejects after the timeout", async () => {
    await assert.rejects(waitFor(() => false, 20), {
      message: "Condition not met within 20ms",
    });
  });
});

describe("startMockEngine", () => {
  let engine: MockEngine;
  let socket: Socket;
  let received: Message[];

  before(async () => {
    engine = await startMockEngine({
      socketPath: tempSocketPath("mock"),
      securityToken: "test-secret",
      replies: { "1+1": "2" },
    });
    ({ socket, received } = await openRawClient(engine.socketPath));
  });

  after(async () => {
    socket.destroy();
    await engine.close();
  });

  test("answers PING without credentials", async () => {
    socket.write(buildFrame({ type: MessageType.PING, requestId: 1 }));
    await waitFor(() => received.length === 1);

    assert.deepStrictEqual(received[0], { type: MessageType.PONG, requestId: 1 });
    assert.deepStrictEqual(engine.getRequests(), []);
  });

  test("answers canned commands for an authenticated client", async () => {
    socket.write(
      buildFrame({
        type: MessageType.EXECUTE,
        requestId: 2,
        command: "1+1",
        mode: ExecMode.RETURN_TEXT,
        metadata: [["shared_secret", "test-secret"]],
      })
    );
    await waitFor(() => received.length === 2);

    assert.deepStrictEqual(received[1], {
      type: MessageType.RESPONSE_OK,
      requestId: 2,
      data: { error: 0, value: "2" },
    });
  });

  test("serves the enum table by default", async () => {
    socket.write(
      buildFrame({
        type: MessageType.EXECUTE,
        requestId: 3,
        command: "{key: getattr(ensight.objs.enums, key) for key in dir(ensight.objs.enums)}",
        mode: ExecMode.RETURN_JSON,
        metadata: [["shared_secret", "test-secret"]],
      })
    );
    await waitFor(() => received.length === 3);

    assert.deepStrictEqual(received[2], {
      type: MessageType.RESPONSE_OK,
      requestId: 3,
      data: { error: 0, value: JSON.stringify(MOCK_ENUMS) },
    });
  });

  test("rejects a request without the secret", async () => {
    socket.write(
      buildFrame({
        type: MessageType.EXECUTE,
        requestId: 4,
        command: "1+1",
        mode: ExecMode.RETURN_TEXT,
      })
    );
    await waitFor(() => received.length === 4);

    assert.deepStrictEqual(received[3], {
      type: MessageType.RESPONSE_ERROR,
      requestId: 4,
      code: ErrorCode.UNAUTHENTICATED,
      message: "Invalid shared secret",
    });
    assert.deepStrictEqual(engine.getCommands(), [
      "1+1",
      "{key: getattr(ensight.objs.enums, key) for key in dir(ensight.objs.enums)}",
      "1+1",
    ]);
  });

  test("pushes events on open streams", async () => {
    socket.write(
      buildFrame({
        type: MessageType.EVENT_STREAM_OPEN,
        requestId: 5,
        prefix: "objwire://raw/",
        metadata: [["shared_secret", "test-secret"]],
      })
    );
    await waitFor(() => received.length === 5);
    assert.strictEqual(engine.streamCount(), 1);

    assert.strictEqual(engine.emit("parts"), 1);
    engine.endStreams();
    await waitFor(() => received.length === 7);

    assert.deepStrictEqual(received.slice(4), [
      { type: MessageType.RESPONSE_OK, requestId: 5 },
      { type: MessageType.EVENT_PUSH, requestId: 5, event: "objwire://raw/parts" },
      { type: MessageType.EVENT_STREAM_END, requestId: 5 },
    ]);
    assert.strictEqual(engine.streamCount(), 0);
  });
});
