/**
 * Channel tests against the in-process mock engine.
 */

import { describe, it, before, after, afterEach } from "node:test";
import assert from "node:assert";
import { ErrorCode, ExecMode, MessageType } from "@objwire/protocol";
import { startMockEngine, tempSocketPath, waitFor, type MockEngine } from "@objwire/test-utils";
import { createChannel, type Channel } from "./channel.ts";
import { TransportError } from "./errors.ts";

describe("channel", () => {
  let engine: MockEngine;
  let channel: Channel;

  before(async () => {
    engine = await startMockEngine({
      socketPath: tempSocketPath("channel"),
      replies: { "1+1": "2" },
      onExecute: (request) =>
        request.command === "never answered"
          ? new Promise<undefined>(() => {})
          : undefined,
    });
  });

  after(async () => {
    await engine.close();
  });

  afterEach(async () => {
    await channel.shutdown();
    engine.clearRequests();
  });

  it("connects and answers unary calls", async () => {
    channel = createChannel({ socket: engine.socketPath });
    assert.strictEqual(channel.isConnected(), false);

    await channel.connect(1000);
    assert.strictEqual(channel.isConnected(), true);

    const data = await channel.call({
      type: MessageType.EXECUTE,
      command: "1+1",
      mode: ExecMode.RETURN_TEXT,
    });
    assert.deepStrictEqual(data, { error: 0, value: "2" });
  });

  it("sends no metadata without a token", async () => {
    channel = createChannel({ socket: engine.socketPath });
    await channel.connect(1000);

    await channel.call({ type: MessageType.EXECUTE, command: "1+1", mode: ExecMode.NO_RESULT });

    assert.deepStrictEqual(channel.metadata(), []);
    const request = engine.getRequests()[0];
    assert.strictEqual(request?.name, "EXECUTE");
    assert.strictEqual(request.message.metadata, undefined);
  });

  it("attaches the shared secret to every call", async () => {
    channel = createChannel({ socket: engine.socketPath, securityToken: "test-secret" });
    await channel.connect(1000);

    await channel.call({ type: MessageType.EXECUTE, command: "1+1", mode: ExecMode.NO_RESULT });
    await channel.call({ type: MessageType.GEOMETRY, format: 0 });

    assert.deepStrictEqual(
      engine.getRequests().map((request) => request.metadata),
      [
        [["shared_secret", "test-secret"]],
        [["shared_secret", "test-secret"]],
      ]
    );
  });

  it("stops the engine and releases the socket on shutdown", async () => {
    channel = createChannel({ socket: engine.socketPath });
    await channel.connect(1000);

    await channel.shutdown(true);
    await channel.shutdown(true);

    assert.strictEqual(channel.isConnected(), false);
    assert.deepStrictEqual(
      engine.getRequests().map((request) => request.name),
      ["EXIT"]
    );
  });

  it("rejects calls made while disconnected", async () => {
    channel = createChannel({ socket: engine.socketPath });

    await assert.rejects(
      channel.call({ type: MessageType.EXECUTE, command: "1+1", mode: ExecMode.RETURN_TEXT }),
      (err: unknown) => err instanceof TransportError && err.message === "Not connected"
    );
  });

  it("notices a connection dropped by the engine and reconnects", async () => {
    channel = createChannel({ socket: engine.socketPath });
    await channel.connect(1000);

    engine.dropConnections();
    await waitFor(() => !channel.isConnected());

    await channel.connect(1000);
    assert.strictEqual(channel.isConnected(), true);
  });

  it("fails a pending call when the connection drops", async () => {
    channel = createChannel({ socket: engine.socketPath });
    await channel.connect(1000);

    const pending = channel.call({
      type: MessageType.EXECUTE,
      command: "never answered",
      mode: ExecMode.RETURN_TEXT,
    });
    await waitFor(() => engine.getCommands().includes("never answered"));
    engine.dropConnections();

    await assert.rejects(
      pending,
      (err: unknown) =>
        err instanceof TransportError &&
        err.message === "Connection closed" &&
        err.code === ErrorCode.CONNECTION_LOST
    );
  });
});

describe("channel connect failures", () => {
  it("stays disconnected when nothing listens", async () => {
    const channel = createChannel({ socket: tempSocketPath("nobody") });

    await channel.connect(200);

    assert.strictEqual(channel.isConnected(), false);
  });

  it("stays disconnected when the engine never becomes ready", async () => {
    const engine = await startMockEngine({ socketPath: tempSocketPath("unready"), ready: false });
    const channel = createChannel({ socket: engine.socketPath });
    try {
      await channel.connect(100);
      assert.strictEqual(channel.isConnected(), false);

      engine.setReady(true);
      await channel.connect(1000);
      assert.strictEqual(channel.isConnected(), true);
    } finally {
      await channel.shutdown();
      await engine.close();
    }
  });

  it("reports a rejected secret as a transport error", async () => {
    const engine = await startMockEngine({
      socketPath: tempSocketPath("auth"),
      securityToken: "test-secret",
      replies: { "1+1": "2" },
    });
    const channel = createChannel({ socket: engine.socketPath, securityToken: "wrong-secret" });
    try {
      await channel.connect(1000);
      await assert.rejects(
        channel.call({ type: MessageType.EXECUTE, command: "1+1", mode: ExecMode.RETURN_TEXT }),
        (err: unknown) =>
          err instanceof TransportError &&
          err.code === ErrorCode.UNAUTHENTICATED &&
          err.message === "Invalid shared secret"
      );
    } finally {
      await channel.shutdown();
      await engine.close();
    }
  });
});

describe("channel streams", () => {
  let engine: MockEngine;
  let channel: Channel;

  before(async () => {
    engine = await startMockEngine({ socketPath: tempSocketPath("streams") });
    channel = createChannel({ socket: engine.socketPath });
    await channel.connect(1000);
  });

  after(async () => {
    await channel.shutdown();
    await engine.close();
  });

  it("delivers pushed events in order", async () => {
    const stream = await channel.openStream("objwire://s1/");

    assert.strictEqual(engine.emit("partlist"), 1);
    assert.strictEqual(engine.emit("variables"), 1);

    assert.strictEqual(await stream.read(), "objwire://s1/partlist");
    assert.strictEqual(await stream.read(), "objwire://s1/variables");
    stream.cancel();
  });

  it("fails reads once the engine ends the stream", async () => {
    const stream = await channel.openStream("objwire://s2/");

    engine.endStreams("engine stopping");

    await assert.rejects(
      stream.read(),
      (err: unknown) =>
        err instanceof TransportError &&
        err.message === "engine stopping" &&
        err.code === ErrorCode.STREAM_CLOSED
    );
    assert.strictEqual(stream.isEnded(), true);
  });

  it("cancels a stream on both sides", async () => {
    const stream = await channel.openStream("objwire://s3/");
    assert.strictEqual(engine.streamCount(), 1);

    const read = stream.read();
    stream.cancel();

    await assert.rejects(
      read,
      (err: unknown) => err instanceof TransportError && err.message === "Event stream cancelled"
    );
    await waitFor(() => engine.streamCount() === 0);
  });
});
