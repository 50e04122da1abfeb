import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_SESSION_OPTIONS, ENV, resolveSessionOptions } from "./config.ts";
import { PreconditionError } from "./errors.ts";

describe("resolveSessionOptions", () => {
  it("uses the defaults with an empty environment", () => {
    assert.deepStrictEqual(resolveSessionOptions({}, {}), DEFAULT_SESSION_OPTIONS);
  });

  it("reads the environment", () => {
    const resolved = resolveSessionOptions(
      {},
      {
        [ENV.HOST]: "10.0.0.5",
        [ENV.PORT]: "50051",
        [ENV.SOCKET]: "/tmp/engine.sock",
        [ENV.SECURITY_TOKEN]: "test-secret",
      }
    );

    assert.strictEqual(resolved.host, "10.0.0.5");
    assert.strictEqual(resolved.port, 50051);
    assert.strictEqual(resolved.socket, "/tmp/engine.sock");
    assert.strictEqual(resolved.securityToken, "test-secret");
  });

  it("prefers explicit options over the environment", () => {
    const resolved = resolveSessionOptions(
      { host: "engine.local", port: 7000, securityToken: "" },
      { [ENV.HOST]: "10.0.0.5", [ENV.PORT]: "50051", [ENV.SECURITY_TOKEN]: "test-secret" }
    );

    assert.strictEqual(resolved.host, "engine.local");
    assert.strictEqual(resolved.port, 7000);
    assert.strictEqual(resolved.securityToken, "");
  });

  it("treats an empty socket variable as unset", () => {
    assert.strictEqual(resolveSessionOptions({}, { [ENV.SOCKET]: "" }).socket, undefined);
  });

  it("rejects invalid numbers", () => {
    assert.throws(
      () => resolveSessionOptions({}, { [ENV.PORT]: "eighty" }),
      (err: unknown) =>
        err instanceof PreconditionError && err.message === "Invalid value for OBJWIRE_PORT: eighty"
    );
    assert.throws(
      () => resolveSessionOptions({ retryInterval: -5 }, {}),
      (err: unknown) =>
        err instanceof PreconditionError && err.message === "Invalid value for retryInterval: -5"
    );
  });

  it("rejects an empty api module", () => {
    assert.throws(() => resolveSessionOptions({ apiModule: " " }, {}), PreconditionError);
  });
});
