import { describe, it, afterEach, mock } from "node:test";
import assert from "node:assert";
import {
  createCallbackRegistry,
  dispatchNotification,
  normalizeNotification,
  notificationTag,
  shortTag,
} from "./callbacks.ts";
import { PreconditionError } from "./errors.ts";
import type { CallbackRegistration, EventCallback } from "./types.ts";

function registration(tag: string, callback: EventCallback = () => {}): CallbackRegistration {
  return {
    shortTag: shortTag(tag),
    remoteId: 1,
    target: "ensight.objs.core",
    attributes: ["PARTS"],
    callback,
    compress: true,
  };
}

describe("shortTag", () => {
  it("cuts the tag at its query block", () => {
    assert.strictEqual(shortTag("vport?w={{WIDTH}}&h={{HEIGHT}}"), "vport");
    assert.strictEqual(shortTag("partlist"), "partlist");
  });
});

describe("normalizeNotification", () => {
  it("merges the engine query into a caller query", () => {
    assert.strictEqual(
      normalizeNotification("objwire://s1/vport?w=10?enum=WIDTH&uid=3"),
      "objwire://s1/vport?w=10&enum=WIDTH&uid=3"
    );
  });

  it("leaves a notification without a caller query alone", () => {
    const url = "objwire://s1/partlist?enum=PARTS&uid=221";
    assert.strictEqual(normalizeNotification(url), url);
    assert.strictEqual(normalizeNotification("objwire://s1/plain"), "objwire://s1/plain");
  });
});

describe("notificationTag", () => {
  it("returns the path without its leading slash", () => {
    assert.strictEqual(notificationTag("objwire://s1/partlist?enum=PARTS"), "partlist");
  });

  it("keeps spaces and non-ASCII text as written", () => {
    assert.strictEqual(notificationTag("objwire://s1/part list?enum=PARTS&uid=1"), "part list");
    assert.strictEqual(notificationTag("objwire://s1/température#frag"), "température");
  });

  it("returns an empty tag when the URL has no path", () => {
    assert.strictEqual(notificationTag("objwire://s1"), "");
  });

  it("returns undefined for text that is not a URL", () => {
    assert.strictEqual(notificationTag("not a url"), undefined);
  });
});

describe("callback registry", () => {
  it("rejects a second registration with the same short tag", () => {
    const registry = createCallbackRegistry();
    registry.add(registration("foo"));

    assert.throws(
      () => registry.add(registration("foo?x=1")),
      (err: unknown) =>
        err instanceof PreconditionError && err.message === "A callback for tag 'foo' already exists"
    );
    assert.strictEqual(registry.size, 1);
  });

  it("accepts distinct short tags", () => {
    const registry = createCallbackRegistry();
    registry.add(registration("foo"));
    registry.add(registration("bar"));

    assert.strictEqual(registry.size, 2);
    assert.deepStrictEqual(
      registry.entries().map((entry) => entry.shortTag),
      ["foo", "bar"]
    );
  });

  it("rejects removing an unknown tag", () => {
    const registry = createCallbackRegistry();

    assert.throws(
      () => registry.remove("baz"),
      (err: unknown) =>
        err instanceof PreconditionError && err.message === "A callback for tag 'baz' does not exist"
    );
  });

  it("matches the first registration whose short tag prefixes the fired tag", () => {
    const registry = createCallbackRegistry();
    registry.add(registration("part"));
    registry.add(registration("partlist"));

    assert.strictEqual(registry.match("partlist")?.shortTag, "part");
    assert.strictEqual(registry.match("variables"), undefined);
  });
});

describe("dispatchNotification", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("invokes the matching callback with the normalized URL", () => {
    const received: string[] = [];
    const registry = createCallbackRegistry();
    registry.add(registration("vport?w={{WIDTH}}", (url) => received.push(url)));

    const handled = dispatchNotification(registry, "objwire://s1/vport?w=10?enum=WIDTH&uid=3");

    assert.strictEqual(handled, true);
    assert.deepStrictEqual(received, ["objwire://s1/vport?w=10&enum=WIDTH&uid=3"]);
  });

  it("routes tags that are not URL-safe", () => {
    const received: string[] = [];
    const registry = createCallbackRegistry();
    registry.add(registration("part list", (url) => received.push(url)));

    const handled = dispatchNotification(registry, "objwire://abc/part list?enum=PARTS&uid=1");

    assert.strictEqual(handled, true);
    assert.deepStrictEqual(received, ["objwire://abc/part list?enum=PARTS&uid=1"]);
  });

  it("warns about notifications nobody registered for", () => {
    const warn = mock.method(console, "warn", () => {});
    const registry = createCallbackRegistry();
    registry.add(registration("partlist"));

    const handled = dispatchNotification(registry, "objwire://s1/variables?enum=VARIABLES");

    assert.strictEqual(handled, false);
    assert.strictEqual(warn.mock.callCount(), 1);
    assert.deepStrictEqual(warn.mock.calls[0]?.arguments, [
      "Unhandled event: objwire://s1/variables?enum=VARIABLES",
    ]);
  });

  it("logs a failing callback and keeps going", () => {
    const error = mock.method(console, "error", () => {});
    const registry = createCallbackRegistry();
    registry.add(
      registration("partlist", () => {
        throw new Error("boom");
      })
    );

    assert.strictEqual(dispatchNotification(registry, "objwire://s1/partlist"), true);
    assert.strictEqual(dispatchNotification(registry, "objwire://s1/partlist"), true);
    assert.strictEqual(error.mock.callCount(), 2);
    assert.strictEqual(error.mock.calls[0]?.arguments[0], "Callback for tag 'partlist' failed:");
  });
});
