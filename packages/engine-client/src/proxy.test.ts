import { describe, it } from "node:test";
import assert from "node:assert";
import { createProxyCache, isRemoteObject, ObjectList, RemoteObject, type ObjectHost } from "./proxy.ts";
import type { ResultValue } from "./types.ts";

function createHost(answers: Record<string, ResultValue> = {}) {
  const evaluated: string[] = [];
  const executed: string[] = [];
  const host: ObjectHost = {
    remoteObjectExpression: (objectId) => `ensight.objs.wrap_id(${objectId})`,
    cmd: async (command) => {
      evaluated.push(command);
      return answers[command] ?? null;
    },
    run: async (command) => {
      executed.push(command);
    },
  };
  return { host, evaluated, executed };
}

describe("RemoteObject", () => {
  it("reads attributes with a round-trip each time", async () => {
    const { host, evaluated } = createHost({
      "ensight.objs.wrap_id(1078).getattr('DESCRIPTION')": "Sphere",
    });
    const part = new RemoteObject(host, { objectId: 1078, className: "ENS_PART_MODEL" });

    assert.strictEqual(await part.getAttr("DESCRIPTION"), "Sphere");
    assert.strictEqual(await part.getAttr("DESCRIPTION"), "Sphere");
    assert.strictEqual(evaluated.length, 2);
  });

  it("writes attributes as statements", async () => {
    const { host, executed } = createHost();
    const part = new RemoteObject(host, { objectId: 1078, className: "ENS_PART_MODEL" });

    await part.setAttr("VISIBLE", false);
    await part.setAttr(1020, [0.5, 1]);

    assert.deepStrictEqual(executed, [
      "ensight.objs.wrap_id(1078).setattr('VISIBLE', False)",
      "ensight.objs.wrap_id(1078).setattr(1020, [0.5, 1])",
    ]);
  });

  it("spells itself as its engine expression", () => {
    const { host } = createHost();
    const part = new RemoteObject(host, { objectId: 3, className: "ENS_PART" });

    assert.strictEqual(part.expression, "ensight.objs.wrap_id(3)");
    assert.strictEqual(part.toLiteral(), "ensight.objs.wrap_id(3)");
    assert.strictEqual(part.toString(), "ENS_PART(3)");
    assert.ok(isRemoteObject(part));
    assert.ok(!isRemoteObject({ objectId: 3 }));
  });

  it("can be passed as an attribute value", async () => {
    const { host, executed } = createHost();
    const viewport = new RemoteObject(host, { objectId: 4, className: "ENS_VPORT" });
    const part = new RemoteObject(host, { objectId: 3, className: "ENS_PART" });

    await viewport.setAttr("PARTS", [part]);

    assert.deepStrictEqual(executed, [
      "ensight.objs.wrap_id(4).setattr('PARTS', [ensight.objs.wrap_id(3)])",
    ]);
  });
});

describe("ObjectList", () => {
  it("reads an attribute from every object", async () => {
    const { host } = createHost({
      "ensight.objs.wrap_id(1).getattr('VISIBLE')": true,
      "ensight.objs.wrap_id(2).getattr('VISIBLE')": false,
    });
    const a = new RemoteObject(host, { objectId: 1, className: "ENS_PART" });
    const b = new RemoteObject(host, { objectId: 2, className: "ENS_PART" });
    const list = ObjectList.fromItems([a, "not an object", b]);

    assert.deepStrictEqual(list.objects(), [a, b]);
    assert.deepStrictEqual(await list.getAttr("VISIBLE"), [true, false]);
    assert.deepStrictEqual(await list.findByAttr("VISIBLE", true), [a]);
  });
});

describe("ProxyCache", () => {
  it("flushes only when the size exceeds the limit", () => {
    const { host } = createHost();
    const cache = createProxyCache(2);

    cache.set(new RemoteObject(host, { objectId: 1, className: "A" }));
    cache.set(new RemoteObject(host, { objectId: 2, className: "A" }));
    assert.strictEqual(cache.prune(), false);
    assert.strictEqual(cache.size, 2);

    cache.set(new RemoteObject(host, { objectId: 3, className: "A" }));
    assert.strictEqual(cache.prune(), true);
    assert.strictEqual(cache.size, 0);
    assert.strictEqual(cache.get(1), undefined);
  });
});
