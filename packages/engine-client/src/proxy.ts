/**
 * Local handles for objects that live in the engine.
 */

import { formatLiteral, type LiteralInput } from "./repr.ts";
import type { ResultValue } from "./types.ts";

/**
 * What a handle needs from its session to talk to the engine.
 */
export interface ObjectHost {
  /** Expression that yields the engine object with this identity */
  remoteObjectExpression(objectId: number): string;
  /** Evaluate and marshal a command */
  cmd(command: string): Promise<ResultValue>;
  /** Run a command for its side effects */
  run(command: string): Promise<void>;
}

export interface RemoteObjectInit {
  objectId: number;
  className: string;
  /** Discriminator attribute used to pick the subclass */
  attrId?: number | string;
  attrValue?: number;
}

/**
 * Live handle to an engine object. Holds the identity only; every attribute
 * access is a round-trip.
 */
export class RemoteObject {
  readonly objectId: number;
  readonly className: string;
  readonly attrId: number | string | undefined;
  readonly attrValue: number | undefined;

  readonly #host: ObjectHost;

  constructor(host: ObjectHost, init: RemoteObjectInit) {
    this.#host = host;
    this.objectId = init.objectId;
    this.className = init.className;
    this.attrId = init.attrId;
    this.attrValue = init.attrValue;
  }

  /** Expression naming this object in a command string */
  get expression(): string {
    return this.#host.remoteObjectExpression(this.objectId);
  }

  getAttr(attr: string | number): Promise<ResultValue> {
    return this.#host.cmd(`${this.expression}.getattr(${formatLiteral(attr)})`);
  }

  setAttr(attr: string | number, value: LiteralInput): Promise<void> {
    return this.#host.run(
      `${this.expression}.setattr(${formatLiteral(attr)}, ${formatLiteral(value)})`
    );
  }

  toLiteral(): string {
    return this.expression;
  }

  toString(): string {
    return `${this.className}(${this.objectId})`;
  }
}

export function isRemoteObject(value: unknown): value is RemoteObject {
  return value instanceof RemoteObject;
}

/**
 * Ordered container returned for list results, so a list of objects stays a
 * list of live handles.
 */
export class ObjectList extends Array<ResultValue> {
  static fromItems(items: readonly ResultValue[]): ObjectList {
    const list = new ObjectList();
    list.push(...items);
    return list;
  }

  /** The elements that are engine objects */
  objects(): RemoteObject[] {
    const found: RemoteObject[] = [];
    for (const item of this) {
      if (isRemoteObject(item)) found.push(item);
    }
    return found;
  }

  /** Read one attribute from every object in the list. */
  getAttr(attr: string | number): Promise<ResultValue[]> {
    return Promise.all(this.objects().map((obj) => obj.getAttr(attr)));
  }

  /** Objects whose attribute currently equals `value`. */
  async findByAttr(attr: string | number, value: ResultValue): Promise<RemoteObject[]> {
    const objects = this.objects();
    const values = await Promise.all(objects.map((obj) => obj.getAttr(attr)));
    return objects.filter((_, i) => values[i] === value);
  }
}

export interface ProxyCache {
  readonly limit: number;
  readonly size: number;
  get(objectId: number): RemoteObject | undefined;
  set(handle: RemoteObject): void;
  /** Drop every entry when the cache has grown past its limit. */
  prune(): boolean;
  clear(): void;
}

/**
 * Session-owned map from engine identity to the single live handle for it.
 */
export function createProxyCache(limit = 1_000_000): ProxyCache {
  let entries = new Map<number, RemoteObject>();

  return {
    limit,
    get size() {
      return entries.size;
    },
    get: (objectId) => entries.get(objectId),
    set: (handle) => {
      entries.set(handle.objectId, handle);
    },
    prune: () => {
      if (entries.size <= limit) {
        return false;
      }
      entries = new Map();
      return true;
    },
    clear: () => {
      entries = new Map();
    },
  };
}
