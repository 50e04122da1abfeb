/**
 * Turns evaluated command results into values holding live object handles.
 */

import {
  parseLiteral,
  parseLiteralText,
  scanObjectReferences,
  type LiteralPiece,
  type ObjectReference,
} from "./repr.ts";
import { ObjectList, RemoteObject, type ObjectHost, type ProxyCache } from "./proxy.ts";
import { resolveSubtype, type SubtypeTable } from "./subtypes.ts";
import type { ResultValue } from "./types.ts";

export interface ResultMarshallerOptions {
  cache: ProxyCache;
  subtypes: SubtypeTable;
  host: ObjectHost;
  /** Secondary round-trip: evaluate a command and return its raw text */
  evaluate(command: string): Promise<string>;
  /** Numeric id of a discriminator attribute, or an expression naming it */
  attributeId(name: string): number | string;
}

export interface ResultMarshaller {
  /** Rewrite every object description in `text` and rebuild the value. */
  marshal(text: string): Promise<ResultValue>;
  /** The single handle for a reference, resolving it on first sight. */
  resolve(ref: ObjectReference): Promise<RemoteObject>;
}

export function createResultMarshaller(options: ResultMarshallerOptions): ResultMarshaller {
  const { cache, subtypes, host } = options;
  // Resolutions waiting on their discriminator round-trip
  const inFlight = new Map<number, Promise<RemoteObject>>();

  async function discriminate(ref: ObjectReference): Promise<RemoteObject> {
    const entry = subtypes.get(ref.className);
    if (!entry) {
      return new RemoteObject(host, ref);
    }

    const attrId = options.attributeId(entry.attribute);
    const text = await options.evaluate(
      `${host.remoteObjectExpression(ref.objectId)}.getattr(${attrId})`
    );
    const parsed = parseLiteralText(text);
    const attrValue = parsed.ok ? parsed.value : undefined;
    const className = resolveSubtype(subtypes, ref.className, attrValue);

    if (className === ref.className || typeof attrValue !== "number") {
      return new RemoteObject(host, ref);
    }
    return new RemoteObject(host, {
      objectId: ref.objectId,
      className,
      attrId,
      attrValue,
    });
  }

  function resolve(ref: ObjectReference): Promise<RemoteObject> {
    const cached = cache.get(ref.objectId);
    if (cached) {
      return Promise.resolve(cached);
    }
    const pending = inFlight.get(ref.objectId);
    if (pending) {
      return pending;
    }

    const resolution = discriminate(ref)
      .then((handle) => {
        cache.set(handle);
        return handle;
      })
      .finally(() => {
        inFlight.delete(ref.objectId);
      });
    inFlight.set(ref.objectId, resolution);
    return resolution;
  }

  async function marshal(text: string): Promise<ResultValue> {
    cache.prune();

    const pieces: LiteralPiece<RemoteObject>[] = [];
    for (const token of scanObjectReferences(text)) {
      if (token.kind === "text") {
        pieces.push(token);
      } else {
        pieces.push({ kind: "atom", value: await resolve(token) });
      }
    }

    const parsed = parseLiteral(pieces);
    if (!parsed.ok) {
      return text.trim();
    }
    if (parsed.topLevelList && Array.isArray(parsed.value)) {
      return ObjectList.fromItems(parsed.value);
    }
    return parsed.value;
  }

  return { marshal, resolve };
}
