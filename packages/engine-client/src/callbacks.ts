/**
 * Callback registrations keyed by short tag, and notification routing.
 */

import { PreconditionError } from "./errors.ts";
import type { CallbackRegistration } from "./types.ts";

/** Query block appended by the engine to every notification */
const ENGINE_QUERY = "?enum=";

/**
 * The tag up to its first query separator. Macros may only appear in the
 * query block, so this is the part that identifies the registration.
 */
export function shortTag(tag: string): string {
  const idx = tag.indexOf("?");
  return idx === -1 ? tag : tag.slice(0, idx);
}

/**
 * Merge the engine's query block into a caller query that precedes it:
 * `…/vport?w=1?enum=X` becomes `…/vport?w=1&enum=X`.
 */
export function normalizeNotification(url: string): string {
  const firstQuery = url.indexOf("?");
  const engineQuery = url.indexOf(ENGINE_QUERY);
  if (firstQuery < engineQuery) {
    return url.replaceAll(ENGINE_QUERY, "&enum=");
  }
  return url;
}

/**
 * The tag a notification was fired for: its raw path without the leading
 * slash, cut at the query or fragment. Returns undefined for text that is
 * not a URL.
 */
export function notificationTag(url: string): string | undefined {
  const schemeEnd = url.indexOf("://");
  if (schemeEnd <= 0) {
    return undefined;
  }
  const pathStart = url.indexOf("/", schemeEnd + 3);
  if (pathStart === -1) {
    return "";
  }
  const path = url.slice(pathStart + 1);
  const end = path.search(/[?#]/);
  return end === -1 ? path : path.slice(0, end);
}

export interface CallbackRegistry {
  readonly size: number;
  has(shortTag: string): boolean;
  get(shortTag: string): CallbackRegistration | undefined;
  /** @throws PreconditionError when the short tag is taken */
  add(registration: CallbackRegistration): void;
  /** @throws PreconditionError when the tag is unknown */
  remove(tag: string): CallbackRegistration;
  /** First registration whose short tag prefixes `tag` */
  match(tag: string): CallbackRegistration | undefined;
  entries(): CallbackRegistration[];
}

export function createCallbackRegistry(): CallbackRegistry {
  const registrations = new Map<string, CallbackRegistration>();

  return {
    get size() {
      return registrations.size;
    },
    has: (tag) => registrations.has(tag),
    get: (tag) => registrations.get(tag),
    add: (registration) => {
      if (registrations.has(registration.shortTag)) {
        throw new PreconditionError(
          `A callback for tag '${registration.shortTag}' already exists`
        );
      }
      registrations.set(registration.shortTag, registration);
    },
    remove: (tag) => {
      const registration = registrations.get(tag);
      if (!registration) {
        throw new PreconditionError(`A callback for tag '${tag}' does not exist`);
      }
      registrations.delete(tag);
      return registration;
    },
    match: (tag) => {
      for (const registration of registrations.values()) {
        if (tag.startsWith(registration.shortTag)) {
          return registration;
        }
      }
      return undefined;
    },
    entries: () => [...registrations.values()],
  };
}

/**
 * Route one notification to its registration.
 *
 * @returns true when a callback was invoked
 */
export function dispatchNotification(registry: CallbackRegistry, raw: string): boolean {
  const url = normalizeNotification(raw);
  const tag = notificationTag(url);
  const registration = tag === undefined ? undefined : registry.match(tag);
  if (!registration) {
    console.warn(`Unhandled event: ${raw}`);
    return false;
  }
  try {
    registration.callback(url);
  } catch (err) {
    console.error(`Callback for tag '${registration.shortTag}' failed:`, err);
  }
  return true;
}
