/**
 * Session option defaults and environment overrides.
 */

import { PreconditionError } from "./errors.ts";
import type { SessionOptions, ResolvedSessionOptions } from "./types.ts";

export const DEFAULT_SESSION_OPTIONS: ResolvedSessionOptions = {
  host: "127.0.0.1",
  port: 12345,
  socket: undefined,
  securityToken: "",
  connectTimeout: 15_000,
  establishTimeout: 120_000,
  retryInterval: 250,
  cacheLimit: 1_000_000,
  apiModule: "ensight",
};

/** Environment variables read when an option is not given explicitly. */
export const ENV = {
  HOST: "OBJWIRE_HOST",
  PORT: "OBJWIRE_PORT",
  SOCKET: "OBJWIRE_SOCKET",
  SECURITY_TOKEN: "OBJWIRE_SECURITY_TOKEN",
} as const;

type Env = Record<string, string | undefined>;

function parseNonNegativeInt(name: string, raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new PreconditionError(`Invalid value for ${name}: ${String(raw)}`);
  }
  return value;
}

/**
 * Merge caller options over the environment and the defaults.
 * Explicit options always win over the environment.
 */
export function resolveSessionOptions(
  options: SessionOptions = {},
  env: Env = process.env
): ResolvedSessionOptions {
  const envPort = env[ENV.PORT];

  const resolved: ResolvedSessionOptions = {
    ...DEFAULT_SESSION_OPTIONS,
    host: options.host ?? env[ENV.HOST] ?? DEFAULT_SESSION_OPTIONS.host,
    port:
      options.port ??
      (envPort ? parseNonNegativeInt(ENV.PORT, envPort) : DEFAULT_SESSION_OPTIONS.port),
    socket: options.socket ?? (env[ENV.SOCKET] || undefined),
    securityToken:
      options.securityToken ?? env[ENV.SECURITY_TOKEN] ?? DEFAULT_SESSION_OPTIONS.securityToken,
    apiModule: options.apiModule ?? DEFAULT_SESSION_OPTIONS.apiModule,
  };

  for (const key of [
    "port",
    "connectTimeout",
    "establishTimeout",
    "retryInterval",
    "cacheLimit",
  ] as const) {
    const value = options[key];
    resolved[key] = parseNonNegativeInt(key, value ?? resolved[key]);
  }

  if (resolved.apiModule.trim() === "") {
    throw new PreconditionError("apiModule must not be empty");
  }

  return resolved;
}
