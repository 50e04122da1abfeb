/**
 * MessagePack codec with custom extension types for the engine protocol.
 */

import { encode, decode, ExtensionCodec } from "@msgpack/msgpack";

// ============================================================================
// Custom Extension Types
// ============================================================================

/**
 * Extension type codes for custom data types.
 */
export const ExtType = {
  /** Structured error object */
  ERROR: 4,
} as const;

export type ExtType = (typeof ExtType)[keyof typeof ExtType];

/**
 * Represents a structured error raised on the engine side.
 */
export interface ErrorRef {
  __type: "ErrorRef";
  name: string;
  message: string;
  stack?: string;
  code?: number;
}

export function isErrorRef(value: unknown): value is ErrorRef {
  return (
    typeof value === "object" &&
    value !== null &&
    "__type" in value &&
    value.__type === "ErrorRef"
  );
}

// ============================================================================
// Extension Codec Setup
// ============================================================================

function createExtensionCodec(): ExtensionCodec {
  const extensionCodec = new ExtensionCodec();

  extensionCodec.register({
    type: ExtType.ERROR,
    encode: (value: unknown): Uint8Array | null => {
      if (isErrorRef(value)) {
        return encode({
          name: value.name,
          message: value.message,
          stack: value.stack,
          code: value.code,
        });
      }
      return null;
    },
    decode: (data: Uint8Array): ErrorRef => {
      const decoded = decode(data) as {
        name: string;
        message: string;
        stack?: string | null;
        code?: number | null;
      };
      const ref: ErrorRef = {
        __type: "ErrorRef",
        name: decoded.name,
        message: decoded.message,
      };
      // msgpack turns undefined fields into nil
      if (decoded.stack != null) ref.stack = decoded.stack;
      if (decoded.code != null) ref.code = decoded.code;
      return ref;
    },
  });

  return extensionCodec;
}

// Singleton extension codec instance
const extensionCodec = createExtensionCodec();

// ============================================================================
// Encoding/Decoding Functions
// ============================================================================

/**
 * Encode any value to MessagePack bytes.
 */
export function encodeValue(value: unknown): Uint8Array {
  return encode(value, { extensionCodec, ignoreUndefined: true });
}

/**
 * Decode MessagePack bytes to any value.
 */
export function decodeValue(data: Uint8Array): unknown {
  return decode(data, { extensionCodec });
}

// ============================================================================
// Helper Functions for Creating Extension Types
// ============================================================================

export function createErrorRef(
  name: string,
  message: string,
  stack?: string,
  code?: number
): ErrorRef {
  const ref: ErrorRef = { __type: "ErrorRef", name, message };
  if (stack !== undefined) ref.stack = stack;
  if (code !== undefined) ref.code = code;
  return ref;
}
