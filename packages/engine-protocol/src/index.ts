/**
 * @objwire/protocol
 *
 * Protocol definitions, codec, and framing shared by the engine client
 * and anything that serves it.
 */

// Types and constants
export * from "./types.ts";

// Codec
export {
  encodeValue,
  decodeValue,
  createErrorRef,
  isErrorRef,
  ExtType,
  type ErrorRef,
} from "./codec.ts";

// Framing
export {
  buildFrame,
  createFrameParser,
  parseFrame,
  getMessageTypeName,
  HEADER_SIZE,
  MAX_FRAME_SIZE,
  type ParsedFrame,
  type FrameParser,
} from "./framing.ts";
