/**
 * Frame parser and builder for the engine protocol.
 *
 * Frame format:
 * ┌──────────┬──────────┬─────────────────┐
 * │ Length   │ Type     │ Payload         │
 * │ (4 bytes)│ (1 byte) │ (MessagePack)   │
 * └──────────┴──────────┴─────────────────┘
 *
 * - Length: uint32 BE, size of Type + Payload (excludes the length field itself)
 * - Type: uint8, message type from MessageType enum
 * - Payload: MessagePack encoded message body
 */

import { MessageTypeName, type Message, type MessageType } from "./types.ts";
import { encodeValue, decodeValue } from "./codec.ts";

/** Header size: 4 bytes for length + 1 byte for type */
export const HEADER_SIZE = 5;

/**
 * Maximum frame size (256MB). Render and geometry replies carry whole
 * images and scenes, so the ceiling is far above any command payload.
 */
export const MAX_FRAME_SIZE = 256 * 1024 * 1024;

// ============================================================================
// Frame Building
// ============================================================================

/**
 * Build a frame from a message.
 *
 * @param message - The message to encode
 * @returns Complete frame as Uint8Array
 */
export function buildFrame(message: Message): Uint8Array {
  // The type lives in the header, not in the payload
  const { type, ...body } = message;
  const payload = encodeValue(body);

  const frameBodySize = 1 + payload.length;
  if (frameBodySize > MAX_FRAME_SIZE) {
    throw new Error(
      `Frame size ${frameBodySize} exceeds maximum ${MAX_FRAME_SIZE}`
    );
  }

  const frame = new Uint8Array(4 + frameBodySize);
  const view = new DataView(frame.buffer);

  view.setUint32(0, frameBodySize, false);
  frame[4] = type;
  frame.set(payload, HEADER_SIZE);

  return frame;
}

// ============================================================================
// Frame Parsing
// ============================================================================

/**
 * Parse result from the frame parser.
 */
export interface ParsedFrame {
  type: MessageType;
  message: Message;
}

/**
 * Incremental frame parser for streaming data.
 *
 * Usage:
 * ```ts
 * const parser = createFrameParser();
 * socket.on('data', (chunk) => {
 *   for (const frame of parser.feed(chunk)) {
 *     handleMessage(frame.message);
 *   }
 * });
 * ```
 */
export interface FrameParser {
  /**
   * Feed data to the parser and yield complete frames.
   * @param chunk - Incoming data chunk
   */
  feed(chunk: Uint8Array): Generator<ParsedFrame>;

  /**
   * Get the number of bytes currently buffered.
   */
  bufferedBytes(): number;
}

function decodeFrameBody(messageType: number, payload: Uint8Array): ParsedFrame {
  const body = decodeValue(payload);
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new Error(
      `Invalid payload for ${getMessageTypeName(messageType)}: expected a map`
    );
  }
  const message = { ...body, type: messageType } as Message;
  return { type: message.type, message };
}

/**
 * Create a new frame parser.
 */
export function createFrameParser(): FrameParser {
  let buffer: Uint8Array = new Uint8Array(0);

  function* feed(chunk: Uint8Array): Generator<ParsedFrame> {
    const newBuffer = new Uint8Array(buffer.length + chunk.length);
    newBuffer.set(buffer);
    newBuffer.set(chunk, buffer.length);
    buffer = newBuffer;

    while (buffer.length >= 4) {
      const view = new DataView(
        buffer.buffer,
        buffer.byteOffset,
        buffer.byteLength
      );
      const frameBodySize = view.getUint32(0, false);

      if (frameBodySize > MAX_FRAME_SIZE) {
        throw new Error(
          `Frame size ${frameBodySize} exceeds maximum ${MAX_FRAME_SIZE}`
        );
      }

      const totalFrameSize = 4 + frameBodySize;
      if (buffer.length < totalFrameSize) {
        break; // Wait for more data
      }

      const messageType = buffer[4] ?? 0;
      const payload = buffer.slice(HEADER_SIZE, totalFrameSize);

      // Drop the frame before yielding so a consumer that stops early
      // does not see it twice
      buffer = buffer.slice(totalFrameSize);

      yield decodeFrameBody(messageType, payload);
    }
  }

  function bufferedBytes(): number {
    return buffer.length;
  }

  return { feed, bufferedBytes };
}

// ============================================================================
// Single Frame Parsing (for testing/debugging)
// ============================================================================

/**
 * Parse a single complete frame.
 *
 * @param data - Complete frame data
 * @returns Parsed frame or null if incomplete
 * @throws Error if frame is invalid
 */
export function parseFrame(data: Uint8Array): ParsedFrame | null {
  if (data.length < 4) {
    return null;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const frameBodySize = view.getUint32(0, false);

  if (frameBodySize > MAX_FRAME_SIZE) {
    throw new Error(
      `Frame size ${frameBodySize} exceeds maximum ${MAX_FRAME_SIZE}`
    );
  }

  const totalFrameSize = 4 + frameBodySize;
  if (data.length < totalFrameSize) {
    return null;
  }

  return decodeFrameBody(data[4] ?? 0, data.slice(HEADER_SIZE, totalFrameSize));
}

/**
 * Get the message type name for debugging.
 */
export function getMessageTypeName(type: number): string {
  return MessageTypeName[type] ?? `Unknown(${type})`;
}
