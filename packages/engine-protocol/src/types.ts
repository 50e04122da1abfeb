/**
 * Message types for the engine wire protocol.
 *
 * Frame format:
 * ┌──────────┬──────────┬─────────────────┐
 * │ Length   │ Type     │ Payload         │
 * │ (4 bytes)│ (1 byte) │ (MessagePack)   │
 * └──────────┴──────────┴─────────────────┘
 */

import type { ErrorRef } from "./codec.ts";

// ============================================================================
// Message Type Constants
// ============================================================================

export const MessageType = {
  // Client → Engine: unary calls
  EXECUTE: 0x01,
  RENDER: 0x02,
  GEOMETRY: 0x03,
  EXIT: 0x04,

  // Client → Engine: event stream
  EVENT_STREAM_OPEN: 0x10,
  EVENT_STREAM_CANCEL: 0x11,

  // Engine → Client: Responses
  RESPONSE_OK: 0x80,
  RESPONSE_ERROR: 0x81,

  // Engine → Client: Stream data
  EVENT_PUSH: 0x90,
  EVENT_STREAM_END: 0x91,

  // Heartbeat
  PING: 0xf0,
  PONG: 0xf1,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/** Reverse lookup for message type names */
export const MessageTypeName: Record<number, string> = Object.fromEntries(
  Object.entries(MessageType).map(([k, v]) => [v, k])
);

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  // Protocol errors
  INVALID_MESSAGE: 1001,
  UNKNOWN_MESSAGE_TYPE: 1002,
  MISSING_REQUIRED_FIELD: 1003,
  UNAUTHENTICATED: 1004,

  // Engine errors
  ENGINE_FAILURE: 3001,

  // Stream errors
  STREAM_NOT_FOUND: 4001,
  STREAM_CLOSED: 4002,

  // Connection errors
  CONNECTION_LOST: 5001,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// Request Enums
// ============================================================================

/** How the engine should treat a command string. */
export const ExecMode = {
  /** Run as a statement, no value returned */
  NO_RESULT: 0,
  /** Evaluate and return the textual representation of the value */
  RETURN_TEXT: 1,
  /** Evaluate and return the value encoded as JSON */
  RETURN_JSON: 2,
} as const;

export type ExecMode = (typeof ExecMode)[keyof typeof ExecMode];

export const ImageFormat = {
  /** width * height * 3 bytes of RGB */
  RAW: 0,
  PNG: 1,
} as const;

export type ImageFormat = (typeof ImageFormat)[keyof typeof ImageFormat];

export const GeometryFormat = {
  GLB: 0,
} as const;

export type GeometryFormat = (typeof GeometryFormat)[keyof typeof GeometryFormat];

/** Metadata key under which the shared secret travels. */
export const SHARED_SECRET_KEY = "shared_secret";

// ============================================================================
// Base Message Interface
// ============================================================================

export interface BaseMessage {
  /** Unique request ID for correlation */
  requestId: number;
}

export type MetadataEntry = [key: string, value: string];

/**
 * Every request sent by a client may carry metadata (authentication).
 */
export interface ClientRequest extends BaseMessage {
  metadata?: MetadataEntry[];
}

// ============================================================================
// Client → Engine Messages
// ============================================================================

export interface ExecuteRequest extends ClientRequest {
  type: typeof MessageType.EXECUTE;
  command: string;
  mode: ExecMode;
}

export interface RenderRequest extends ClientRequest {
  type: typeof MessageType.RENDER;
  format: ImageFormat;
  width: number;
  height: number;
  aaPasses: number;
  highlighting: boolean;
}

export interface GeometryRequest extends ClientRequest {
  type: typeof MessageType.GEOMETRY;
  format: GeometryFormat;
}

export interface ExitRequest extends ClientRequest {
  type: typeof MessageType.EXIT;
}

export interface EventStreamOpenRequest extends ClientRequest {
  type: typeof MessageType.EVENT_STREAM_OPEN;
  /** Session-unique namespace that prefixes every notification */
  prefix: string;
}

/** Cancels the stream opened by the request with the same `requestId`. */
export interface EventStreamCancel extends ClientRequest {
  type: typeof MessageType.EVENT_STREAM_CANCEL;
}

export interface PingMessage extends BaseMessage {
  type: typeof MessageType.PING;
}

// ============================================================================
// Engine → Client Messages
// ============================================================================

export interface ResponseOk extends BaseMessage {
  type: typeof MessageType.RESPONSE_OK;
  data?: unknown;
}

export interface ResponseError extends BaseMessage {
  type: typeof MessageType.RESPONSE_ERROR;
  code: ErrorCode;
  message: string;
  details?: ErrorRef;
}

export interface EventPush extends BaseMessage {
  type: typeof MessageType.EVENT_PUSH;
  event: string;
}

export interface EventStreamEnd extends BaseMessage {
  type: typeof MessageType.EVENT_STREAM_END;
  reason?: string;
}

export interface PongMessage extends BaseMessage {
  type: typeof MessageType.PONG;
}

// ============================================================================
// Response payloads (the `data` of RESPONSE_OK)
// ============================================================================

export interface ExecuteReply {
  /** Negative values signal a failure inside the engine */
  error: number;
  value: string;
}

export interface BinaryReply {
  value: Uint8Array;
}

// ============================================================================
// Union Types
// ============================================================================

export type Request =
  | ExecuteRequest
  | RenderRequest
  | GeometryRequest
  | ExitRequest
  | EventStreamOpenRequest;

export type Message =
  | Request
  | EventStreamCancel
  | PingMessage
  | ResponseOk
  | ResponseError
  | EventPush
  | EventStreamEnd
  | PongMessage;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** A request as the caller builds it, before the channel stamps it. */
export type OutgoingRequest = DistributiveOmit<Request, "requestId" | "metadata">;
