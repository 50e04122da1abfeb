/**
 * Command execution, rendering and geometry export over a channel.
 */

import {
  ExecMode,
  GeometryFormat,
  ImageFormat,
  MessageType,
  type BinaryReply,
  type ExecuteReply,
  type OutgoingRequest,
} from "@objwire/protocol";
import { RemoteExecutionError, TransportError } from "./errors.ts";
import type { Channel } from "./channel.ts";
import type { CommandResult, ExecuteMode, RenderOptions } from "./types.ts";

const MODE_FLAGS: Record<ExecuteMode, ExecMode> = {
  none: ExecMode.NO_RESULT,
  evaluated: ExecMode.RETURN_TEXT,
  structured: ExecMode.RETURN_JSON,
};

export interface CommandExecutor {
  execute(command: string, mode?: ExecuteMode): Promise<CommandResult>;
  /** Evaluate `command` and return the raw textual result. */
  evaluate(command: string): Promise<string>;
  render(options?: RenderOptions): Promise<Uint8Array>;
  geometry(): Promise<Uint8Array>;
}

function isExecuteReply(data: unknown): data is ExecuteReply {
  return (
    typeof data === "object" &&
    data !== null &&
    "error" in data &&
    typeof data.error === "number" &&
    "value" in data &&
    typeof data.value === "string"
  );
}

function isBinaryReply(data: unknown): data is BinaryReply {
  return (
    typeof data === "object" &&
    data !== null &&
    "value" in data &&
    data.value instanceof Uint8Array
  );
}

/**
 * Create an executor bound to a channel. Every call connects on demand with
 * `connectTimeout` and maps transport failures to TransportError; nothing is
 * retried.
 */
export function createCommandExecutor(
  channel: Channel,
  connectTimeout?: number
): CommandExecutor {
  async function invoke(request: OutgoingRequest): Promise<unknown> {
    await channel.connect(connectTimeout);
    if (!channel.isConnected()) {
      throw new TransportError(`Unable to reach engine at ${channel.address}`);
    }
    try {
      return await channel.call(request);
    } catch (err) {
      if (err instanceof TransportError) {
        throw err;
      }
      throw new TransportError("Connection dropped", { cause: err });
    }
  }

  async function execute(
    command: string,
    mode: ExecuteMode = "evaluated"
  ): Promise<CommandResult> {
    const reply = await invoke({
      type: MessageType.EXECUTE,
      command,
      mode: MODE_FLAGS[mode],
    });
    if (!isExecuteReply(reply)) {
      throw new TransportError("Malformed execute reply");
    }
    if (reply.error < 0) {
      throw new RemoteExecutionError(reply.error);
    }

    switch (mode) {
      case "none":
        return { mode };
      case "evaluated":
        return { mode, text: reply.value };
      case "structured":
        try {
          return { mode, value: JSON.parse(reply.value) as unknown };
        } catch (err) {
          throw new TransportError("Engine returned invalid JSON", { cause: err });
        }
    }
  }

  async function evaluate(command: string): Promise<string> {
    const result = await execute(command, "evaluated");
    return result.mode === "evaluated" ? result.text : "";
  }

  async function render(options: RenderOptions = {}): Promise<Uint8Array> {
    const reply = await invoke({
      type: MessageType.RENDER,
      format: (options.png ?? true) ? ImageFormat.PNG : ImageFormat.RAW,
      width: options.width ?? 640,
      height: options.height ?? 480,
      aaPasses: options.aaPasses ?? 1,
      highlighting: options.highlighting ?? false,
    });
    if (!isBinaryReply(reply)) {
      throw new TransportError("Malformed render reply");
    }
    return reply.value;
  }

  async function geometry(): Promise<Uint8Array> {
    const reply = await invoke({
      type: MessageType.GEOMETRY,
      format: GeometryFormat.GLB,
    });
    if (!isBinaryReply(reply)) {
      throw new TransportError("Malformed geometry reply");
    }
    return reply.value;
  }

  return { execute, evaluate, render, geometry };
}
