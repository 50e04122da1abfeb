import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";

/**
 * Poll `predicate` until it holds or `timeout` ms pass.
 *
 * @throws Error when the timeout expires
 */
export async function waitFor(
  predicate: () => boolean,
  timeout = 2000,
  interval = 5
): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!predicate()) {
    if (Date.now() >= deadline) {
      throw new Error(`Condition not met within ${timeout}ms`);
    }
    await delay(interval);
  }
}

let socketCounter = 0;

/**
 * A fresh Unix socket path under the system temp directory.
 */
export function tempSocketPath(name: string): string {
  socketCounter++;
  return join(tmpdir(), `objwire-${name}-${process.pid}-${socketCounter}.sock`);
}
