import type { MaybePromise } from "../service/fixtureService.js";
import { DEFAULT_CONTAINER_TIMEOUT_MS, type ContainerHandle, type NetworkHandle } from "./containerRuntime.js";

const FINISHED_STATUSES = new Set(["exited", "stopped"]);

/**
 * Run `body`, then kill the container (SIGKILL by default) unless it already finished.
 */
export async function killing<T>(
  container: ContainerHandle,
  body: (container: ContainerHandle) => MaybePromise<T>,
  opts: { timeoutMs?: number; signal?: string } = {}
): Promise<T> {
  try {
    return await body(container);
  } finally {
    if (!FINISHED_STATUSES.has(container.status.toLowerCase())) {
      await container.kill(opts.signal ?? "SIGKILL");
      await container.wait({ timeoutMs: opts.timeoutMs ?? DEFAULT_CONTAINER_TIMEOUT_MS });
    }
  }
}

/**
 * Run `body`, then disconnect every container from the network and remove it.
 */
export async function disconnecting<T>(
  network: NetworkHandle,
  body: (network: NetworkHandle) => MaybePromise<T>
): Promise<T> {
  try {
    return await body(network);
  } finally {
    for (const container of await network.containers()) {
      await network.disconnect(container);
    }
    await network.remove();
  }
}
