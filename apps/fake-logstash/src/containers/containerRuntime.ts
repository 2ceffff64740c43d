/**
 * Handles onto an external container engine. The fixtures only drive them; an adapter over
 * the engine's client (or a fake in tests) implements them.
 */

export type ContainerHandle = {
  readonly name: string;
  /** Engine status as of the last reload, e.g. "created", "running", "exited". */
  readonly status: string;
  start(): Promise<void>;
  kill(signal: string): Promise<void>;
  wait(opts: { timeoutMs: number }): Promise<void>;
  reload(): Promise<void>;
  remove(opts: { volumes: boolean }): Promise<void>;
  /** Aliases the container answers to on `network`, as of the last reload. */
  aliases(network: NetworkHandle): string[];
};

export type NetworkHandle = {
  readonly name: string;
  connect(container: ContainerHandle, opts?: { aliases?: string[] }): Promise<void>;
  disconnect(container: ContainerHandle, opts?: { force?: boolean }): Promise<void>;
  containers(): Promise<ContainerHandle[]>;
  remove(): Promise<void>;
};

export const DEFAULT_CONTAINER_TIMEOUT_MS = 10_000;

/**
 * Refresh the handle and report whether the engine says it is running.
 */
export async function isContainerAlive(container: ContainerHandle): Promise<boolean> {
  await container.reload();
  return container.status.toLowerCase() === "running";
}
