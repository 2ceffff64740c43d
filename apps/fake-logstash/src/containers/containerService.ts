import type { FixtureService } from "../service/fixtureService.js";
import {
  DEFAULT_CONTAINER_TIMEOUT_MS,
  isContainerAlive,
  type ContainerHandle,
  type NetworkHandle,
} from "./containerRuntime.js";

export type ContainerServiceOptions = {
  /** Remove containers (and their volumes) once stopped. Defaults to true. */
  remove?: boolean;
  stopSignal?: string;
  timeoutMs?: number;
};

/**
 * Fixture made of containers that are safe to start in the given order and stop in reverse.
 */
export class ContainerService implements FixtureService<NetworkHandle> {
  readonly containers: readonly ContainerHandle[];
  private readonly remove: boolean;
  private readonly stopSignal: string;
  private readonly timeoutMs: number;

  constructor(containers: readonly ContainerHandle[], opts: ContainerServiceOptions = {}) {
    this.containers = containers;
    this.remove = opts.remove ?? true;
    this.stopSignal = opts.stopSignal ?? "SIGTERM";
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_CONTAINER_TIMEOUT_MS;
  }

  async start(): Promise<void> {
    for (const c of this.containers) {
      if (await isContainerAlive(c)) continue;
      await c.start();
      await c.reload();
    }
  }

  async stop(): Promise<void> {
    for (const c of [...this.containers].reverse()) {
      if (!(await isContainerAlive(c))) continue;
      await c.kill(this.stopSignal);
      await c.wait({ timeoutMs: this.timeoutMs });
      await c.reload();
      if (this.remove) await c.remove({ volumes: true });
    }
  }

  async isAlive(): Promise<boolean> {
    for (const c of this.containers) {
      if (!(await isContainerAlive(c))) return false;
    }
    return true;
  }

  /**
   * Attach every container. Several endpoints have no single alias list, so none is returned.
   */
  async connect(network: NetworkHandle): Promise<string[]> {
    for (const c of this.containers) {
      await network.connect(c);
      await c.reload();
    }
    return [];
  }

  async disconnect(network: NetworkHandle): Promise<void> {
    for (const c of [...this.containers].reverse()) {
      await network.disconnect(c);
      await c.reload();
    }
  }
}

/**
 * Fixture backed by one container, which is also its network endpoint.
 */
export class SingleContainerService implements FixtureService<NetworkHandle> {
  readonly container: ContainerHandle;
  private readonly inner: ContainerService;

  constructor(container: ContainerHandle, opts: ContainerServiceOptions = {}) {
    this.container = container;
    this.inner = new ContainerService([container], opts);
  }

  start(): Promise<void> {
    return this.inner.start();
  }

  stop(): Promise<void> {
    return this.inner.stop();
  }

  isAlive(): Promise<boolean> {
    return this.inner.isAlive();
  }

  async connect(network: NetworkHandle, opts?: { aliases?: string[] }): Promise<string[]> {
    await network.connect(this.container, opts);
    await this.container.reload();
    return this.container.aliases(network);
  }

  async disconnect(network: NetworkHandle, opts?: { force?: boolean }): Promise<void> {
    await network.disconnect(this.container, opts);
    await this.container.reload();
  }
}
