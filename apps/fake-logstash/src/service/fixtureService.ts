import type { LogSink } from "../logging/logTypes.js";

export type MaybePromise<T> = T | Promise<T>;

/**
 * Lifecycle shared by every fixture, socket-backed or container-backed.
 * `connect` returns the host aliases under which the fixture is reachable on that network.
 */
export interface FixtureService<TNetwork = unknown> {
  start(): MaybePromise<void>;
  stop(): MaybePromise<void>;
  isAlive(): MaybePromise<boolean>;
  connect(network: TNetwork): MaybePromise<readonly string[]>;
  disconnect(network: TNetwork): MaybePromise<void>;
}

export type RunServiceOptions = {
  name?: string;
  logger?: LogSink;
};

export type ServiceFactory<S> = () => MaybePromise<S>;

/**
 * Start `service`, run `body` with it, and always stop it afterwards.
 */
export async function runService<S extends FixtureService, T>(
  service: S,
  body: (service: S) => MaybePromise<T>,
  opts: RunServiceOptions = {}
): Promise<T> {
  const name = opts.name ?? service.constructor.name;
  const logger = opts.logger;

  logger?.append({ level: "info", scope: name, message: `Waiting for ${name} to start...` });
  try {
    await service.start();
  } catch (e: unknown) {
    logger?.append({
      level: "error",
      scope: name,
      message: `${name} failed to start.`,
      details: { error: e instanceof Error ? e.message : String(e) },
    });
    throw e;
  }
  logger?.append({ level: "info", scope: name, message: `${name} started.` });

  try {
    return await body(service);
  } finally {
    await service.stop();
    logger?.append({ level: "info", scope: name, message: `${name} stopped.` });
  }
}

/**
 * Like `runService`, but builds the service first (pulling images, binding ports) and logs that step.
 */
export async function fetchAndRunService<S extends FixtureService, T>(
  factory: ServiceFactory<S>,
  body: (service: S) => MaybePromise<T>,
  opts: RunServiceOptions & { name: string }
): Promise<T> {
  const { name, logger } = opts;
  logger?.append({ level: "info", scope: name, message: `Fetching ${name} ...` });
  let service: S;
  try {
    service = await factory();
  } catch (e: unknown) {
    logger?.append({
      level: "error",
      scope: name,
      message: `Failed fetching ${name}.`,
      details: { error: e instanceof Error ? e.message : String(e) },
    });
    throw e;
  }
  return runService(service, body, opts);
}
