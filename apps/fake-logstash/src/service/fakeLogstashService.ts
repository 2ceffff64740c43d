import { LifecycleError } from "../errors/fixtureErrors.js";
import { LogBuffer } from "../logging/logBuffer.js";
import type { LogSink } from "../logging/logTypes.js";
import { resolveFrameFormat, type FrameFormat } from "../net/frameDecoder.js";
import { PortAcceptor } from "../net/portAcceptor.js";
import { Reactor } from "../net/reactor.js";
import { MAX_TIMER_DELAY_MS, ShutdownCoordinator } from "../net/shutdownCoordinator.js";
import type { LevelThreshold } from "../records/levels.js";
import { RecordStore } from "../records/recordStore.js";
import type { LogRecord, RecordPage, RecordQuery } from "../records/recordTypes.js";
import type { FixtureService } from "./fixtureService.js";
import { defaultContainerHost, LOCAL_HOST } from "./hosts.js";

export const DEFAULT_STOP_TIMEOUT_MS = 5000;

export type ServiceState = "constructed" | "started" | "stopped";

export type FakeLogstashOptions = {
  /** 0 (default) lets the OS pick a free port. */
  port?: number;
  delimiter?: string | Buffer;
  encoding?: string;
  stopTimeoutMs?: number;
  logger?: LogSink;
  localHost?: string;
  containerHost?: string;
};

/**
 * Fake logging service resembling Logstash's tcp input with the json_lines codec.
 *
 * Accepts any number of TCP connections, decodes one JSON object per delimited frame and
 * keeps them in `records`, in arrival order.
 *
 * @example
 * const logstash = await FakeLogstashService.create();
 * logstash.start();
 * const socket = net.createConnection({ host: logstash.localHost, port: logstash.port });
 * socket.end('{"level":"ERROR","message":"boom"}\n');
 * await logstash.waitForRecords(1);
 * await logstash.stop();
 * logstash.assertHasAtLeast("ERROR");
 */
export class FakeLogstashService implements FixtureService {
  readonly port: number;
  readonly localHost: string;
  readonly containerHost: string;
  readonly format: FrameFormat;

  private readonly acceptor: PortAcceptor;
  private readonly store = new RecordStore();
  private readonly coordinator = new ShutdownCoordinator();
  private readonly reactor: Reactor;
  private readonly logger: LogSink;
  private readonly stopTimeoutMs: number;
  private exited: Promise<void> | null = null;
  private currentState: ServiceState = "constructed";

  private constructor(acceptor: PortAcceptor, format: FrameFormat, opts: FakeLogstashOptions) {
    this.acceptor = acceptor;
    this.port = acceptor.port;
    this.format = format;
    this.localHost = opts.localHost ?? LOCAL_HOST;
    this.containerHost = opts.containerHost ?? defaultContainerHost();
    this.logger = opts.logger ?? new LogBuffer({ maxEntries: 500 });
    this.stopTimeoutMs = opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.reactor = new Reactor({
      acceptor,
      shutdown: this.coordinator.signal,
      format,
      logger: this.logger,
      scope: FakeLogstashService.name,
      onRecord: (record) => this.store.append(record),
    });
  }

  /**
   * Bind the listening port and return the service in the "constructed" state.
   */
  static async create(opts: FakeLogstashOptions = {}): Promise<FakeLogstashService> {
    const stopTimeoutMs = opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    if (!Number.isInteger(stopTimeoutMs) || stopTimeoutMs < 1 || stopTimeoutMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`stopTimeoutMs must be an integer between 1 and ${MAX_TIMER_DELAY_MS}`);
    }
    const format = resolveFrameFormat({ delimiter: opts.delimiter, encoding: opts.encoding });
    const acceptor = await PortAcceptor.bind(opts.port ?? 0);
    return new FakeLogstashService(acceptor, format, opts);
  }

  get state(): ServiceState {
    return this.currentState;
  }

  /** Every record received so far. Safe to clear or edit between assertions. */
  get records(): LogRecord[] {
    return this.store.records;
  }

  get connectionCount(): number {
    return this.reactor.connectionCount;
  }

  start(): void {
    if (this.currentState !== "constructed") {
      throw new LifecycleError(`${FakeLogstashService.name} cannot start from state "${this.currentState}".`);
    }
    this.exited = this.reactor.run();
    this.currentState = "started";
    this.logger.append({
      level: "info",
      scope: FakeLogstashService.name,
      message: "Accepting json_lines connections.",
      details: { port: this.port },
    });
  }

  /**
   * Stop the reactor and close every socket. Rejects with ShutdownTimeoutError when the reactor
   * does not exit in time. Stopping a stopped service does nothing.
   */
  async stop(): Promise<void> {
    if (this.currentState === "stopped") return;
    if (this.exited === null) {
      this.currentState = "stopped";
      await this.acceptor.close();
      return;
    }

    this.coordinator.send();
    await this.coordinator.waitForExit(this.exited, {
      timeoutMs: this.stopTimeoutMs,
      serviceName: FakeLogstashService.name,
    });
    this.currentState = "stopped";
    this.logger.append({
      level: "info",
      scope: FakeLogstashService.name,
      message: "Stopped.",
      details: { port: this.port, records: this.store.records.length },
    });
  }

  isAlive(): boolean {
    return this.reactor.running;
  }

  /**
   * Not a container, so nothing is attached; containers on any network reach it through `containerHost`.
   */
  connect(network: unknown): string[] {
    void network;
    return [this.containerHost];
  }

  disconnect(network: unknown): void {
    void network;
  }

  filter(threshold: LevelThreshold): Iterable<LogRecord> {
    return this.store.filter(threshold);
  }

  assertHasAtLeast(threshold: LevelThreshold): void {
    this.store.assertHasAtLeast(threshold);
  }

  assertNoneAtLeast(threshold: LevelThreshold): void {
    this.store.assertNoneAtLeast(threshold);
  }

  waitForRecords(count: number, opts?: { timeoutMs?: number }): Promise<LogRecord[]> {
    return this.store.waitForRecords(count, opts);
  }

  queryRecords(query: RecordQuery): RecordPage {
    return this.store.query(query);
  }

  clearRecords(): number {
    return this.store.clear();
  }

  onRecord(listener: (record: LogRecord) => void): () => void {
    return this.store.onAppend(listener);
  }
}
