import { ShutdownTimeoutError } from "../errors/fixtureErrors.js";

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Reason carried by the stop sentinel. */
export const SHUTDOWN_SENTINEL = "shutdown";

/**
 * One-shot stop channel between the controlling code and the reactor.
 */
export class ShutdownCoordinator {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get signaled(): boolean {
    return this.controller.signal.aborted;
  }

  send(): void {
    if (this.signaled) return;
    this.controller.abort(SHUTDOWN_SENTINEL);
  }

  /**
   * Wait for the reactor to exit. A reactor that misses the deadline is stuck: this is never retried.
   */
  async waitForExit(exited: Promise<void>, opts: { timeoutMs: number; serviceName: string }): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new ShutdownTimeoutError(opts.serviceName, opts.timeoutMs)), opts.timeoutMs);
    });
    try {
      await Promise.race([exited, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
