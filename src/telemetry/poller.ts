import { setTimeout as delay } from "node:timers/promises";
import { Logger, logger as rootLogger } from "../utils/logger.js";

export type PollerState = "stopped" | "running";

export interface PollerParams<TTarget> {
  entityName: string;
  target: TTarget;
  intervalSeconds: number;
  destination: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Resolves after `ms`, or as soon as the signal aborts. Never rejects. */
export async function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

/**
 * One background polling loop. `start` launches the loop as an async task
 * owning an AbortController; `stop` aborts it and waits a bounded time for the
 * loop to notice. A failed poll is logged and the loop carries on.
 */
export abstract class Poller<TTarget> {
  readonly entityName: string;
  readonly target: TTarget;
  readonly intervalSeconds: number;
  readonly destination: string;
  protected readonly log: Logger;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private running = false;
  private pollCount = 0;
  private failureCount = 0;

  protected constructor(params: PollerParams<TTarget>, component: string) {
    this.entityName = params.entityName;
    this.target = params.target;
    this.intervalSeconds = params.intervalSeconds;
    this.destination = params.destination;
    this.log = rootLogger.child({ component, entity: params.entityName });
  }

  get state(): PollerState {
    return this.running ? "running" : "stopped";
  }

  get stats(): { polls: number; failures: number } {
    return { polls: this.pollCount, failures: this.failureCount };
  }

  /** Performs a single poll and writes its sample. Throws on failure. */
  abstract pollOnce(signal?: AbortSignal): Promise<void>;

  /** Runs once before the first poll (e.g. create the log header). */
  protected async prepare(): Promise<void> {}

  start(): void {
    if (this.running) {
      this.log.info("Poller already running");
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.running = true;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      this.log.error({ err }, "Poller loop crashed");
    });
    this.log.info({ interval_s: this.intervalSeconds, destination: this.destination }, "Poller started");
  }

  /** Returns false when the loop did not exit within the timeout (it is then abandoned). */
  async stop(timeoutMs = 2000): Promise<boolean> {
    const loop = this.loop;
    if (!this.controller || !loop) return true;

    this.controller.abort();
    const timer = new AbortController();
    const exited = await Promise.race([
      loop.then(() => true),
      delay(timeoutMs, false, { signal: timer.signal }).catch(() => false)
    ]);
    timer.abort();

    if (exited) {
      this.log.info("Poller stopped");
    } else {
      this.log.warn({ timeout_ms: timeoutMs }, "Poller did not exit in time; abandoning it");
    }
    this.controller = null;
    this.loop = null;
    return exited;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      await this.prepare();
    } catch (err) {
      this.log.warn({ err }, "Poller setup failed; polling anyway");
    }

    try {
      while (!signal.aborted) {
        this.pollCount++;
        try {
          await this.pollOnce(signal);
        } catch (err) {
          if (signal.aborted) break;
          this.failureCount++;
          this.log.warn({ error: errorMessage(err) }, "Polling error");
        }
        await interruptibleSleep(Math.max(0, this.intervalSeconds) * 1000, signal);
      }
    } finally {
      this.running = false;
    }
  }
}
