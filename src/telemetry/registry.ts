import { logger } from "../utils/logger.js";
import { Poller } from "./poller.js";

const log = logger.child({ component: "logger-registry" });

export type PollerFactory<TTarget, TPoller extends Poller<TTarget>> = (
  entityName: string,
  target: TTarget,
  intervalSeconds: number
) => TPoller;

export interface PollerRegistryOptions<TTarget> {
  /** Returns a reason when the target cannot be polled; `start` is then a no-op. */
  validate?: (target: TTarget) => string | null;
  stopTimeoutMs?: number;
}

/**
 * Name → poller map with the "one live poller per entity" rule. Starting a
 * name that is already running hands back the running poller untouched.
 */
export class PollerRegistry<TTarget, TPoller extends Poller<TTarget>> {
  private readonly pollers = new Map<string, TPoller>();
  private readonly stopTimeoutMs: number;

  constructor(
    readonly kind: string,
    private readonly factory: PollerFactory<TTarget, TPoller>,
    private readonly options: PollerRegistryOptions<TTarget> = {}
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2000;
  }

  start(entityName: string, target: TTarget, intervalSeconds: number): TPoller | null {
    const existing = this.pollers.get(entityName);
    if (existing && existing.state === "running") {
      log.info({ kind: this.kind, entity: entityName }, "Logger already running; keeping existing instance");
      return existing;
    }

    const problem = this.options.validate?.(target) ?? null;
    if (problem) {
      log.error({ kind: this.kind, entity: entityName, problem }, "Refusing to start logger");
      return null;
    }

    const poller = this.factory(entityName, target, intervalSeconds);
    this.pollers.set(entityName, poller);
    poller.start();
    return poller;
  }

  get(entityName: string): TPoller | undefined {
    return this.pollers.get(entityName);
  }

  list(): TPoller[] {
    return [...this.pollers.values()];
  }

  async stop(entityName: string): Promise<void> {
    const poller = this.pollers.get(entityName);
    if (!poller) return;
    this.pollers.delete(entityName);
    await poller.stop(this.stopTimeoutMs);
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.pollers.keys()].map((name) => this.stop(name)));
  }
}
