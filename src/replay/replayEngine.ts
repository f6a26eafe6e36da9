import type { SensorBinding, SensorBindings } from "../sensorMap.js";
import { TimeSeriesStore } from "../store/logStore.js";
import { Series, isEmpty } from "../store/series.js";
import { logger, type Logger } from "../utils/logger.js";
import { ReplayHistory, ReplayKind, predictValue, toReplayHistory } from "./prediction.js";

export type RoomState = "cooking" | "heating" | "cooling" | "stable" | "unknown";

export const ROOM_STATE_THRESHOLDS = {
  cookingSlope: 0.15,
  cookingMinC: 26,
  heatingSlope: 0.05,
  coolingSlope: -0.05
} as const;

const cacheKey = (kind: ReplayKind, sensorName: string) => `${kind}:${sensorName}`;

/**
 * Replays recorded temperature and power history for simulated sensors. Each
 * sensor's history is loaded once (`ensureLoaded`) and then served
 * synchronously; a sensor that was never loaded reads as having no history.
 * Misses are cached for bound sensors only.
 */
export class ReplayPredictionEngine {
  private readonly histories = new Map<string, ReplayHistory | null>();
  private readonly loading = new Map<string, Promise<ReplayHistory | null>>();
  private readonly log: Logger;

  constructor(
    private readonly store: TimeSeriesStore,
    private readonly bindings: () => SensorBindings,
    log: Logger = logger
  ) {
    this.log = log.child({ component: "replay" });
  }

  async ensureLoaded(kind: ReplayKind, sensorName: string): Promise<ReplayHistory | null> {
    const key = cacheKey(kind, sensorName);
    if (this.histories.has(key)) return this.histories.get(key) ?? null;

    const inflight = this.loading.get(key);
    if (inflight) return inflight;

    const task = this.load(kind, sensorName)
      .then((history) => {
        if (history || this.bindings().has(sensorName)) this.histories.set(key, history);
        this.log.info(
          { sensor: sensorName, kind, samples: history?.times.length ?? 0 },
          history ? "Recorded history loaded" : "No recorded history"
        );
        return history;
      })
      .catch((err: unknown) => {
        this.log.warn({ err, sensor: sensorName, kind }, "Failed to load recorded history");
        return null;
      })
      .finally(() => this.loading.delete(key));
    this.loading.set(key, task);
    return task;
  }

  history(kind: ReplayKind, sensorName: string): ReplayHistory | null {
    return this.histories.get(cacheKey(kind, sensorName)) ?? null;
  }

  isRealSensor(kind: ReplayKind, sensorName: string): boolean {
    return this.history(kind, sensorName) !== null;
  }

  /** Null means "no history": the caller applies its own fallback. */
  valueAt(kind: ReplayKind, sensorName: string, minutes: number): number | null {
    return predictValue(this.history(kind, sensorName), minutes, kind);
  }

  lastRealValue(kind: ReplayKind, sensorName: string): number | null {
    const h = this.history(kind, sensorName);
    return h ? h.values[h.values.length - 1] : null;
  }

  /** First recorded temperature clamped to the sensor's range. */
  initialTemperature(sensorName: string, min: number, max: number): number | null {
    const h = this.history("temperature", sensorName);
    if (!h) return null;
    return Math.min(max, Math.max(min, h.values[0]));
  }

  inferRoomState(sensorName: string, windowMinutes = 20): RoomState {
    const h = this.history("temperature", sensorName);
    if (!h) return "unknown";
    const tail = h.values.slice(-Math.max(1, windowMinutes));
    if (tail.length < 2) return "unknown";

    const first = tail[0];
    const last = tail[tail.length - 1];
    const slope = (last - first) / Math.max(1, tail.length - 1);
    const t = ROOM_STATE_THRESHOLDS;

    if (slope > t.cookingSlope && last >= t.cookingMinC) return "cooking";
    if (slope > t.heatingSlope) return "heating";
    if (slope < t.coolingSlope) return "cooling";
    return "stable";
  }

  private async load(kind: ReplayKind, sensorName: string): Promise<ReplayHistory | null> {
    const binding = this.bindings().get(sensorName);
    const series = kind === "temperature" ? await this.loadTemperature(sensorName, binding) : await this.loadPower(sensorName, binding);
    return toReplayHistory(series);
  }

  private async loadTemperature(sensorName: string, binding: SensorBinding | undefined): Promise<Series> {
    const label = binding?.kind === "label" ? binding.label : sensorName;
    const byLabel = await this.store.loadTemperatureByLabel(label);
    if (!isEmpty(byLabel) || binding?.kind !== "gpio") return byLabel;
    return this.store.loadTemperatureByGpio(binding.gpio);
  }

  private async loadPower(sensorName: string, binding: SensorBinding | undefined): Promise<Series> {
    const device = binding?.kind === "label" ? binding.label : sensorName;
    const byDevice = await this.store.loadPowerByDevice(device);
    if (!isEmpty(byDevice) || binding?.kind !== "ip") return byDevice;
    return this.store.loadPowerByIp(binding.ip);
  }
}
