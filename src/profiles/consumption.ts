import { logger, type Logger } from "../utils/logger.js";
import { WallClockMs } from "../utils/time.js";
import { ActiveCycleRegistry } from "./activeCycles.js";
import { isCycleFinished, stepConsumption } from "./curve.js";
import { ComputerProfile, DeviceProfile, ProfileRegistry } from "./registry.js";

export interface SimDevice {
  name: string;
  /** Usually one of `ARCHETYPES`; anything else draws nothing. */
  archetype: string;
  on: boolean;
}

export interface TickResult {
  device: SimDevice;
  watts: number;
  cycleEnded: boolean;
}

export interface PredictedSample {
  timestamp: WallClockMs;
  watts: number;
}

export interface PredictOptions {
  horizonSeconds?: number;
  stepSeconds?: number;
}

/** Historical mean draw of a metered device; null when it was never recorded. */
export type MeanPowerSource = (deviceId: string) => Promise<number | null>;

/** Nearest `targetMeanW` wins; the first candidate wins ties. */
export function chooseComputerProfile(
  candidates: readonly ComputerProfile[],
  meanW: number | null
): ComputerProfile | null {
  if (meanW === null || !Number.isFinite(meanW)) return null;
  let best: ComputerProfile | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const c of candidates) {
    const d = Math.abs(c.targetMeanW - meanW);
    if (d < bestDistance) {
      best = c;
      bestDistance = d;
    }
  }
  return best;
}

/**
 * Turns appliance profiles into instantaneous draw for simulated devices and
 * drives their cycles: open on off→on, close on off, force off once a
 * one-shot profile has run out.
 */
export class ConsumptionProfileEngine {
  private readonly computerChoice = new Map<string, ComputerProfile | null>();
  private readonly log: Logger;

  constructor(
    private readonly profiles: ProfileRegistry,
    readonly cycles: ActiveCycleRegistry,
    private readonly meanPower: MeanPowerSource,
    log: Logger = logger
  ) {
    this.log = log.child({ component: "consumption" });
  }

  /**
   * Resolves the Computer sub-profile from recorded history. Until this has
   * run for a device, the generic Computer profile is used.
   */
  async prepareDevice(device: SimDevice): Promise<void> {
    if (device.archetype !== "Computer" || this.computerChoice.has(device.name)) return;

    const meterId = this.profiles.meterIdFor(device.name);
    let meanW: number | null = null;
    try {
      meanW = await this.meanPower(meterId);
    } catch (err) {
      this.log.warn({ err, device: device.name, meterId }, "Failed to load power history; using generic profile");
    }

    const chosen = chooseComputerProfile(this.profiles.computerProfiles(), meanW);
    this.computerChoice.set(device.name, chosen);
    this.log.info({ device: device.name, meterId, meanW, profile: chosen?.name ?? "Computer" }, "Computer profile selected");
  }

  profileFor(deviceName: string, archetype: string): DeviceProfile | undefined {
    if (archetype === "Computer") {
      const chosen = this.computerChoice.get(deviceName);
      if (chosen) return chosen;
    }
    return this.profiles.get(archetype);
  }

  deviceConsumption(device: SimDevice, now: WallClockMs): number {
    if (!device.on) return 0;
    const cycle = this.cycles.get(device.name);
    const profile = this.profileFor(device.name, cycle?.cycleType ?? device.archetype);
    if (!profile) return 0;
    const elapsed = cycle ? this.cycles.elapsedMinutes(device.name, now) : 0;
    return stepConsumption(profile, elapsed);
  }

  switchDevice(device: SimDevice, on: boolean, now: WallClockMs): SimDevice {
    if (on && !device.on) {
      this.cycles.open(device.name, device.archetype, now);
    } else if (!on) {
      this.cycles.close(device.name);
    }
    return { ...device, on };
  }

  tick(device: SimDevice, now: WallClockMs): TickResult {
    if (!device.on) {
      this.cycles.close(device.name);
      return { device, watts: 0, cycleEnded: false };
    }

    const cycle = this.cycles.get(device.name);
    if (cycle) {
      const profile = this.profileFor(device.name, cycle.cycleType);
      if (profile && isCycleFinished(profile, this.cycles.elapsedMinutes(device.name, now))) {
        this.cycles.close(device.name);
        this.log.info({ device: device.name, cycleType: cycle.cycleType }, "Cycle finished; device switched off");
        return { device: { ...device, on: false }, watts: 0, cycleEnded: true };
      }
    }

    return { device, watts: this.deviceConsumption(device, now), cycleEnded: false };
  }

  /** Samples the draw over the horizon without touching any cycle. */
  predictDeviceConsumption(device: SimDevice, now: WallClockMs, opts: PredictOptions = {}): PredictedSample[] {
    const horizon = opts.horizonSeconds ?? 300;
    const step = opts.stepSeconds ?? 60;
    if (horizon <= 0 || step <= 0) return [];

    const steps = Math.max(1, Math.floor(horizon / step));
    const out: PredictedSample[] = [];
    for (let i = 0; i <= steps; i++) {
      const timestamp = now + i * step * 1000;
      out.push({ timestamp, watts: this.deviceConsumption(device, timestamp) });
    }
    return out;
  }
}
