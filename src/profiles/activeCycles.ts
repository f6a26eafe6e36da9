import { MINUTE_MS, WallClockMs } from "../utils/time.js";

export interface ActiveCycle {
  deviceName: string;
  cycleStart: WallClockMs;
  cycleType: string;
}

/** Running appliance cycles, one per device name. */
export class ActiveCycleRegistry {
  private readonly cycles = new Map<string, ActiveCycle>();

  /** Opens a cycle unless one is already running for the device. */
  open(deviceName: string, cycleType: string, cycleStart: WallClockMs): ActiveCycle {
    const existing = this.cycles.get(deviceName);
    if (existing) return existing;
    const cycle: ActiveCycle = { deviceName, cycleType, cycleStart };
    this.cycles.set(deviceName, cycle);
    return cycle;
  }

  close(deviceName: string): boolean {
    return this.cycles.delete(deviceName);
  }

  get(deviceName: string): ActiveCycle | undefined {
    return this.cycles.get(deviceName);
  }

  list(): ActiveCycle[] {
    return [...this.cycles.values()];
  }

  elapsedMinutes(deviceName: string, now: WallClockMs): number {
    const cycle = this.cycles.get(deviceName);
    return cycle ? (now - cycle.cycleStart) / MINUTE_MS : 0;
  }
}
