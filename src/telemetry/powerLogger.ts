import { MeterClient, readMeter } from "../adapters/meters/shellyClient.js";
import { DeviceIdRule, deriveDeviceId } from "../store/deviceId.js";
import { TimeSeriesStore } from "../store/logStore.js";
import { Clock } from "../utils/time.js";
import { Poller } from "./poller.js";

export interface PowerTarget {
  ip: string;
  /** Defaults to the id derived from the device name. */
  deviceId?: string;
  /** Defaults to `smartmeter_<device>.csv` in the store. */
  destination?: string;
}

export interface PowerLoggerDeps {
  store: TimeSeriesStore;
  client: MeterClient;
  clock: Clock;
  idRules?: DeviceIdRule[];
}

/** Polls one smart plug and appends a power/voltage/current row per interval. */
export class PowerLogger extends Poller<PowerTarget> {
  readonly deviceId: string;

  constructor(
    deviceName: string,
    target: PowerTarget,
    intervalSeconds: number,
    private readonly deps: PowerLoggerDeps
  ) {
    super(
      {
        entityName: deviceName,
        target,
        intervalSeconds,
        destination: target.destination ?? deps.store.powerLogPath(deviceName)
      },
      "power-logger"
    );
    this.deviceId = target.deviceId ?? deriveDeviceId(deviceName, deps.idRules);
  }

  protected override async prepare(): Promise<void> {
    await this.deps.store.ensurePowerLog(this.destination);
  }

  async pollOnce(signal?: AbortSignal): Promise<void> {
    const reading = await readMeter(this.deps.client, this.target.ip, signal);
    await this.deps.store.appendPowerSample(this.destination, {
      timestamp: this.deps.clock(),
      device: this.entityName,
      deviceId: this.deviceId,
      ip: this.target.ip,
      powerW: reading.powerW,
      voltageV: reading.voltageV,
      currentA: reading.currentA
    });
    this.log.debug({ protocol: reading.protocol, power_w: reading.powerW }, "Power sample written");
  }
}
