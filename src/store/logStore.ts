import path from "node:path";
import { WallClockMs, formatWallClock } from "../utils/time.js";
import { LogSchema, appendRow, ensureLog } from "./csvLog.js";
import { canonId, sanitizeFileComponent } from "./deviceId.js";
import { Series, isEmpty, loadMatching, mean } from "./series.js";

export const ENV_LOG: LogSchema<"timestamp_iso" | "label" | "gpio" | "temp_C" | "hum_%"> = {
  name: "environment",
  columns: ["timestamp_iso", "label", "gpio", "temp_C", "hum_%"]
};

export const POWER_LOG: LogSchema<
  "timestamp_iso" | "device" | "device_id" | "ip" | "power_W" | "voltage_V" | "current_A"
> = {
  name: "power",
  columns: ["timestamp_iso", "device", "device_id", "ip", "power_W", "voltage_V", "current_A"]
};

const ENV_PREFIX = "dht_";
const POWER_PREFIX = "smartmeter_";

export interface EnvSample {
  timestamp: WallClockMs;
  label: string;
  gpio: number;
  temperatureC: number | null;
  humidityPct: number | null;
}

export interface PowerSample {
  timestamp: WallClockMs;
  device: string;
  deviceId: string;
  ip: string;
  powerW: number | null;
  voltageV: number | null;
  currentA: number | null;
}

/**
 * Append-only CSV logs under one directory: `dht_<label>.csv` per environment
 * sensor and `smartmeter_<device>.csv` per power meter. Loggers write, the
 * engines only read.
 */
export class TimeSeriesStore {
  constructor(readonly logsDir: string) {}

  envLogPath(label: string): string {
    return path.join(this.logsDir, `${ENV_PREFIX}${sanitizeFileComponent(label || "sensor")}.csv`);
  }

  powerLogPath(deviceName: string): string {
    return path.join(this.logsDir, `${POWER_PREFIX}${sanitizeFileComponent(deviceName || "device")}.csv`);
  }

  async ensureEnvLog(filePath: string): Promise<void> {
    await ensureLog(filePath, ENV_LOG);
  }

  async ensurePowerLog(filePath: string): Promise<void> {
    await ensureLog(filePath, POWER_LOG);
  }

  async appendEnvSample(filePath: string, s: EnvSample): Promise<void> {
    await appendRow(filePath, [formatWallClock(s.timestamp), s.label, s.gpio, s.temperatureC, s.humidityPct]);
  }

  async appendPowerSample(filePath: string, s: PowerSample): Promise<void> {
    await appendRow(filePath, [
      formatWallClock(s.timestamp, { millis: true }),
      s.device,
      s.deviceId,
      s.ip,
      s.powerW,
      s.voltageV,
      s.currentA
    ]);
  }

  /** Reads the label's own log file only. */
  loadTemperatureByLabel(label: string): Promise<Series> {
    return this.loadEnvByLabel(label, "temp_C");
  }

  loadHumidityByLabel(label: string): Promise<Series> {
    return this.loadEnvByLabel(label, "hum_%");
  }

  /** Every environment log, rows whose gpio column equals the pin. */
  loadTemperatureByGpio(gpio: number): Promise<Series> {
    return loadMatching({
      dir: this.logsDir,
      pattern: `${ENV_PREFIX}*.csv`,
      predicate: (row) => {
        const raw = row.gpio?.trim() ?? "";
        return raw !== "" && Number(raw) === gpio;
      },
      valueColumn: "temp_C",
      fill: "ffill"
    });
  }

  loadPowerByDeviceId(deviceId: string): Promise<Series> {
    const wanted = canonId(deviceId);
    return this.loadPower((row) => canonId(row.device_id) === wanted);
  }

  loadPowerByIp(ip: string): Promise<Series> {
    const wanted = ip.trim();
    return this.loadPower((row) => (row.ip ?? "").trim() === wanted);
  }

  loadPowerByDevice(deviceName: string): Promise<Series> {
    return this.loadPower((row) => row.device === deviceName);
  }

  /** Mean of the per-minute power medians; null when nothing was recorded. */
  async meanPowerForDeviceId(deviceId: string): Promise<number | null> {
    const series = await this.loadPowerByDeviceId(deviceId);
    return isEmpty(series) ? null : mean(series.values);
  }

  private loadEnvByLabel(label: string, valueColumn: string): Promise<Series> {
    return loadMatching({
      dir: this.logsDir,
      pattern: path.basename(this.envLogPath(label)),
      predicate: () => true,
      valueColumn,
      fill: "ffill"
    });
  }

  private loadPower(predicate: (row: Record<string, string>) => boolean): Promise<Series> {
    return loadMatching({
      dir: this.logsDir,
      pattern: `${POWER_PREFIX}*.csv`,
      predicate,
      valueColumn: "power_W",
      fill: "none"
    });
  }
}
