import { MeterClient, ShellyHttpClient, fallbackDeviceName } from "./adapters/meters/shellyClient.js";
import { CommandDhtReader, DhtReader, UnavailableDhtReader, validateGpio } from "./adapters/sensors/dhtReader.js";
import type { AppConfig } from "./config.js";
import { ActiveCycleRegistry } from "./profiles/activeCycles.js";
import { ConsumptionProfileEngine } from "./profiles/consumption.js";
import { ProfileRegistry, loadProfileRegistry } from "./profiles/registry.js";
import { ReplayPredictionEngine } from "./replay/replayEngine.js";
import { SensorBinding, SensorBindings, loadSensorMap } from "./sensorMap.js";
import { DeviceIdRule } from "./store/deviceId.js";
import { TimeSeriesStore } from "./store/logStore.js";
import { EnvLogger, EnvTarget } from "./telemetry/envLogger.js";
import { PowerLogger, PowerTarget } from "./telemetry/powerLogger.js";
import { PollerRegistry } from "./telemetry/registry.js";
import { logger } from "./utils/logger.js";
import { Clock, systemClock } from "./utils/time.js";

const log = logger.child({ component: "runtime" });

export interface RuntimeSettings {
  powerPollSeconds: number;
  envPollSeconds: number;
  stopTimeoutMs: number;
  deviceIdRules?: DeviceIdRule[];
}

export interface RuntimeDeps {
  store: TimeSeriesStore;
  profiles: ProfileRegistry;
  meterClient: MeterClient;
  dhtReader: DhtReader;
  clock: Clock;
  bindings?: Map<string, SensorBinding>;
  settings: RuntimeSettings;
}

export interface LoggerSummary {
  kind: "power" | "environment";
  entity: string;
  target: PowerTarget | EnvTarget;
  interval_s: number;
  destination: string;
  state: string;
  polls: number;
  failures: number;
}

export interface StartPowerOptions {
  deviceName?: string;
  deviceId?: string;
  intervalSeconds?: number;
}

/**
 * Owns every long-lived piece of the simulation core: the log store, both
 * logger registries, the active cycles and the engines reading recorded data.
 */
export class SimulationRuntime {
  readonly store: TimeSeriesStore;
  readonly clock: Clock;
  readonly cycles = new ActiveCycleRegistry();
  readonly consumption: ConsumptionProfileEngine;
  readonly replay: ReplayPredictionEngine;
  readonly powerLoggers: PollerRegistry<PowerTarget, PowerLogger>;
  readonly envLoggers: PollerRegistry<EnvTarget, EnvLogger>;

  private bindings: Map<string, SensorBinding>;
  private readonly meterClient: MeterClient;
  private readonly settings: RuntimeSettings;

  constructor(deps: RuntimeDeps) {
    this.store = deps.store;
    this.clock = deps.clock;
    this.meterClient = deps.meterClient;
    this.settings = deps.settings;
    this.bindings = deps.bindings ?? new Map();

    this.consumption = new ConsumptionProfileEngine(deps.profiles, this.cycles, (deviceId) =>
      this.store.meanPowerForDeviceId(deviceId)
    );
    this.replay = new ReplayPredictionEngine(this.store, () => this.bindings);

    const { store, clock } = deps;
    this.powerLoggers = new PollerRegistry<PowerTarget, PowerLogger>(
      "power",
      (name, target, interval) =>
        new PowerLogger(name, target, interval, { store, clock, client: deps.meterClient, idRules: deps.settings.deviceIdRules }),
      { stopTimeoutMs: deps.settings.stopTimeoutMs }
    );
    this.envLoggers = new PollerRegistry<EnvTarget, EnvLogger>(
      "environment",
      (label, target, interval) => new EnvLogger(label, target, interval, { store, clock, reader: deps.dhtReader }),
      { stopTimeoutMs: deps.settings.stopTimeoutMs, validate: (target) => validateGpio(target.gpio) }
    );
  }

  getBindings(): SensorBindings {
    return this.bindings;
  }

  setBindings(bindings: Map<string, SensorBinding>): void {
    this.bindings = bindings;
  }

  /** Without a device name, asks the plug for its own and falls back to `Shelly_<ip>`. */
  async startPowerLogger(ip: string, opts: StartPowerOptions = {}): Promise<PowerLogger | null> {
    let deviceName = opts.deviceName?.trim();
    if (!deviceName) {
      try {
        deviceName = (await this.meterClient.deviceName(ip)) ?? undefined;
      } catch (err) {
        log.warn({ err, ip }, "Device name lookup failed");
      }
    }
    const name = deviceName || fallbackDeviceName(ip);

    return this.powerLoggers.start(
      name,
      { ip, deviceId: opts.deviceId },
      opts.intervalSeconds ?? this.settings.powerPollSeconds
    );
  }

  startEnvLogger(label: string, gpio: number, intervalSeconds?: number): EnvLogger | null {
    return this.envLoggers.start(label, { gpio }, intervalSeconds ?? this.settings.envPollSeconds);
  }

  /** Starts a logger for every gpio and ip binding; label bindings only read. */
  async autostart(): Promise<{ power: string[]; environment: string[] }> {
    const power: string[] = [];
    const environment: string[] = [];
    for (const binding of this.bindings.values()) {
      if (binding.kind === "ip") {
        const poller = await this.startPowerLogger(binding.ip, {
          deviceName: binding.sensorName,
          deviceId: binding.sensorName
        });
        if (poller) power.push(poller.entityName);
      } else if (binding.kind === "gpio") {
        const poller = this.startEnvLogger(binding.sensorName, binding.gpio);
        if (poller) environment.push(poller.entityName);
      }
    }
    log.info({ power, environment }, "Loggers autostarted from sensor map");
    return { power, environment };
  }

  loggerSummaries(): LoggerSummary[] {
    const power = this.powerLoggers.list().map((p): LoggerSummary => ({
      kind: "power",
      entity: p.entityName,
      target: { ...p.target, deviceId: p.deviceId },
      interval_s: p.intervalSeconds,
      destination: p.destination,
      state: p.state,
      ...p.stats
    }));
    const env = this.envLoggers.list().map((p): LoggerSummary => ({
      kind: "environment",
      entity: p.entityName,
      target: p.target,
      interval_s: p.intervalSeconds,
      destination: p.destination,
      state: p.state,
      ...p.stats
    }));
    return [...power, ...env];
  }

  async stopAll(): Promise<void> {
    await Promise.all([this.powerLoggers.stopAll(), this.envLoggers.stopAll()]);
  }
}

function dhtReaderFromCommand(commandLine: string | undefined, timeoutMs: number): DhtReader {
  const parts = commandLine?.split(/\s+/).filter(Boolean) ?? [];
  const [command, ...args] = parts;
  if (!command) return new UnavailableDhtReader();
  return new CommandDhtReader(command, args, timeoutMs);
}

export async function createRuntime(cfg: AppConfig): Promise<SimulationRuntime> {
  const profiles = loadProfileRegistry(cfg.PROFILES_PATH);
  const bindings = await loadSensorMap(cfg.SENSOR_MAP_PATH);

  return new SimulationRuntime({
    store: new TimeSeriesStore(cfg.LOGS_DIR),
    profiles,
    meterClient: new ShellyHttpClient({
      timeoutMs: cfg.HTTP_TIMEOUT_MS,
      username: cfg.SHELLY_USERNAME,
      password: cfg.SHELLY_PASSWORD
    }),
    dhtReader: dhtReaderFromCommand(cfg.DHT_READER_COMMAND, Math.max(cfg.HTTP_TIMEOUT_MS, 5000)),
    clock: systemClock(cfg.TIMEZONE),
    bindings,
    settings: {
      powerPollSeconds: cfg.POWER_POLL_SECONDS,
      envPollSeconds: cfg.ENV_POLL_SECONDS,
      stopTimeoutMs: cfg.STOP_TIMEOUT_MS,
      deviceIdRules: cfg.deviceIdRules
    }
  });
}
