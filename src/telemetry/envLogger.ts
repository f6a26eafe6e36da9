import { DhtReader, DhtReading } from "../adapters/sensors/dhtReader.js";
import { TimeSeriesStore } from "../store/logStore.js";
import { Clock } from "../utils/time.js";
import { Poller } from "./poller.js";

export interface EnvTarget {
  gpio: number;
}

export interface EnvLoggerDeps {
  store: TimeSeriesStore;
  reader: DhtReader;
  clock: Clock;
}

/**
 * Reads a DHT22 per interval. A failed read still produces a row, with the
 * temperature and humidity fields left blank.
 */
export class EnvLogger extends Poller<EnvTarget> {
  constructor(
    label: string,
    target: EnvTarget,
    intervalSeconds: number,
    private readonly deps: EnvLoggerDeps
  ) {
    super(
      { entityName: label, target, intervalSeconds, destination: deps.store.envLogPath(label) },
      "env-logger"
    );
  }

  protected override async prepare(): Promise<void> {
    await this.deps.store.ensureEnvLog(this.destination);
  }

  async pollOnce(signal?: AbortSignal): Promise<void> {
    let reading: DhtReading;
    try {
      reading = await this.deps.reader.read(this.target.gpio, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      this.log.warn({ err, gpio: this.target.gpio }, "DHT read failed; writing blank sample");
      reading = { temperatureC: null, humidityPct: null };
    }

    await this.deps.store.appendEnvSample(this.destination, {
      timestamp: this.deps.clock(),
      label: this.entityName,
      gpio: this.target.gpio,
      temperatureC: reading.temperatureC,
      humidityPct: reading.humidityPct
    });
  }
}
