import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

export interface DhtReading {
  temperatureC: number | null;
  humidityPct: number | null;
}

/** Driver boundary for a DHT22 on a BCM GPIO pin. */
export interface DhtReader {
  read(gpio: number, signal?: AbortSignal): Promise<DhtReading>;
}

export class DhtReadError extends Error {
  constructor(
    readonly gpio: number,
    message: string
  ) {
    super(`DHT read on GPIO ${gpio} failed: ${message}`);
    this.name = "DhtReadError";
  }
}

/** BCM numbering on the 40-pin header. */
export const MAX_BCM_GPIO = 27;

export function validateGpio(gpio: number): string | null {
  if (!Number.isInteger(gpio) || gpio < 0 || gpio > MAX_BCM_GPIO) {
    return `GPIO ${gpio} is not a BCM pin (0-${MAX_BCM_GPIO})`;
  }
  return null;
}

const ReadingSchema = z.object({
  temperature: z.number().nullable(),
  humidity: z.number().nullable()
});

/**
 * Runs a helper executable per read (`<command> [...args] <gpio>`), which
 * prints `{"temperature": 21.4, "humidity": 48.0}` on stdout.
 */
export class CommandDhtReader implements DhtReader {
  constructor(
    private readonly command: string,
    private readonly args: string[] = [],
    private readonly timeoutMs = 5000
  ) {}

  async read(gpio: number, signal?: AbortSignal): Promise<DhtReading> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.command, [...this.args, String(gpio)], {
        timeout: this.timeoutMs,
        signal
      }));
    } catch (err) {
      throw new DhtReadError(gpio, err instanceof Error ? err.message : String(err));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new DhtReadError(gpio, `helper printed non-JSON output: ${stdout.trim().slice(0, 120)}`);
    }
    const result = ReadingSchema.safeParse(parsed);
    if (!result.success) throw new DhtReadError(gpio, `unexpected helper output: ${result.error.message}`);
    return { temperatureC: result.data.temperature, humidityPct: result.data.humidity };
  }
}

/** Host without a DHT driver: every read fails, so rows carry blank values. */
export class UnavailableDhtReader implements DhtReader {
  async read(gpio: number): Promise<DhtReading> {
    throw new DhtReadError(gpio, "no DHT driver available on this host");
  }
}
