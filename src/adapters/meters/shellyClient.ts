import { z } from "zod";
import { fetchWithTimeout } from "../../utils/fetchWithTimeout.js";

export type MeterProtocol = "gen2" | "gen1";

export interface MeterReading {
  protocol: MeterProtocol;
  powerW: number | null;
  voltageV: number | null;
  currentA: number | null;
}

export interface MeterClient {
  readGen2(ip: string, signal?: AbortSignal): Promise<MeterReading>;
  readGen1(ip: string, signal?: AbortSignal): Promise<MeterReading>;
  deviceName(ip: string, signal?: AbortSignal): Promise<string | null>;
}

export class MeterUnreachableError extends Error {
  constructor(
    readonly ip: string,
    readonly causes: { gen2: string; gen1: string }
  ) {
    super(`Meter ${ip} unreachable (gen2: ${causes.gen2}; gen1: ${causes.gen1})`);
    this.name = "MeterUnreachableError";
  }
}

export interface ShellyClientConfig {
  timeoutMs: number;
  username?: string;
  password?: string;
}

function toNumberOrNull(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

const MeterFieldsSchema = z
  .object({
    voltage: z.unknown().optional(),
    apower: z.unknown().optional(),
    power: z.unknown().optional(),
    current: z.unknown().optional()
  })
  .passthrough();

const Gen1StatusSchema = MeterFieldsSchema.extend({
  meters: z.array(MeterFieldsSchema).optional(),
  emeter: z.array(MeterFieldsSchema).optional()
});

const DeviceInfoSchema = z
  .object({
    name: z.string().nullish(),
    id: z.string().nullish()
  })
  .passthrough();

type MeterFields = z.infer<typeof MeterFieldsSchema>;

// Gen2 reports active power as `apower`; Gen1 as `power`.
function powerOf(fields: MeterFields | undefined, prefer: "apower" | "power"): number | null {
  const other = prefer === "apower" ? "power" : "apower";
  return toNumberOrNull(fields?.[prefer]) ?? toNumberOrNull(fields?.[other]);
}

/** Parses a Gen2 `Switch.GetStatus` body. */
export function parseGen2Status(body: unknown): MeterReading {
  const d = MeterFieldsSchema.parse(body);
  return {
    protocol: "gen2",
    voltageV: toNumberOrNull(d.voltage),
    powerW: powerOf(d, "apower"),
    currentA: toNumberOrNull(d.current)
  };
}

/** Parses a Gen1 `/status` body: first meter entry, top-level fields as fallback. */
export function parseGen1Status(body: unknown): MeterReading {
  const d = Gen1StatusSchema.parse(body);
  const meters = d.meters && d.meters.length > 0 ? d.meters : d.emeter;
  const m0 = meters?.[0];
  return {
    protocol: "gen1",
    voltageV: toNumberOrNull(m0?.voltage) ?? toNumberOrNull(d.voltage),
    powerW: powerOf(m0, "power") ?? toNumberOrNull(d.power),
    currentA: toNumberOrNull(m0?.current) ?? toNumberOrNull(d.current)
  };
}

/** Fills in voltage from power / current when the meter does not report it. */
export function withDerivedVoltage(r: MeterReading): MeterReading {
  if (r.voltageV === null && r.powerW !== null && r.currentA !== null && r.currentA > 1e-3) {
    return { ...r, voltageV: r.powerW / r.currentA };
  }
  return r;
}

export function fallbackDeviceName(ip: string): string {
  return `Shelly_${ip.replace(/\./g, "-")}`;
}

/** HTTP client for Shelly smart plugs (Gen2 RPC and legacy Gen1 REST). */
export class ShellyHttpClient implements MeterClient {
  constructor(private readonly cfg: ShellyClientConfig) {}

  private headers(): Record<string, string> {
    if (!this.cfg.username) return {};
    const token = Buffer.from(`${this.cfg.username}:${this.cfg.password ?? ""}`).toString("base64");
    return { authorization: `Basic ${token}` };
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const resp = await fetchWithTimeout(url, {
      method: "GET",
      timeoutMs: this.cfg.timeoutMs,
      headers: this.headers(),
      signal
    });
    if (!resp.ok) throw new Error(`Shelly HTTP ${resp.status} ${resp.statusText} for ${url}`);
    return await resp.json();
  }

  async readGen2(ip: string, signal?: AbortSignal): Promise<MeterReading> {
    return parseGen2Status(await this.getJson(`http://${ip}/rpc/Switch.GetStatus?id=0`, signal));
  }

  async readGen1(ip: string, signal?: AbortSignal): Promise<MeterReading> {
    return parseGen1Status(await this.getJson(`http://${ip}/status`, signal));
  }

  async deviceName(ip: string, signal?: AbortSignal): Promise<string | null> {
    const info = DeviceInfoSchema.parse(await this.getJson(`http://${ip}/rpc/Shelly.GetDeviceInfo`, signal));
    const name = (info.name ?? info.id ?? "").trim();
    return name || null;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Gen2 first, legacy Gen1 second; the first protocol that answers wins. */
export async function readMeter(client: MeterClient, ip: string, signal?: AbortSignal): Promise<MeterReading> {
  let gen2Error: unknown;
  try {
    return withDerivedVoltage(await client.readGen2(ip, signal));
  } catch (err) {
    gen2Error = err;
  }
  try {
    return withDerivedVoltage(await client.readGen1(ip, signal));
  } catch (err) {
    throw new MeterUnreachableError(ip, { gen2: describe(gen2Error), gen1: describe(err) });
  }
}
