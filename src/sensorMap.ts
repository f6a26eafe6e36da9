import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { hasCode } from "./store/csvLog.js";
import { logger } from "./utils/logger.js";

const log = logger.child({ component: "sensor-map" });

/** How a simulated sensor is tied to a real data source. */
export type SensorBinding =
  | { sensorName: string; kind: "gpio"; gpio: number }
  | { sensorName: string; kind: "ip"; ip: string }
  | { sensorName: string; kind: "label"; label: string };

export type SensorBindings = ReadonlyMap<string, SensorBinding>;

const BindingSchema = z.discriminatedUnion("by", [
  z.object({
    by: z.literal("dht"),
    gpio: z.union([z.number().int(), z.string().trim().regex(/^-?\d+$/).transform(Number)])
  }),
  z.object({ by: z.literal("ip"), value: z.string().trim().min(1) }),
  z.object({ by: z.literal("label"), value: z.string().trim().min(1) })
]);

const SensorMapSchema = z.record(z.string(), z.unknown());

/** Entries that do not validate are skipped one by one; the rest still bind. */
export function parseSensorMap(raw: unknown): Map<string, SensorBinding> {
  const out = new Map<string, SensorBinding>();
  const top = SensorMapSchema.safeParse(raw);
  if (!top.success) {
    log.warn({ issues: top.error.issues }, "Sensor map is not a JSON object; ignoring it");
    return out;
  }

  for (const [sensorName, entry] of Object.entries(top.data)) {
    const parsed = BindingSchema.safeParse(entry);
    if (!parsed.success) {
      log.warn({ sensor: sensorName, issues: parsed.error.issues }, "Skipping invalid sensor binding");
      continue;
    }
    const b = parsed.data;
    switch (b.by) {
      case "dht":
        out.set(sensorName, { sensorName, kind: "gpio", gpio: b.gpio });
        break;
      case "ip":
        out.set(sensorName, { sensorName, kind: "ip", ip: b.value });
        break;
      case "label":
        out.set(sensorName, { sensorName, kind: "label", label: b.value });
        break;
    }
  }
  return out;
}

/** The map belongs to the UI; a missing or broken file means no bindings. */
export async function loadSensorMap(sensorMapPath: string): Promise<Map<string, SensorBinding>> {
  const resolvedPath = path.resolve(sensorMapPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (err) {
    if (hasCode(err, "ENOENT")) {
      log.info({ path: resolvedPath }, "No sensor map; starting without bindings");
    } else {
      log.warn({ err, path: resolvedPath }, "Cannot read sensor map; starting without bindings");
    }
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn({ err, path: resolvedPath }, "Sensor map JSON parse error; starting without bindings");
    return new Map();
  }
  return parseSensorMap(parsed);
}
