import { z } from "zod";

export type DeviceIdRule = { substring: string; id: string };

export const UNKNOWN_DEVICE_ID = "UNKNOWN";

export const DEFAULT_DEVICE_ID_RULES: DeviceIdRule[] = [
  { substring: "pc", id: "PC" },
  { substring: "laptop", id: "PC" },
  { substring: "notebook", id: "PC" },
  { substring: "wash", id: "WASHER" },
  { substring: "lavatrice", id: "WASHER" },
  { substring: "dryer", id: "DRYER" },
  { substring: "forno", id: "OVEN" },
  { substring: "oven", id: "OVEN" }
];

/** Lower-cases and drops everything that is not a letter or digit. */
export function canonId(raw: string | null | undefined): string {
  return (raw ?? "").toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

/** Keeps letters and digits in any script plus `-._`; anything else becomes `-`. Used for log file names. */
export function sanitizeFileComponent(name: string): string {
  return name.trim().replace(/[^\p{L}\p{N}\-._]/gu, "-");
}

export function deriveDeviceId(
  deviceName: string,
  rules: DeviceIdRule[] = DEFAULT_DEVICE_ID_RULES,
  fallback: string = UNKNOWN_DEVICE_ID
): string {
  const low = deviceName.toLowerCase();
  const hit = rules.find((r) => low.includes(r.substring.toLowerCase()));
  return hit ? hit.id : fallback;
}

const RuleTupleSchema = z.tuple([z.string().min(1), z.string().min(1)]);
const RuleObjectSchema = z.object({ substring: z.string().min(1), id: z.string().min(1) });
const RulesSchema = z.array(z.union([RuleTupleSchema, RuleObjectSchema])).min(1);

/** Accepts `[["pc","PC"], ...]` or `[{"substring":"pc","id":"PC"}, ...]`. */
export function parseDeviceIdRulesJson(raw: string): DeviceIdRule[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Failed to parse DEVICE_ID_RULES_JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const result = RulesSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`DEVICE_ID_RULES_JSON failed validation: ${result.error.message}`);
  }
  return result.data.map((r) => (Array.isArray(r) ? { substring: r[0], id: r[1] } : r));
}
