import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { canonId } from "../store/deviceId.js";

export const ARCHETYPES = ["Fridge", "Washing_Machine", "Oven", "Computer", "Dishwasher", "Coffee_Machine"] as const;
export type Archetype = (typeof ARCHETYPES)[number];

export function isArchetype(value: string): value is Archetype {
  return (ARCHETYPES as readonly string[]).includes(value);
}

/** Curve keys are ascending minute offsets; `values[i]` is the draw from `keys[i]` on. */
export interface DeviceProfile {
  name: string;
  standbyW: number;
  keys: number[];
  values: number[];
  repeat: boolean;
}

export interface ComputerProfile extends DeviceProfile {
  targetMeanW: number;
}

const CurveSchema = z
  .record(z.string().regex(/^\d+(\.\d+)?$/, "curve keys are non-negative minute offsets"), z.number().finite())
  .refine((c) => Object.keys(c).length > 0, "curve needs at least one point");

const ArchetypeSchema = z.object({
  standby: z.number().finite().nonnegative(),
  repeat: z.boolean().default(false),
  curve: CurveSchema
});

const ComputerSchema = z.object({
  standby: z.number().finite().nonnegative(),
  targetMean: z.number().finite().nonnegative().optional(),
  curve: CurveSchema
});

const ProfilesFileSchema = z.object({
  archetypes: z.record(z.enum(ARCHETYPES), ArchetypeSchema),
  computerProfiles: z.record(z.string().min(1), ComputerSchema).default({}),
  meterAliases: z.record(z.string(), z.string().min(1)).default({})
});

export type ProfilesFile = z.input<typeof ProfilesFileSchema>;

function toCurve(curve: Record<string, number>): { keys: number[]; values: number[] } {
  const points = Object.entries(curve)
    .map(([k, v]) => [Number(k), v] as const)
    .sort((a, b) => a[0] - b[0]);
  return { keys: points.map((p) => p[0]), values: points.map((p) => p[1]) };
}

/**
 * Archetype → power curve lookup, plus the Computer sub-profiles that are
 * matched against a device's measured mean draw.
 */
export class ProfileRegistry {
  private readonly profiles = new Map<Archetype, DeviceProfile>();
  private readonly computers: ComputerProfile[] = [];
  private readonly aliases = new Map<string, string>();

  constructor(file: ProfilesFile) {
    const parsed = ProfilesFileSchema.parse(file);

    for (const archetype of ARCHETYPES) {
      const def = parsed.archetypes[archetype];
      if (!def) continue;
      this.profiles.set(archetype, { name: archetype, standbyW: def.standby, repeat: def.repeat, ...toCurve(def.curve) });
    }

    const computerRepeat = this.profiles.get("Computer")?.repeat ?? false;
    for (const [name, def] of Object.entries(parsed.computerProfiles)) {
      this.computers.push({
        name,
        standbyW: def.standby,
        targetMeanW: def.targetMean ?? def.standby,
        repeat: computerRepeat,
        ...toCurve(def.curve)
      });
    }

    for (const [simName, meterId] of Object.entries(parsed.meterAliases)) {
      this.aliases.set(canonId(simName), meterId);
    }
  }

  get(archetype: string): DeviceProfile | undefined {
    return isArchetype(archetype) ? this.profiles.get(archetype) : undefined;
  }

  computerProfiles(): readonly ComputerProfile[] {
    return this.computers;
  }

  /** The device id to look for in power logs when measuring a simulated device. */
  meterIdFor(deviceName: string): string {
    return this.aliases.get(canonId(deviceName)) ?? deviceName;
  }
}

export function loadProfileRegistry(profilesPath: string): ProfileRegistry {
  const resolvedPath = path.resolve(profilesPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e) {
    throw new Error(`Failed to read profiles at ${resolvedPath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Profiles JSON parse error (${resolvedPath}): ${e instanceof Error ? e.message : String(e)}`);
  }

  const result = ProfilesFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Profiles validation error (${resolvedPath}): ${result.error.message}`);
  }
  return new ProfileRegistry(result.data);
}
