import { z } from "zod";
import dotenv from "dotenv";
import { DEFAULT_DEVICE_ID_RULES, DeviceIdRule, parseDeviceIdRulesJson } from "./store/deviceId.js";
import { defaultTimezone } from "./utils/time.js";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const EnvSchema = z.object({
  LOGS_DIR: z.string().min(1).default("./logs"),
  SENSOR_MAP_PATH: z.string().min(1).default("./sensor_map.json"),
  PROFILES_PATH: z.string().min(1).default("./config/profiles.json"),
  TIMEZONE: z.string().min(1).default(defaultTimezone()),

  POWER_POLL_SECONDS: z.coerce.number().positive().default(10),
  ENV_POLL_SECONDS: z.coerce.number().positive().default(5),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

  SHELLY_USERNAME: z.string().optional(),
  SHELLY_PASSWORD: z.string().optional(),

  DHT_READER_COMMAND: z.string().optional(),
  DEVICE_ID_RULES_JSON: z.string().optional(),

  AUTOSTART_LOGGERS: booleanFlag("true"),

  PORT: z.coerce.number().int().nonnegative().default(3000)
});

export type AppConfig = Omit<z.infer<typeof EnvSchema>, "DEVICE_ID_RULES_JSON"> & {
  deviceIdRules: DeviceIdRule[];
};

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  const { DEVICE_ID_RULES_JSON, ...rest } = parsed.data;

  if (!isValidTimezone(rest.TIMEZONE)) {
    throw new Error(`TIMEZONE is not a valid IANA time zone: ${rest.TIMEZONE}`);
  }

  const rulesJson = DEVICE_ID_RULES_JSON?.trim();
  const deviceIdRules = rulesJson ? parseDeviceIdRulesJson(rulesJson) : DEFAULT_DEVICE_ID_RULES;

  return {
    ...rest,
    SHELLY_USERNAME: rest.SHELLY_USERNAME?.trim() || undefined,
    SHELLY_PASSWORD: rest.SHELLY_PASSWORD || undefined,
    DHT_READER_COMMAND: rest.DHT_READER_COMMAND?.trim() || undefined,
    deviceIdRules
  };
}
