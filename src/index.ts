import { loadConfig } from "./config.js";
import { createRuntime } from "./runtime.js";
import { startServer } from "./server.js";
import { logger } from "./utils/logger.js";

const cfg = loadConfig();
const runtime = await createRuntime(cfg);

const server = startServer({ port: cfg.PORT, runtime });

logger.info(
  {
    logs_dir: cfg.LOGS_DIR,
    timezone: cfg.TIMEZONE,
    bindings: runtime.getBindings().size,
    autostart: cfg.AUTOSTART_LOGGERS
  },
  "Starting building telemetry simulation core"
);

if (cfg.AUTOSTART_LOGGERS) {
  await runtime.autostart();
}

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");
  try {
    await runtime.stopAll();
  } catch (e) {
    logger.error({ err: e }, "Failed to stop loggers cleanly");
  }
  server.close(() => process.exit(0));
}

process.on("SIGINT", (s) => void shutdown(s));
process.on("SIGTERM", (s) => void shutdown(s));
