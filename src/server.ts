import type { Server } from "node:http";
import express from "express";
import { z } from "zod";
import type { SimulationRuntime } from "./runtime.js";
import { logger } from "./utils/logger.js";

const ReplayQuerySchema = z.object({
  minutes: z.coerce.number().finite(),
  kind: z.enum(["temperature", "power"]).default("temperature")
});

export function buildApp(runtime: SimulationRuntime) {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({
      ok: true,
      power_loggers: runtime.powerLoggers.list().length,
      environment_loggers: runtime.envLoggers.list().length,
      active_cycles: runtime.cycles.list().length,
      bindings: runtime.getBindings().size
    });
  });

  app.get("/loggers", (_req, res) => {
    res.json({ loggers: runtime.loggerSummaries() });
  });

  app.get("/sensors/:name/replay", (req, res, next) => {
    const query = ReplayQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ ok: false, error: "minutes must be a number", issues: query.error.issues });
      return;
    }
    const { minutes, kind } = query.data;
    const sensor = req.params.name;

    runtime.replay
      .ensureLoaded(kind, sensor)
      .then((history) => {
        if (!history && !runtime.getBindings().has(sensor)) {
          res.status(404).json({ ok: false, error: `No binding or recorded history for sensor ${sensor}` });
          return;
        }
        const value = runtime.replay.valueAt(kind, sensor, minutes);
        res.json({
          sensor,
          kind,
          minutes,
          value,
          real: runtime.replay.isRealSensor(kind, sensor),
          last_real_value: runtime.replay.lastRealValue(kind, sensor),
          room_state: kind === "temperature" ? runtime.replay.inferRoomState(sensor) : null
        });
      })
      .catch(next);
  });

  return app;
}

export function startServer(params: { port: number; runtime: SimulationRuntime }): Server {
  const app = buildApp(params.runtime);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
