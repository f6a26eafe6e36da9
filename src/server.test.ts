import assert from "node:assert/strict";
import fs from "node:fs/promises";
import { once } from "node:events";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { z } from "zod";
import { MeterClient, MeterReading } from "./adapters/meters/shellyClient.js";
import { UnavailableDhtReader } from "./adapters/sensors/dhtReader.js";
import { loadProfileRegistry } from "./profiles/registry.js";
import { SimulationRuntime } from "./runtime.js";
import type { SensorBinding } from "./sensorMap.js";
import { TimeSeriesStore } from "./store/logStore.js";
import { buildApp } from "./server.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const profilesPath = path.join(__dirname, "..", "config", "profiles.json");
const NOW = Date.UTC(2024, 0, 1, 12, 0);

class QuietMeter implements MeterClient {
  constructor(private readonly name: string | null | Error = null) {}

  async readGen2(): Promise<MeterReading> {
    return { protocol: "gen2", powerW: 1, voltageV: 230, currentA: 0.01 };
  }

  async readGen1(): Promise<MeterReading> {
    throw new Error("unused");
  }

  async deviceName(): Promise<string | null> {
    if (this.name instanceof Error) throw this.name;
    return this.name;
  }
}

async function makeRuntime(opts: { bindings?: SensorBinding[]; meter?: MeterClient } = {}) {
  const store = new TimeSeriesStore(await fs.mkdtemp(path.join(os.tmpdir(), "server-")));
  return new SimulationRuntime({
    store,
    profiles: loadProfileRegistry(profilesPath),
    meterClient: opts.meter ?? new QuietMeter(),
    dhtReader: new UnavailableDhtReader(),
    clock: () => NOW,
    bindings: new Map((opts.bindings ?? []).map((b): [string, SensorBinding] => [b.sensorName, b])),
    settings: { powerPollSeconds: 3600, envPollSeconds: 3600, stopTimeoutMs: 1000 }
  });
}

async function listen(runtime: SimulationRuntime): Promise<{ server: Server; base: string }> {
  const server = buildApp(runtime).listen(0, "127.0.0.1");
  await once(server, "listening");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no TCP address");
  return { server, base: `http://127.0.0.1:${addr.port}` };
}

const LoggerListSchema = z.object({
  loggers: z.array(
    z.object({
      kind: z.string(),
      entity: z.string(),
      target: z.unknown(),
      state: z.string(),
      interval_s: z.number()
    })
  )
});

async function close(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

test("healthz reports registry sizes", async () => {
  const runtime = await makeRuntime();
  const { server, base } = await listen(runtime);
  try {
    const body = await (await fetch(`${base}/healthz`)).json();
    assert.deepEqual(body, { ok: true, power_loggers: 0, environment_loggers: 0, active_cycles: 0, bindings: 0 });
  } finally {
    await close(server);
  }
});

test("replay endpoint serves recorded temperature", async () => {
  const runtime = await makeRuntime({ bindings: [{ sensorName: "Meter B", kind: "ip", ip: "10.0.0.8" }] });
  const file = runtime.store.envLogPath("Kitchen");
  await runtime.store.ensureEnvLog(file);
  for (const [m, t] of [
    [0, 20],
    [1, 22],
    [2, 24]
  ]) {
    await runtime.store.appendEnvSample(file, { timestamp: NOW + m * 60_000, label: "Kitchen", gpio: 4, temperatureC: t, humidityPct: 50 });
  }

  const { server, base } = await listen(runtime);
  try {
    const ok = await fetch(`${base}/sensors/Kitchen/replay?minutes=0.5`);
    assert.equal(ok.status, 200);
    assert.deepEqual(await ok.json(), {
      sensor: "Kitchen",
      kind: "temperature",
      minutes: 0.5,
      value: 21,
      real: true,
      last_real_value: 24,
      room_state: "heating"
    });

    const unknown = await fetch(`${base}/sensors/Nowhere/replay?minutes=3&kind=power`);
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), { ok: false, error: "No binding or recorded history for sensor Nowhere" });
    assert.equal(runtime.replay.isRealSensor("power", "Nowhere"), false);

    const none = await (await fetch(`${base}/sensors/Meter%20B/replay?minutes=3&kind=power`)).json();
    assert.deepEqual(none, {
      sensor: "Meter B",
      kind: "power",
      minutes: 3,
      value: null,
      real: false,
      last_real_value: null,
      room_state: null
    });

    const bad = await fetch(`${base}/sensors/Kitchen/replay?minutes=abc`);
    assert.equal(bad.status, 400);
  } finally {
    await close(server);
  }
});

test("loggers endpoint lists running loggers", async () => {
  const runtime = await makeRuntime();
  const env = runtime.startEnvLogger("Hall", 4);
  assert.ok(env);
  const { server, base } = await listen(runtime);
  try {
    const body = LoggerListSchema.parse(await (await fetch(`${base}/loggers`)).json());
    assert.equal(body.loggers.length, 1);
    assert.equal(body.loggers[0].kind, "environment");
    assert.equal(body.loggers[0].entity, "Hall");
    assert.deepEqual(body.loggers[0].target, { gpio: 4 });
    assert.equal(body.loggers[0].state, "running");
    assert.equal(body.loggers[0].interval_s, 3600);
  } finally {
    await close(server);
    await runtime.stopAll();
  }
});

test("autostart starts loggers for gpio and ip bindings only", async () => {
  const runtime = await makeRuntime({
    bindings: [
      { sensorName: "Plug", kind: "ip", ip: "10.0.0.5" },
      { sensorName: "Probe", kind: "gpio", gpio: 4 },
      { sensorName: "Bad", kind: "gpio", gpio: 40 },
      { sensorName: "Desk", kind: "label", label: "Kitchen" }
    ]
  });
  try {
    assert.deepEqual(await runtime.autostart(), { power: ["Plug"], environment: ["Probe"] });
    assert.equal(runtime.powerLoggers.get("Plug")?.deviceId, "Plug");
    assert.equal(runtime.envLoggers.get("Bad"), undefined);

    const again = await runtime.autostart();
    assert.deepEqual(again, { power: ["Plug"], environment: ["Probe"] });
    assert.equal(runtime.powerLoggers.list().length, 1);
  } finally {
    await runtime.stopAll();
  }
});

test("power loggers without a name ask the plug, then fall back to its ip", async () => {
  const named = await makeRuntime({ meter: new QuietMeter("Kitchen Plug") });
  const unnamed = await makeRuntime({ meter: new QuietMeter(new Error("timeout")) });
  try {
    assert.equal((await named.startPowerLogger("10.0.0.6"))?.entityName, "Kitchen Plug");
    assert.equal((await unnamed.startPowerLogger("10.0.0.7"))?.entityName, "Shelly_10-0-0-7");
  } finally {
    await named.stopAll();
    await unnamed.stopAll();
  }
});
