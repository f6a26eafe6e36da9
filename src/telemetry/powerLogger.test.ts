import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import {
  MeterClient,
  MeterReading,
  MeterUnreachableError,
  fallbackDeviceName,
  parseGen1Status,
  parseGen2Status,
  readMeter,
  withDerivedVoltage
} from "../adapters/meters/shellyClient.js";
import { readLog } from "../store/csvLog.js";
import { TimeSeriesStore } from "../store/logStore.js";
import { PowerLogger } from "./powerLogger.js";

const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

class FakeMeter implements MeterClient {
  gen2Calls = 0;
  gen1Calls = 0;

  constructor(
    private readonly gen2: () => MeterReading,
    private readonly gen1: () => MeterReading
  ) {}

  async readGen2(): Promise<MeterReading> {
    this.gen2Calls++;
    return this.gen2();
  }

  async readGen1(): Promise<MeterReading> {
    this.gen1Calls++;
    return this.gen1();
  }

  async deviceName(): Promise<string | null> {
    return null;
  }
}

const refuse = (): MeterReading => {
  throw new Error("connect ECONNREFUSED");
};

test("Gen2 status uses apower and reports its own voltage", () => {
  assert.deepEqual(parseGen2Status({ id: 0, voltage: 230.1, apower: 55.5, current: 0.25 }), {
    protocol: "gen2",
    voltageV: 230.1,
    powerW: 55.5,
    currentA: 0.25
  });
});

test("Gen1 status reads the first meter and falls back to top-level fields", () => {
  assert.deepEqual(parseGen1Status({ meters: [{ power: 40 }], current: 0.2 }), {
    protocol: "gen1",
    voltageV: null,
    powerW: 40,
    currentA: 0.2
  });
  assert.equal(parseGen1Status({ emeter: [{ power: "12.5", voltage: 229 }] }).voltageV, 229);
});

test("voltage is derived from power and current only above 1 mA", () => {
  const base: MeterReading = { protocol: "gen2", powerW: 115, currentA: 0.5, voltageV: null };
  assert.equal(withDerivedVoltage(base).voltageV, 230);
  assert.equal(withDerivedVoltage({ ...base, currentA: 0.0005 }).voltageV, null);
  assert.equal(withDerivedVoltage({ ...base, voltageV: 231 }).voltageV, 231);
});

test("Gen1 is tried only after Gen2 fails", async () => {
  const meter = new FakeMeter(refuse, () => ({ protocol: "gen1", powerW: 10, voltageV: 230, currentA: 0.05 }));
  const reading = await readMeter(meter, "10.0.0.2");
  assert.equal(reading.protocol, "gen1");
  assert.equal(meter.gen2Calls, 1);
  assert.equal(meter.gen1Calls, 1);
});

test("fallback names replace dots with dashes", () => {
  assert.equal(fallbackDeviceName("192.168.1.50"), "Shelly_192-168-1-50");
});

test("an unreachable meter writes no rows until it answers", async () => {
  const store = new TimeSeriesStore(await fs.mkdtemp(path.join(os.tmpdir(), "power-")));
  let healthy = false;
  const meter = new FakeMeter(
    () => (healthy ? { protocol: "gen2", powerW: 80, voltageV: 230, currentA: null } : refuse()),
    refuse
  );
  const logger = new PowerLogger("Shelly Office PC", { ip: "192.168.1.50" }, 60, {
    store,
    client: meter,
    clock: () => NOW
  });
  await store.ensurePowerLog(logger.destination);

  for (let i = 0; i < 3; i++) {
    await assert.rejects(logger.pollOnce(), MeterUnreachableError);
  }
  assert.equal((await readLog(logger.destination)).rows.length, 0);

  healthy = true;
  await logger.pollOnce();

  const { rows } = await readLog(logger.destination);
  assert.equal(path.basename(logger.destination), "smartmeter_Shelly-Office-PC.csv");
  assert.deepEqual(rows, [
    {
      timestamp_iso: "2024-06-01 12:00:00.000",
      device: "Shelly Office PC",
      device_id: "PC",
      ip: "192.168.1.50",
      power_W: "80",
      voltage_V: "230",
      current_A: ""
    }
  ]);
});

test("the running loop writes its header and a row, then stops promptly", async () => {
  const store = new TimeSeriesStore(await fs.mkdtemp(path.join(os.tmpdir(), "power-")));
  let signalled: () => void = () => {};
  const firstRead = new Promise<void>((resolve) => {
    signalled = resolve;
  });
  const meter = new FakeMeter(() => {
    signalled();
    return { protocol: "gen2", powerW: 5, voltageV: 230, currentA: 0.02 };
  }, refuse);

  const logger = new PowerLogger("Lamp", { ip: "10.0.0.3", deviceId: "LAMP" }, 3600, {
    store,
    client: meter,
    clock: () => NOW
  });
  logger.start();
  await firstRead;
  assert.equal(await logger.stop(1000), true);

  const { rows } = await readLog(logger.destination);
  assert.equal(rows.length, 1);
  assert.equal(rows[0].device_id, "LAMP");
  assert.equal(logger.stats.failures, 0);
});

test("the loop keeps polling through three unreachable intervals and logs the fourth", async () => {
  const store = new TimeSeriesStore(await fs.mkdtemp(path.join(os.tmpdir(), "power-")));
  let gen2Calls = 0;
  let reachedFifth: () => void = () => {};
  const fifthPoll = new Promise<void>((resolve) => {
    reachedFifth = resolve;
  });

  const meter: MeterClient = {
    async readGen2(_ip, signal) {
      gen2Calls++;
      if (gen2Calls <= 3) throw new Error("connect ETIMEDOUT");
      if (gen2Calls === 4) return { protocol: "gen2", powerW: 42, voltageV: 230, currentA: null };
      reachedFifth();
      await new Promise<void>((resolve) => {
        if (!signal || signal.aborted) resolve();
        else signal.addEventListener("abort", () => resolve(), { once: true });
      });
      throw new Error("aborted");
    },
    async readGen1() {
      throw new Error("connect ETIMEDOUT");
    },
    async deviceName() {
      return null;
    }
  };

  const logger = new PowerLogger("Fridge", { ip: "10.0.0.9", deviceId: "FRIDGE" }, 0.02, {
    store,
    client: meter,
    clock: () => NOW
  });
  logger.start();
  await fifthPoll;
  assert.equal(await logger.stop(1000), true);

  assert.equal(logger.state, "stopped");
  assert.equal(logger.stats.failures, 3);
  const { rows, malformed } = await readLog(logger.destination);
  assert.equal(malformed, 0);
  assert.deepEqual(rows, [
    {
      timestamp_iso: "2024-06-01 12:00:00.000",
      device: "Fridge",
      device_id: "FRIDGE",
      ip: "10.0.0.9",
      power_W: "42",
      voltage_V: "230",
      current_A: ""
    }
  ]);
});
