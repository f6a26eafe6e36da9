import assert from "node:assert/strict";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { ActiveCycleRegistry } from "./activeCycles.js";
import { ConsumptionProfileEngine, MeanPowerSource, SimDevice, chooseComputerProfile } from "./consumption.js";
import { loadProfileRegistry } from "./registry.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const profilesPath = path.join(__dirname, "..", "..", "config", "profiles.json");

const T0 = Date.UTC(2024, 0, 1, 8, 0, 0);
const min = (m: number) => T0 + m * 60_000;

function engineWith(meanPower: MeanPowerSource = async () => null) {
  return new ConsumptionProfileEngine(loadProfileRegistry(profilesPath), new ActiveCycleRegistry(), meanPower);
}

const washer: SimDevice = { name: "Lavatrice", archetype: "Washing_Machine", on: false };

test("the bundled profile file loads every archetype", () => {
  const registry = loadProfileRegistry(profilesPath);
  const fridge = registry.get("Fridge");
  assert.ok(fridge);
  assert.equal(fridge.repeat, true);
  assert.equal(fridge.keys[fridge.keys.length - 1], 179);
  assert.equal(registry.get("Washing_Machine")?.values[2], 2094.3);
  assert.equal(registry.get("Computer")?.repeat, true);
  assert.equal(registry.get("Toaster"), undefined);
  assert.deepEqual(
    registry.computerProfiles().map((p) => p.name),
    ["PC_low", "PC_medium", "PC_high"]
  );
  assert.equal(registry.meterIdFor("PC"), "sm_pc");
  assert.equal(registry.meterIdFor("Lamp"), "Lamp");
});

test("off devices and unknown archetypes draw nothing", () => {
  const engine = engineWith();
  assert.equal(engine.deviceConsumption(washer, T0), 0);
  assert.equal(engine.deviceConsumption({ name: "Toaster", archetype: "Toaster", on: true }, T0), 0);
});

test("an on device without a cycle draws the first curve value", () => {
  const engine = engineWith();
  assert.equal(engine.deviceConsumption({ ...washer, on: true }, T0), 3.0);
});

test("switching on opens a cycle that follows the curve", () => {
  const engine = engineWith();
  const on = engine.switchDevice(washer, true, T0);
  assert.equal(on.on, true);
  assert.equal(engine.cycles.get("Lavatrice")?.cycleType, "Washing_Machine");
  assert.equal(engine.deviceConsumption(on, min(12.5)), 3.0);
  assert.equal(engine.deviceConsumption(on, min(13)), 687.6);
  assert.equal(engine.deviceConsumption(on, min(26)), 2094.3);

  const off = engine.switchDevice(on, false, min(30));
  assert.equal(off.on, false);
  assert.equal(engine.cycles.get("Lavatrice"), undefined);
});

test("a one-shot cycle terminates exactly once", () => {
  const engine = engineWith();
  const on = engine.switchDevice(washer, true, T0);

  const atEnd = engine.tick(on, min(91));
  assert.deepEqual(atEnd, { device: on, watts: 255.0, cycleEnded: false });

  const past = engine.tick(on, min(92));
  assert.equal(past.cycleEnded, true);
  assert.equal(past.watts, 0);
  assert.equal(past.device.on, false);
  assert.equal(engine.cycles.get("Lavatrice"), undefined);

  const after = engine.tick(past.device, min(93));
  assert.deepEqual(after, { device: past.device, watts: 0, cycleEnded: false });
});

test("repeating profiles wrap and never terminate", () => {
  const engine = engineWith();
  const fridge = engine.switchDevice({ name: "Frigo", archetype: "Fridge", on: false }, true, T0);

  assert.equal(engine.deviceConsumption(fridge, min(179 + 16)), 70.6);
  const late = engine.tick(fridge, min(1000));
  assert.equal(late.cycleEnded, false);
  assert.equal(late.device.on, true);
});

test("computers pick the sub-profile nearest to their measured mean", async () => {
  const asked: string[] = [];
  const engine = engineWith(async (id) => {
    asked.push(id);
    return 42;
  });
  const pc: SimDevice = { name: "pc", archetype: "Computer", on: false };

  await engine.prepareDevice(pc);
  await engine.prepareDevice(pc);
  assert.deepEqual(asked, ["sm_pc"]);

  const on = engine.switchDevice(pc, true, T0);
  assert.equal(engine.profileFor("pc", "Computer")?.name, "PC_low");
  assert.equal(engine.deviceConsumption(on, T0), 30.0);
});

test("a medium draw picks PC_medium", async () => {
  const engine = engineWith(async () => 65);
  await engine.prepareDevice({ name: "Workstation", archetype: "Computer", on: false });
  assert.equal(engine.profileFor("Workstation", "Computer")?.name, "PC_medium");
});

test("computers without history use the generic profile and remember the miss", async () => {
  let calls = 0;
  const engine = engineWith(async () => {
    calls++;
    return null;
  });
  const pc: SimDevice = { name: "Office PC", archetype: "Computer", on: true };

  await engine.prepareDevice(pc);
  await engine.prepareDevice(pc);
  assert.equal(calls, 1);
  assert.equal(engine.profileFor("Office PC", "Computer")?.name, "Computer");
  assert.equal(engine.deviceConsumption(pc, T0), 90.4);
});

test("ties between sub-profiles go to the first one", () => {
  const registry = loadProfileRegistry(profilesPath);
  assert.equal(chooseComputerProfile(registry.computerProfiles(), 55)?.name, "PC_low");
  assert.equal(chooseComputerProfile(registry.computerProfiles(), null), null);
});

test("prediction samples the horizon without touching cycles", () => {
  const engine = engineWith();
  const on = engine.switchDevice(washer, true, T0);

  const samples = engine.predictDeviceConsumption(on, min(12));
  assert.deepEqual(
    samples.map((s) => s.watts),
    [3.0, 687.6, 687.6, 687.6, 687.6, 687.6]
  );
  assert.deepEqual(
    samples.map((s) => s.timestamp),
    [12, 13, 14, 15, 16, 17].map(min)
  );
  assert.equal(engine.cycles.list().length, 1);

  assert.deepEqual(engine.predictDeviceConsumption(on, T0, { horizonSeconds: 0 }), []);
  assert.deepEqual(engine.predictDeviceConsumption(on, T0, { stepSeconds: -1 }), []);
  assert.equal(engine.predictDeviceConsumption(on, T0, { horizonSeconds: 30, stepSeconds: 60 }).length, 2);
});
