import assert from "node:assert/strict";
import { test } from "node:test";
import { canonId, deriveDeviceId, parseDeviceIdRulesJson, sanitizeFileComponent } from "./deviceId.js";

test("canonical ids ignore case and punctuation", () => {
  assert.equal(canonId("Smart-Meter_PC"), "smartmeterpc");
  assert.equal(canonId("smartmeter pc"), "smartmeterpc");
  assert.equal(canonId("SMARTMETERPC"), "smartmeterpc");
  assert.equal(canonId(null), "");
});

test("device ids come from the first matching rule", () => {
  assert.equal(deriveDeviceId("Office Laptop"), "PC");
  assert.equal(deriveDeviceId("Lavatrice bagno"), "WASHER");
  assert.equal(deriveDeviceId("Tumble DRYER"), "DRYER");
  assert.equal(deriveDeviceId("Forno cucina"), "OVEN");
  assert.equal(deriveDeviceId("pc near the washer"), "PC");
  assert.equal(deriveDeviceId("Kettle"), "UNKNOWN");
  assert.equal(deriveDeviceId("Kettle", [{ substring: "kettle", id: "KETTLE" }]), "KETTLE");
});

test("file name components keep only safe characters", () => {
  assert.equal(sanitizeFileComponent("Living Room/T1"), "Living-Room-T1");
  assert.equal(sanitizeFileComponent(" plug_01.a "), "plug_01.a");
  assert.equal(sanitizeFileComponent("Küche Temp°"), "Küche-Temp-");
});

test("rule overrides accept tuples and objects", () => {
  assert.deepEqual(parseDeviceIdRulesJson('[["kettle","KETTLE"],{"substring":"tv","id":"TV"}]'), [
    { substring: "kettle", id: "KETTLE" },
    { substring: "tv", id: "TV" }
  ]);
  assert.throws(() => parseDeviceIdRulesJson("not json"), /Failed to parse DEVICE_ID_RULES_JSON/);
  assert.throws(() => parseDeviceIdRulesJson("[]"), /failed validation/);
});
