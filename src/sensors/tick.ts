import type { ConsumptionProfileEngine, SimDevice } from "../profiles/consumption.js";
import { temperatureFallbackStep } from "../replay/prediction.js";
import type { ReplayPredictionEngine } from "../replay/replayEngine.js";
import { WallClockMs } from "../utils/time.js";
import { PirSensor, Sensor, SmartMeterSensor, SwitchSensor, TemperatureSensor, WeightSensor } from "./types.js";

const round2 = (v: number) => Math.round(v * 100) / 100;

export interface TemperatureTick {
  deltaMinutes: number;
  heatingFactor: number;
}

/**
 * Advances a temperature sensor. Recorded history is replayed as-is (rounded,
 * not clamped); without history the sensor drifts with the heating factor.
 */
export function updateTemperature(
  sensor: TemperatureSensor,
  tick: TemperatureTick,
  replay: ReplayPredictionEngine
): TemperatureSensor {
  const simulatedMinutes = sensor.simulatedMinutes + tick.deltaMinutes;

  if (replay.isRealSensor("temperature", sensor.name)) {
    const replayed = replay.valueAt("temperature", sensor.name, simulatedMinutes);
    return { ...sensor, simulatedMinutes, state: round2(replayed ?? sensor.state) };
  }

  return {
    ...sensor,
    simulatedMinutes,
    state: temperatureFallbackStep(sensor.state, sensor, tick.deltaMinutes, tick.heatingFactor)
  };
}

export interface SmartMeterTick {
  deltaMinutes: number;
  now: WallClockMs;
  devices: ReadonlyMap<string, SimDevice>;
}

/** Recorded meter history when there is one, else the associated device's profile draw. */
export function updateSmartMeter(
  sensor: SmartMeterSensor,
  tick: SmartMeterTick,
  replay: ReplayPredictionEngine,
  consumption: ConsumptionProfileEngine
): SmartMeterSensor {
  const simulatedMinutes = sensor.simulatedMinutes + tick.deltaMinutes;

  if (replay.isRealSensor("power", sensor.name)) {
    const replayed = replay.valueAt("power", sensor.name, simulatedMinutes);
    return { ...sensor, simulatedMinutes, consumption: round2(replayed ?? 0) };
  }

  const device = sensor.device ? tick.devices.get(sensor.device) : undefined;
  const watts = device ? consumption.deviceConsumption(device, tick.now) : 0;
  return { ...sensor, simulatedMinutes, consumption: watts };
}

/** Only one PIR is active at a time: activating one clears the others. */
export function togglePir(sensors: readonly Sensor[], name: string, state?: 0 | 1): Sensor[] {
  const target = sensors.find((s): s is PirSensor => s.kind === "pir" && s.name === name);
  if (!target) return [...sensors];
  const next: 0 | 1 = state ?? (target.state === 0 ? 1 : 0);

  return sensors.map((s): Sensor => {
    if (s.kind !== "pir") return s;
    if (s.name === name) return { ...s, state: next };
    return s.state === 0 ? s : { ...s, state: 0 };
  });
}

export function setSwitch(sensor: SwitchSensor, state: 0 | 1): SwitchSensor {
  return { ...sensor, state };
}

export function setWeight(sensor: WeightSensor, state: number): WeightSensor {
  return { ...sensor, state };
}
