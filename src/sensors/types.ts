export type SensorKind = "pir" | "temperature" | "switch" | "smart_meter" | "weight";

export interface SensorRange {
  min: number;
  max: number;
  step: number;
}

interface SensorBase extends SensorRange {
  name: string;
}

export interface PirSensor extends SensorBase {
  kind: "pir";
  /** Facing, in degrees. */
  direction: number;
  state: 0 | 1;
}

export interface TemperatureSensor extends SensorBase {
  kind: "temperature";
  state: number;
  /** Simulated minutes elapsed since the sensor was placed. */
  simulatedMinutes: number;
}

export interface SwitchSensor extends SensorBase {
  kind: "switch";
  state: 0 | 1;
}

export interface SmartMeterSensor extends SensorBase {
  kind: "smart_meter";
  device: string | null;
  consumption: number;
  simulatedMinutes: number;
}

export interface WeightSensor extends SensorBase {
  kind: "weight";
  state: number;
}

export type Sensor = PirSensor | TemperatureSensor | SwitchSensor | SmartMeterSensor | WeightSensor;

export const SENSOR_DEFAULTS: Record<SensorKind, SensorRange & { state: number }> = {
  pir: { min: 0, max: 1, step: 1, state: 0 },
  temperature: { min: 18, max: 35, step: 0.5, state: 18 },
  switch: { min: 0, max: 1, step: 1, state: 0 },
  smart_meter: { min: 0, max: 5000, step: 10, state: 0 },
  weight: { min: 0, max: 1, step: 1, state: 0 }
};

export function newPirSensor(name: string, direction = 0): PirSensor {
  const { min, max, step } = SENSOR_DEFAULTS.pir;
  return { kind: "pir", name, min, max, step, direction, state: 0 };
}

export function newTemperatureSensor(name: string, range: Partial<SensorRange> = {}, state?: number): TemperatureSensor {
  const d = SENSOR_DEFAULTS.temperature;
  return {
    kind: "temperature",
    name,
    min: range.min ?? d.min,
    max: range.max ?? d.max,
    step: range.step ?? d.step,
    state: state ?? d.state,
    simulatedMinutes: 0
  };
}

export function newSwitchSensor(name: string): SwitchSensor {
  const { min, max, step } = SENSOR_DEFAULTS.switch;
  return { kind: "switch", name, min, max, step, state: 0 };
}

export function newSmartMeterSensor(name: string, device: string | null = null): SmartMeterSensor {
  const { min, max, step } = SENSOR_DEFAULTS.smart_meter;
  return { kind: "smart_meter", name, min, max, step, device, consumption: 0, simulatedMinutes: 0 };
}

export function newWeightSensor(name: string): WeightSensor {
  const { min, max, step, state } = SENSOR_DEFAULTS.weight;
  return { kind: "weight", name, min, max, step, state };
}
