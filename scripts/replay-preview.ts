import { loadConfig } from "../src/config.js";
import { createRuntime } from "../src/runtime.js";
import { buildOverlay } from "../src/timeline/aligner.js";
import { emptySeries } from "../src/store/series.js";
import { formatWallClock } from "../src/utils/time.js";

// Usage: npm run replay:preview -- <sensor> [temperature|power] [minutes] [step]
const [sensor, kindArg = "temperature", minutesArg = "120", stepArg = "10"] = process.argv.slice(2);
if (!sensor) {
  // eslint-disable-next-line no-console
  console.error("usage: replay-preview <sensor> [temperature|power] [minutes] [step]");
  process.exit(1);
}
const kind = kindArg === "power" ? "power" : "temperature";
const horizon = Number(minutesArg);
const step = Number(stepArg);

const cfg = loadConfig();
const runtime = await createRuntime(cfg);
const history = await runtime.replay.ensureLoaded(kind, sensor);

if (!history) {
  // eslint-disable-next-line no-console
  console.log(`${sensor}: no recorded ${kind} history in ${cfg.LOGS_DIR}`);
  process.exit(0);
}

const simulated = emptySeries();
const t0 = history.timestamps[0];
for (let m = 0; m <= horizon; m += step > 0 ? step : 1) {
  const value = runtime.replay.valueAt(kind, sensor, m);
  if (value === null) continue;
  simulated.timestamps.push(t0 + m * 60_000);
  simulated.values.push(value);
}

const overlay = buildOverlay(simulated, { timestamps: history.timestamps, values: history.values });

const lines = [
  `sensor=${sensor} kind=${kind} samples=${history.times.length}`,
  `recorded ${formatWallClock(history.timestamps[0])} .. ${formatWallClock(history.timestamps[history.timestamps.length - 1])}`,
  ...overlay.simulated.timestamps.map(
    (ts, i) => `${formatWallClock(ts)}  ${overlay.simulated.values[i].toFixed(2)}`
  )
];
if (kind === "temperature") lines.push(`room_state=${runtime.replay.inferRoomState(sensor)}`);

// eslint-disable-next-line no-console
console.log(lines.join("\n"));
