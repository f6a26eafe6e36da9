import fs from "node:fs/promises";
import path from "node:path";
import { KeyedMutex } from "./pathLock.js";

export type CsvCell = string | number | null | undefined;

export interface LogSchema<Column extends string = string> {
  name: string;
  columns: readonly Column[];
}

export type CsvRecord = Record<string, string>;

const writeLocks = new KeyedMutex();

export function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function formatCell(cell: CsvCell): string {
  if (cell === null || cell === undefined) return "";
  const text = String(cell).replace(/[\r\n]+/g, " ");
  return /[",]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvLine(cells: readonly CsvCell[]): string {
  return `${cells.map(formatCell).join(",")}\n`;
}

/** Splits one CSV line, honouring double-quoted cells with `""` escapes. */
export function parseCsvLine(line: string): string[] {
  const out: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(cell);
      cell = "";
    } else {
      cell += ch;
    }
  }
  out.push(cell);
  return out;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (hasCode(err, "ENOENT")) return false;
    throw err;
  }
}

/** Creates the file with its header row when absent. Never touches existing data. */
export async function ensureLog(filePath: string, schema: LogSchema): Promise<void> {
  await writeLocks.runExclusive(filePath, async () => {
    if (await exists(filePath)) return;
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // "wx" fails if another process created it in the meantime; that file already has a header.
    await fs.writeFile(filePath, formatCsvLine(schema.columns), { encoding: "utf-8", flag: "wx" }).catch((err: unknown) => {
      if (!hasCode(err, "EEXIST")) throw err;
    });
  });
}

/** Appends one row in a single write, serialized per path. */
export async function appendRow(filePath: string, cells: readonly CsvCell[]): Promise<void> {
  const line = formatCsvLine(cells);
  await writeLocks.runExclusive(filePath, () => fs.appendFile(filePath, line, "utf-8"));
}

export interface ParsedLog {
  rows: CsvRecord[];
  malformed: number;
}

/**
 * Reads a log by its header row. Rows whose cell count differs from the header
 * are counted as malformed and left out. A missing file reads as empty.
 */
export async function readLog(filePath: string): Promise<ParsedLog> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (hasCode(err, "ENOENT")) return { rows: [], malformed: 0 };
    throw err;
  }

  const lines = raw.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) return { rows: [], malformed: 0 };

  const header = parseCsvLine(lines[0]).map((h) => h.trim());
  const rows: CsvRecord[] = [];
  let malformed = 0;

  for (const line of lines.slice(1)) {
    const cells = parseCsvLine(line);
    if (cells.length !== header.length) {
      malformed++;
      continue;
    }
    const record: CsvRecord = {};
    header.forEach((col, idx) => {
      record[col] = cells[idx];
    });
    rows.push(record);
  }

  return { rows, malformed };
}

/** Lists `<dir>/<prefix>*<suffix>`; a missing directory lists nothing. */
export async function listLogs(dir: string, prefix: string, suffix = ".csv"): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (hasCode(err, "ENOENT")) return [];
    throw err;
  }
  return names
    .filter((n) => n.startsWith(prefix) && n.endsWith(suffix))
    .sort()
    .map((n) => path.join(dir, n));
}
