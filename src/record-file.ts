import fs from "fs";
import path from "path";
import { RecordFileError } from "./errors.js";
import { errorMessage, parseFid } from "./helpers.js";
import type { FollowedAccount } from "./neynar-api.js";

export interface UnfollowRecord {
  fid: number;
  username: string;
  display_name: string;
  unfollowed_at: string; // ISO 8601, taken when the row is written
}

export const RECORD_COLUMNS = ["fid", "username", "display_name", "unfollowed_at"] as const;

const RECORD_PREFIX = "unfollowed_users_";
const LINE_END = "\r\n";

/** Given an owner FID, the newest record file path, or null. */
export type RecordLocator = (ownFid: number) => string | null;

export function recordFilePath(dataDir: string, ownFid: number, timestamp: string): string {
  return path.join(dataDir, `${RECORD_PREFIX}${ownFid}_${timestamp}.csv`);
}

// --- CSV encoding ---

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatRecordRow(record: UnfollowRecord): string {
  return [
    record.fid.toString(),
    record.username,
    record.display_name,
    record.unfollowed_at,
  ].map(escapeField).join(",") + LINE_END;
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * commas, doubled quotes and line breaks; accepts LF or CRLF.
 * Returns null when a quoted field is never closed.
 */
export function parseCsv(text: string): string[][] | null {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (ch === "\r" && text[i + 1] === "\n") i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (quoted) return null;
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

// --- Writing ---

/**
 * Appends UnfollowRecords to one file. The file (and its header) is created
 * on the first append, so a run with no successes leaves nothing behind.
 * Each row is flushed to disk with fsync before `append` returns.
 */
export class RecordWriter {
  constructor(readonly filePath: string) {}

  append(account: Pick<FollowedAccount, "fid" | "username" | "display_name">, at: Date): void {
    const record: UnfollowRecord = {
      fid: account.fid,
      username: account.username,
      display_name: account.display_name,
      unfollowed_at: at.toISOString(),
    };

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const header = fs.existsSync(this.filePath) ? "" : RECORD_COLUMNS.join(",") + LINE_END;

    const fd = fs.openSync(this.filePath, "a");
    try {
      fs.writeSync(fd, header + formatRecordRow(record), null, "utf-8");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }
}

// --- Reading ---

/**
 * Load every row of a record file. All-or-nothing: a missing file, a missing
 * column or a row with a non-numeric fid throws RecordFileError.
 */
export function loadRecords(filePath: string): UnfollowRecord[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new RecordFileError(filePath, `Record file '${filePath}' not found. Run unfollow-all first.`);
    }
    throw new RecordFileError(filePath, `Could not read record file '${filePath}': ${errorMessage(e)}`);
  }

  // Strip a UTF-8 byte order mark if present.
  const rows = parseCsv(text.replace(/^\uFEFF/, ""));
  if (!rows) {
    throw new RecordFileError(filePath, `Record file '${filePath}' has an unterminated quoted field`);
  }

  const nonBlank = rows
    .map((fields, index) => ({ fields, row: index + 1 }))
    .filter(({ fields }) => !(fields.length === 1 && fields[0] === ""));
  const headerRow = nonBlank.shift();
  if (!headerRow) {
    throw new RecordFileError(filePath, `Record file '${filePath}' is empty`);
  }

  const columns = new Map(headerRow.fields.map((name, idx): [string, number] => [name.trim(), idx]));
  const indexOf = (name: string): number => {
    const idx = columns.get(name);
    if (idx === undefined) {
      throw new RecordFileError(filePath, `Record file '${filePath}' is missing the '${name}' column`);
    }
    return idx;
  };
  const fidIdx = indexOf("fid");
  const usernameIdx = indexOf("username");
  const displayNameIdx = indexOf("display_name");
  const unfollowedAtIdx = indexOf("unfollowed_at");

  return nonBlank.map(({ fields, row }) => {
    const rawFid = fields[fidIdx] ?? "";
    const fid = parseFid(rawFid);
    if (fid === null) {
      throw new RecordFileError(filePath, `Invalid fid '${rawFid}' on row ${row} of '${filePath}'`);
    }
    return {
      fid,
      username: fields[usernameIdx] ?? "",
      display_name: fields[displayNameIdx] ?? "",
      unfollowed_at: fields[unfollowedAtIdx] ?? "",
    };
  });
}

// --- Discovery ---

/**
 * The most recently modified `unfollowed_users_<fid>_*.csv` in `dataDir`,
 * or null when there is none (or the directory does not exist).
 */
export function findLatestRecordFile(dataDir: string, ownFid: number): string | null {
  let names: string[];
  try {
    names = fs.readdirSync(dataDir);
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }

  const prefix = `${RECORD_PREFIX}${ownFid}_`;
  let latest: { file: string; mtimeMs: number } | null = null;
  for (const name of names) {
    if (!name.startsWith(prefix) || !name.endsWith(".csv")) continue;
    const file = path.join(dataDir, name);
    const stat = fs.statSync(file);
    if (!stat.isFile()) continue;
    if (!latest || stat.mtimeMs > latest.mtimeMs) {
      latest = { file, mtimeMs: stat.mtimeMs };
    }
  }
  return latest ? latest.file : null;
}

export function recordLocator(dataDir: string): RecordLocator {
  return (ownFid) => findLatestRecordFile(dataDir, ownFid);
}
