import { setTimeout as delay } from "timers/promises";

/**
 * Safely extract a message string from an unknown error value.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

/**
 * Parse a Farcaster ID from a string of decimal digits.
 * Returns null for anything else (signs, decimals, blanks).
 */
export function parseFid(input: string): number | null {
  const stripped = input.trim();
  if (!/^\d+$/.test(stripped)) return null;
  const fid = Number(stripped);
  return Number.isSafeInteger(fid) ? fid : null;
}

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

/**
 * Local-time run stamp used in log and record file names: "20261018_142305".
 */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Sleep for `ms`, returning early (without throwing) once `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (e: unknown) {
    if (!signal?.aborted) throw e;
  }
}

/**
 * Human preview of the first few accounts, one line each, plus a tail line
 * when the list is longer.
 */
export function previewLines(
  accounts: ReadonlyArray<{ username: string; display_name: string }>,
  max: number = 5,
): string[] {
  const lines = accounts.slice(0, max).map(
    (a, i) => `  ${i + 1}. @${a.username || "unknown"} (${a.display_name})`,
  );
  if (accounts.length > max) {
    lines.push(`  ... and ${accounts.length - max} more users`);
  }
  return lines;
}
