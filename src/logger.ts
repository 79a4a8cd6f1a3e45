import { once } from "events";
import path from "path";
import pino, { type Logger } from "pino";
import pretty from "pino-pretty";
import type { LogLevel } from "./config.js";

export type { Logger };

export type RunKind = "unfollow" | "refollow";

const PRETTY_OPTIONS = {
  translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
  ignore: "pid,hostname",
};

/**
 * A logging sink scoped to one invocation. Writes to the console and to a
 * per-run text file; `close()` flushes the file.
 */
export interface RunLog {
  logger: Logger;
  path: string | null;
  close(): Promise<void>;
}

/** Console-only logger used before the account's FID is known. */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  return pino({ level }, pretty({ ...PRETTY_OPTIONS, destination: 1, sync: true }));
}

/** A logger that discards everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function runLogPath(dataDir: string, kind: RunKind, ownFid: number, timestamp: string): string {
  return path.join(dataDir, `${kind}_log_${ownFid}_${timestamp}.txt`);
}

/**
 * Open the run log `<dataDir>/<kind>_log_<fid>_<timestamp>.txt`, mirrored to
 * stdout. The data directory is created if missing.
 */
export function openRunLog(options: {
  dataDir: string;
  kind: RunKind;
  ownFid: number;
  timestamp: string;
  level?: LogLevel;
}): RunLog {
  const level = options.level ?? "info";
  const filePath = runLogPath(options.dataDir, options.kind, options.ownFid, options.timestamp);

  const consoleStream = pretty({ ...PRETTY_OPTIONS, destination: 1, sync: true });
  const fileStream = pretty({
    ...PRETTY_OPTIONS,
    colorize: false,
    destination: filePath,
    mkdir: true,
    append: true,
    sync: true,
  });

  const logger = pino(
    { level },
    pino.multistream([
      { level, stream: consoleStream },
      { level, stream: fileStream },
    ]),
  );

  return {
    logger,
    path: filePath,
    async close() {
      const closed = once(fileStream, "close");
      fileStream.end();
      await closed;
    },
  };
}

/** Wrap an existing logger as a RunLog with no file behind it. */
export function nullRunLog(logger: Logger): RunLog {
  return {
    logger,
    path: null,
    async close() {},
  };
}
