#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { LOG_LEVELS, isLogLevel, loadConfig, type AppConfig } from "./config.js";
import { confirmAction } from "./confirm.js";
import { ConfigError } from "./errors.js";
import { errorMessage, parseFid } from "./helpers.js";
import { createConsoleLogger, openRunLog, type Logger } from "./logger.js";
import { NeynarApiClient } from "./neynar-api.js";
import { recordLocator } from "./record-file.js";
import {
  DEFAULT_DELAY_MS,
  checkConnection,
  exitCode,
  runRefollowAll,
  runUnfollowAll,
  type WorkflowDeps,
} from "./workflow.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// A .env in the working directory wins over one next to the package.
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

// --- Option parsers ---

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return seconds;
}

function parseCount(minimum: number): (value: string) => number {
  return (value) => {
    const n = parseFid(value);
    if (n === null || n < minimum) {
      throw new InvalidArgumentError(`Expected a whole number >= ${minimum}.`);
    }
    return n;
  };
}

// --- Environment ---

type GlobalOptions = {
  dataDir?: string;
  logLevel?: string;
};

interface Environment {
  config: AppConfig;
  console: Logger;
  client: NeynarApiClient;
}

function initEnv(globals: GlobalOptions): Environment {
  const config = loadConfig();
  if (globals.dataDir) config.dataDir = globals.dataDir;
  if (globals.logLevel && isLogLevel(globals.logLevel)) config.logLevel = globals.logLevel;

  const consoleLog = createConsoleLogger(config.logLevel);
  const client = new NeynarApiClient(
    {
      apiKey: config.apiKey,
      signerUuid: config.signerUuid,
      baseUrl: config.apiBase,
      timeoutMs: config.timeoutMs,
    },
    { logger: consoleLog },
  );
  return { config, console: consoleLog, client };
}

/**
 * Build workflow dependencies wired to the terminal. The first Ctrl+C aborts
 * the run at the next safe point; a second one exits immediately.
 */
function terminalDeps(env: Environment): WorkflowDeps {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    controller.abort();
    process.once("SIGINT", () => process.exit(1));
  });

  return {
    client: env.client,
    console: env.console,
    openLog: (kind, ownFid, timestamp) =>
      openRunLog({ dataDir: env.config.dataDir, kind, ownFid, timestamp, level: env.config.logLevel }),
    confirm: (message) => confirmAction(message, undefined, controller.signal),
    signal: controller.signal,
  };
}

async function execute(globals: GlobalOptions, run: (env: Environment) => Promise<0 | 1>): Promise<void> {
  let code: 0 | 1;
  try {
    code = await run(initEnv(globals));
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      console.error(`Configuration error: ${e.message}`);
      console.error("Set NEYNAR_API_KEY and NEYNAR_SIGNER_UUID in your environment or .env file.");
    } else {
      console.error(`Unexpected error: ${errorMessage(e)}`);
    }
    code = 1;
  }
  process.exit(code);
}

// --- Commands ---

const program = new Command();

program
  .name("fc-follow-reset")
  .description("Unfollow everyone on Farcaster with a replayable record, and refollow from it later")
  .version("0.1.0")
  .option("-d, --data-dir <path>", "Directory for record files and run logs (default: $FC_RESET_DATA_DIR or ./data)")
  .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS));

program
  .command("unfollow-all")
  .description("Unfollow every account you follow, recording each to a CSV file")
  .option("--dry-run", "Run without making any changes", false)
  .option("--delay <seconds>", "Delay between unfollows in seconds", parseSeconds, DEFAULT_DELAY_MS / 1000)
  .option("--limit <n>", "Only process the first n accounts", parseCount(1))
  .action(async (opts: { dryRun: boolean; delay: number; limit?: number }) => {
    await execute(program.opts<GlobalOptions>(), async (env) => {
      const outcome = await runUnfollowAll(terminalDeps(env), {
        dryRun: opts.dryRun,
        delayMs: Math.round(opts.delay * 1000),
        limit: opts.limit,
        dataDir: env.config.dataDir,
      });
      return exitCode(outcome);
    });
  });

program
  .command("refollow-all")
  .description("Refollow the accounts in a record file written by unfollow-all")
  .option("--csv-file <path>", "Record file to read (default: your most recent one in the data directory)")
  .option("--dry-run", "Run without making any changes", false)
  .option("--delay <seconds>", "Delay between follows in seconds", parseSeconds, DEFAULT_DELAY_MS / 1000)
  .option("--start-from <index>", "Skip the first <index> rows (for resuming)", parseCount(0), 0)
  .action(async (opts: { csvFile?: string; dryRun: boolean; delay: number; startFrom: number }) => {
    await execute(program.opts<GlobalOptions>(), async (env) => {
      const outcome = await runRefollowAll(
        { ...terminalDeps(env), locateRecord: recordLocator(env.config.dataDir) },
        {
          dryRun: opts.dryRun,
          delayMs: Math.round(opts.delay * 1000),
          startFrom: opts.startFrom,
          recordPath: opts.csvFile,
        },
      );
      return exitCode(outcome);
    });
  });

program
  .command("test-connection")
  .description("Check that the API key and signer work")
  .action(async () => {
    await execute(program.opts<GlobalOptions>(), async (env) => {
      const report = await checkConnection(env.client, env.console);
      return report.ok ? 0 : 1;
    });
  });

await program.parseAsync();
