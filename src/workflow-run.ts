import { InterruptedError } from "./errors.js";
import { formatRunTimestamp, previewLines, sleep as defaultSleep } from "./helpers.js";
import type {
  AccountRef,
  Logger,
  RelationshipDirection,
  RunKind,
  RunLog,
  RunSummary,
  WorkflowDeps,
  WorkflowOutcome,
} from "./workflow-types.js";

export const DEFAULT_DELAY_MS = 1000;

// --- Run session ---

export interface RunSession {
  own_fid: number;
  timestamp: string;
  log: RunLog;
}

export function currentTime(deps: Pick<WorkflowDeps, "now">): Date {
  return deps.now ? deps.now() : new Date();
}

/**
 * Resolve the caller's FID and open the run log named after it.
 * Null when the FID cannot be determined; the reason is already logged.
 */
export async function openSession(deps: WorkflowDeps, kind: RunKind): Promise<RunSession | null> {
  const resolved = await deps.client.resolveOwnFid(deps.console);
  if (!resolved.ok || resolved.value === null) {
    deps.console.error("Could not determine your FID. Check your API credentials.");
    return null;
  }

  const ownFid = resolved.value;
  const timestamp = formatRunTimestamp(currentTime(deps));
  const log = deps.openLog(kind, ownFid, timestamp);
  log.logger.info(`Your FID: ${ownFid}`);
  return { own_fid: ownFid, timestamp, log };
}

// --- Confirmation ---

function actionVerb(direction: RelationshipDirection): string {
  return direction === "unfollow" ? "unfollow" : "refollow";
}

export function confirmationMessage(direction: RelationshipDirection, count: number, dryRun: boolean): string {
  const verb = actionVerb(direction);
  return dryRun
    ? `DRY RUN: Would ${verb} all ${count} users (no actual changes will be made)`
    : `WARNING: This will ${verb} all ${count} users. Are you sure?`;
}

/**
 * Log a preview of what is about to happen and ask the operator.
 * "interrupted" when the prompt was cut short by Ctrl+C.
 */
export async function previewAndConfirm(
  deps: WorkflowDeps,
  log: Logger,
  heading: string,
  accounts: ReadonlyArray<{ username: string; display_name: string }>,
  message: string,
): Promise<boolean | "interrupted"> {
  log.info(heading);
  for (const line of previewLines(accounts)) {
    log.info(line);
  }

  try {
    return await deps.confirm(message);
  } catch (e: unknown) {
    if (e instanceof InterruptedError) return "interrupted";
    throw e;
  }
}

// --- Paced sequential loop ---

export function emptySummary(direction: RelationshipDirection, dryRun: boolean, total: number): RunSummary {
  return {
    direction,
    dry_run: dryRun,
    total,
    processed: 0,
    succeeded: 0,
    failed: [],
    unrecorded: [],
    record_path: null,
  };
}

export function accountRef(account: AccountRef): AccountRef {
  return { fid: account.fid, username: account.username };
}

/**
 * Run `step` for each entry in order, sleeping `delayMs` between entries
 * (never after the last). Stops at the next boundary once `deps.signal`
 * aborts; an in-flight step is allowed to finish.
 * Returns true when every entry was processed.
 */
export async function runPaced<T extends AccountRef>(
  entries: readonly T[],
  summary: RunSummary,
  deps: WorkflowDeps,
  log: Logger,
  delayMs: number,
  step: (entry: T) => Promise<void>,
): Promise<boolean> {
  const pause = deps.sleep ?? defaultSleep;

  for (let i = 0; i < entries.length; i++) {
    if (deps.signal?.aborted) return false;

    const entry = entries[i];
    log.info(`Processing ${i + 1}/${entries.length}: @${entry.username || "unknown"} (FID: ${entry.fid})`);
    await step(entry);
    summary.processed++;

    if (i < entries.length - 1) {
      await pause(delayMs, deps.signal);
    }
  }
  return true;
}

// --- Summary ---

export function logSummary(log: Logger, summary: RunSummary): void {
  const noun = summary.direction === "unfollow" ? "unfollows" : "refollows";

  log.info("=== SUMMARY ===");
  if (summary.dry_run) log.info("Mode: DRY RUN (no changes were made)");
  log.info(`Total users processed: ${summary.processed} of ${summary.total}`);
  log.info(`Successful ${noun}: ${summary.succeeded}`);
  log.info(`Failed ${noun}: ${summary.failed.length}`);

  if (summary.direction === "unfollow") {
    if (summary.record_path) {
      log.info(`All unfollowed users saved to ${summary.record_path}`);
    } else if (summary.dry_run) {
      log.info("Dry run: no record file written");
    } else if (summary.succeeded > 0) {
      log.error("Failed to save users to the record file");
    }
  }

  if (summary.unrecorded.length > 0) {
    log.error(`${summary.unrecorded.length} unfollowed users could not be saved to the record file:`);
    for (const ref of summary.unrecorded) {
      log.error(`  - @${ref.username || "unknown"} (FID: ${ref.fid})`);
    }
  }

  if (summary.failed.length > 0) {
    log.warn(`Some ${noun} failed. You may want to retry manually.`);
    log.info("Failed users:");
    for (const ref of summary.failed) {
      log.info(`  - @${ref.username || "unknown"} (FID: ${ref.fid})`);
    }
  }
}

/**
 * Process exit status: 0 for completion, nothing to do or a declined
 * prompt; 1 for aborts and interrupts.
 */
export function exitCode(outcome: WorkflowOutcome): 0 | 1 {
  switch (outcome.status) {
    case "completed":
    case "nothing_to_do":
    case "cancelled":
      return 0;
    case "interrupted":
    case "aborted":
      return 1;
  }
}
