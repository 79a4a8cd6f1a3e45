import { RecordFileError } from "./errors.js";
import { loadRecords } from "./record-file.js";
import type { RefollowDeps, RefollowOptions, UnfollowRecord, WorkflowOutcome } from "./workflow-types.js";
import {
  accountRef,
  confirmationMessage,
  emptySummary,
  logSummary,
  openSession,
  previewAndConfirm,
  runPaced,
} from "./workflow-run.js";

// --- Bulk Refollow ---
// resolve FID → locate + load record → offset → confirm → follow each → summary
// The record file is only ever read, so a replay can be repeated.

export async function runRefollowAll(deps: RefollowDeps, options: RefollowOptions): Promise<WorkflowOutcome> {
  const session = await openSession(deps, "refollow");
  if (!session) {
    return { status: "aborted", reason: "Could not determine your FID" };
  }
  const log = session.log.logger;

  try {
    let recordPath = options.recordPath;
    if (!recordPath) {
      const latest = deps.locateRecord(session.own_fid);
      if (!latest) {
        const reason = `No record files found for your FID (${session.own_fid}). Run unfollow-all first.`;
        log.error(reason);
        return { status: "aborted", reason };
      }
      recordPath = latest;
      log.info(`Using most recent record file for your FID (${session.own_fid}): ${recordPath}`);
    }

    let records: UnfollowRecord[];
    try {
      records = loadRecords(recordPath);
    } catch (e: unknown) {
      if (!(e instanceof RecordFileError)) throw e;
      log.error(e.message);
      return { status: "aborted", reason: e.message };
    }
    log.info(`Loaded ${records.length} users from ${recordPath}`);

    if (records.length === 0) {
      log.info("The record file has no users to refollow.");
      return { status: "nothing_to_do", reason: "record file is empty" };
    }

    if (options.startFrom > 0) {
      if (options.startFrom >= records.length) {
        const reason = `Start index ${options.startFrom} is out of range (max: ${records.length - 1})`;
        log.error(reason);
        return { status: "aborted", reason };
      }
      records = records.slice(options.startFrom);
      log.info(`Starting from index ${options.startFrom}, ${records.length} users remaining`);
    }

    const confirmed = await previewAndConfirm(
      deps,
      log,
      `Found ${records.length} users to refollow:`,
      records,
      confirmationMessage("follow", records.length, options.dryRun),
    );
    const summary = emptySummary("follow", options.dryRun, records.length);
    if (confirmed === "interrupted") {
      log.info("Operation interrupted by user");
      return { status: "interrupted", summary };
    }
    if (!confirmed) {
      log.info("Operation cancelled by user");
      return { status: "cancelled" };
    }

    const finished = await runPaced(records, summary, deps, log, options.delayMs, async (record) => {
      const username = record.username || "unknown";
      const success = await deps.client.mutateRelationship(
        { ownFid: session.own_fid, targetFid: record.fid, direction: "follow", dryRun: options.dryRun },
        log,
      );

      if (success) {
        summary.succeeded++;
        log.info(`Successfully refollowed @${username}`);
      } else {
        summary.failed.push(accountRef(record));
        log.error(`Failed to refollow @${username}`);
      }
    });

    if (!finished) {
      log.info("Operation interrupted by user");
      logSummary(log, summary);
      return { status: "interrupted", summary };
    }

    logSummary(log, summary);
    return { status: "completed", summary };
  } finally {
    await session.log.close();
  }
}
