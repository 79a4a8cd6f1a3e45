import { errorMessage } from "./helpers.js";
import { RecordWriter, recordFilePath } from "./record-file.js";
import type { UnfollowOptions, WorkflowDeps, WorkflowOutcome } from "./workflow-types.js";
import {
  accountRef,
  confirmationMessage,
  currentTime,
  emptySummary,
  logSummary,
  openSession,
  previewAndConfirm,
  runPaced,
} from "./workflow-run.js";

// --- Bulk Unfollow ---
// resolve FID → fetch following → cap → confirm → unfollow + record each → summary

export async function runUnfollowAll(deps: WorkflowDeps, options: UnfollowOptions): Promise<WorkflowOutcome> {
  const session = await openSession(deps, "unfollow");
  if (!session) {
    return { status: "aborted", reason: "Could not determine your FID" };
  }
  const log = session.log.logger;

  try {
    const following = await deps.client.fetchFollowing(session.own_fid, log);
    if (!following.ok) {
      log.error(`Could not fetch your following list: ${following.error.message}`);
      return { status: "aborted", reason: following.error.message };
    }

    let accounts = following.value;
    if (accounts.length === 0) {
      log.info("You're not following anyone.");
      return { status: "nothing_to_do", reason: "not following anyone" };
    }
    log.info(`Found ${accounts.length} users you're following`);

    if (options.limit !== undefined) {
      const originalCount = accounts.length;
      accounts = accounts.slice(0, options.limit);
      log.info(`Limited to first ${accounts.length} users (out of ${originalCount} total)`);
    }

    const confirmed = await previewAndConfirm(
      deps,
      log,
      `You're currently following ${accounts.length} users:`,
      accounts,
      confirmationMessage("unfollow", accounts.length, options.dryRun),
    );
    const summary = emptySummary("unfollow", options.dryRun, accounts.length);
    if (confirmed === "interrupted") {
      log.info("Operation interrupted by user");
      return { status: "interrupted", summary };
    }
    if (!confirmed) {
      log.info("Operation cancelled by user");
      return { status: "cancelled" };
    }

    const writer = new RecordWriter(recordFilePath(options.dataDir, session.own_fid, session.timestamp));

    const finished = await runPaced(accounts, summary, deps, log, options.delayMs, async (account) => {
      const username = account.username || "unknown";
      const success = await deps.client.mutateRelationship(
        { ownFid: session.own_fid, targetFid: account.fid, direction: "unfollow", dryRun: options.dryRun },
        log,
      );

      if (!success) {
        summary.failed.push(accountRef(account));
        log.error(`Failed to unfollow @${username}`);
        return;
      }

      summary.succeeded++;
      log.info(`Successfully unfollowed @${username}`);

      // Dry runs never leave a record behind.
      if (options.dryRun) return;

      try {
        writer.append(account, currentTime(deps));
        summary.record_path = writer.filePath;
        log.info(`Saved @${username} to ${writer.filePath}`);
      } catch (e: unknown) {
        summary.unrecorded.push(accountRef(account));
        log.error(`Failed to save @${username} to the record file: ${errorMessage(e)}`);
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
