import type { FollowGraphClient, FollowedAccount, Logger } from "./workflow-types.js";

// --- Connection check ---

export interface ConnectionReport {
  own_fid: number | null;
  following_count: number | null;
  sample: FollowedAccount[];
  ok: boolean;
}

/**
 * Verify the credentials: resolve the signer's FID, then try the following
 * list. Only the FID lookup decides `ok`; a failing list is a warning.
 */
export async function checkConnection(client: FollowGraphClient, log: Logger): Promise<ConnectionReport> {
  const report: ConnectionReport = { own_fid: null, following_count: null, sample: [], ok: false };

  log.info("Testing Farcaster API connection...");

  const resolved = await client.resolveOwnFid(log);
  if (!resolved.ok || resolved.value === null) {
    log.error("Could not retrieve your FID");
    return report;
  }
  report.own_fid = resolved.value;
  log.info(`Successfully retrieved your FID: ${resolved.value}`);

  const following = await client.fetchFollowing(resolved.value, log);
  if (following.ok) {
    report.following_count = following.value.length;
    report.sample = following.value.slice(0, 3);
    log.info(`Successfully retrieved following list (${following.value.length} users)`);
    if (report.sample.length > 0) {
      log.info("Sample users you're following:");
      for (const user of report.sample) {
        log.info(`  - @${user.username || "unknown"} (${user.display_name}) - FID: ${user.fid}`);
      }
    }
  } else {
    log.warn(`Could not retrieve following list: ${following.error.message}`);
  }

  report.ok = true;
  log.info("All checks passed. Your API credentials are working.");
  return report;
}
