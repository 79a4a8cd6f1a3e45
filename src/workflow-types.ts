import type { FollowGraphClient, FollowedAccount, RelationshipDirection } from "./neynar-api.js";
import type { Logger, RunKind, RunLog } from "./logger.js";
import type { RecordLocator, UnfollowRecord } from "./record-file.js";

export type { FollowGraphClient, FollowedAccount, Logger, RecordLocator, RelationshipDirection, RunKind, RunLog, UnfollowRecord };

// --- Workflow dependencies ---

export interface WorkflowDeps {
  client: FollowGraphClient;
  console: Logger;           // sink used before the run log exists
  openLog: (kind: RunKind, ownFid: number, timestamp: string) => RunLog;
  confirm: (message: string) => Promise<boolean>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  signal?: AbortSignal;      // aborted on Ctrl+C
}

export interface RefollowDeps extends WorkflowDeps {
  locateRecord: RecordLocator;
}

export interface UnfollowOptions {
  dryRun: boolean;
  delayMs: number;
  limit?: number;
  dataDir: string;
}

export interface RefollowOptions {
  dryRun: boolean;
  delayMs: number;
  startFrom: number;
  recordPath?: string;
}

// --- Results ---

export interface AccountRef {
  fid: number;
  username: string;
}

export interface RunSummary {
  direction: RelationshipDirection;
  dry_run: boolean;
  total: number;
  processed: number;
  succeeded: number;
  failed: AccountRef[];
  unrecorded: AccountRef[];  // unfollowed, but the record append failed
  record_path: string | null;
}

export type WorkflowOutcome =
  | { status: "completed"; summary: RunSummary }
  | { status: "interrupted"; summary: RunSummary }
  | { status: "nothing_to_do"; reason: string }
  | { status: "cancelled" }
  | { status: "aborted"; reason: string };
