export { runUnfollowAll } from "./workflow-unfollow.js";
export { runRefollowAll } from "./workflow-refollow.js";
export { checkConnection } from "./workflow-check.js";
export { DEFAULT_DELAY_MS, exitCode, logSummary } from "./workflow-run.js";
export type * from "./workflow-types.js";
