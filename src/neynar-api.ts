import { z } from "zod";
import { DEFAULT_API_BASE, DEFAULT_TIMEOUT_MS } from "./config.js";
import { ConfigError, FetchError } from "./errors.js";
import { errorMessage, sleep as defaultSleep } from "./helpers.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { err, ok, type Result } from "./result.js";

// Largest page the following endpoint accepts.
const PAGE_SIZE = 100;
const PAGE_DELAY_MS = 100;

export interface FollowedAccount {
  fid: number;
  username: string;
  display_name: string;
  pfp_url: string;
  custody_address: string;
}

export type RelationshipDirection = "follow" | "unfollow";

export interface MutateRelationshipParams {
  ownFid: number;
  targetFid: number;
  direction: RelationshipDirection;
  dryRun: boolean;
}

/**
 * The operations the bulk workflows need from the remote social graph.
 * Every method takes an optional per-run logger.
 */
export interface FollowGraphClient {
  fetchFollowing(fid: number, log?: Logger): Promise<Result<FollowedAccount[]>>;
  mutateRelationship(params: MutateRelationshipParams, log?: Logger): Promise<boolean>;
  resolveOwnFid(log?: Logger): Promise<Result<number | null>>;
  getUser(fid: number, log?: Logger): Promise<FollowedAccount | null>;
}

export interface NeynarApiConfig {
  apiKey: string;
  signerUuid: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface NeynarClientOptions {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  pageDelayMs?: number;
}

// --- Response shapes ---

const UserSchema = z.object({
  fid: z.number().int(),
  username: z.string().nullish(),
  display_name: z.string().nullish(),
  pfp_url: z.string().nullish(),
  custody_address: z.string().nullish(),
});

const FollowingPageSchema = z.object({
  users: z.array(z.object({ user: UserSchema.nullish() })).default([]),
  next: z.object({ cursor: z.string().nullish() }).nullish(),
});

const SignerSchema = z.object({
  fid: z.number().int().nullish(),
});

const UserLookupSchema = z.object({
  user: UserSchema.nullish(),
});

const ErrorBodySchema = z.object({
  message: z.string().optional(),
});

// Remote phrasing for "relationship is already in the requested state".
const ALREADY_IN_STATE: Record<RelationshipDirection, string[]> = {
  follow: ["already following", "already followed"],
  unfollow: ["not following", "not followed"],
};

const BENIGN_STATUSES = new Set([400, 409]);

function toAccount(user: z.infer<typeof UserSchema>): FollowedAccount {
  return {
    fid: user.fid,
    username: user.username ?? "",
    display_name: user.display_name ?? "",
    pfp_url: user.pfp_url ?? "",
    custody_address: user.custody_address ?? "",
  };
}

interface RawResponse {
  status: number;
  ok: boolean;
  text: string;
}

export class NeynarApiClient implements FollowGraphClient {
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private pageDelayMs: number;

  constructor(private config: NeynarApiConfig, options: NeynarClientOptions = {}) {
    if (!config.apiKey) {
      throw new ConfigError("NEYNAR_API_KEY is required");
    }
    if (!config.signerUuid) {
      throw new ConfigError("NEYNAR_SIGNER_UUID is required");
    }
    this.baseUrl = (config.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? ((ms) => defaultSleep(ms));
    this.pageDelayMs = options.pageDelayMs ?? PAGE_DELAY_MS;
  }

  // --- Internal helpers ---

  private headers(): Record<string, string> {
    return {
      accept: "application/json",
      "content-type": "application/json",
      api_key: this.config.apiKey,
    };
  }

  /**
   * Perform one request. Transport failures and timeouts throw FetchError;
   * HTTP error statuses are returned for the caller to interpret.
   */
  private async send(
    operation: string,
    url: string,
    method: string,
    body?: unknown,
  ): Promise<RawResponse> {
    const init: RequestInit = {
      method,
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (e: unknown) {
      if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
        throw new FetchError(operation, "timeout", `no response within ${this.timeoutMs}ms`);
      }
      throw new FetchError(operation, "network", errorMessage(e));
    }

    return { status: response.status, ok: response.ok, text: await response.text() };
  }

  private parseJson(operation: string, raw: RawResponse): unknown {
    try {
      return JSON.parse(raw.text);
    } catch {
      throw new FetchError(operation, "parse", `invalid JSON: ${raw.text.slice(0, 200)}`, raw.status);
    }
  }

  private errorDetail(raw: RawResponse): string {
    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(raw.text));
      if (parsed.success && parsed.data.message) return parsed.data.message;
    } catch {
      // not JSON; fall through to the raw body
    }
    return raw.text.slice(0, 500) || "empty response";
  }

  /** GET `url` and validate the 2xx body against `schema`. */
  private async getJson<T>(operation: string, url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await this.send(operation, url, "GET");
    if (raw.status === 429) {
      throw new FetchError(operation, "http", `rate limited: ${this.errorDetail(raw)}`, raw.status);
    }
    if (!raw.ok) {
      throw new FetchError(operation, "http", this.errorDetail(raw), raw.status);
    }
    const parsed = schema.safeParse(this.parseJson(operation, raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "unexpected shape";
      throw new FetchError(operation, "parse", `unexpected response (${where})`, raw.status);
    }
    return parsed.data;
  }

  // --- Social graph operations ---

  /**
   * Every account `fid` follows, in the order the API pages them out.
   * All-or-nothing: any failing page discards what was already fetched.
   */
  async fetchFollowing(fid: number, log: Logger = this.logger): Promise<Result<FollowedAccount[]>> {
    const accounts: FollowedAccount[] = [];
    let cursor: string | undefined;
    let page = 0;

    log.info(`Fetching following list for FID ${fid}`);

    try {
      for (;;) {
        const params = new URLSearchParams({ fid: fid.toString(), limit: PAGE_SIZE.toString() });
        if (cursor) params.set("cursor", cursor);

        const data = await this.getJson("fetchFollowing", `${this.baseUrl}/following/?${params}`, FollowingPageSchema);
        for (const item of data.users) {
          if (item.user) accounts.push(toAccount(item.user));
        }

        page++;
        log.info(`Fetched page ${page}: ${data.users.length} users`);

        const next = data.next?.cursor;
        if (!next) break;
        cursor = next;
        await this.sleep(this.pageDelayMs);
      }
    } catch (e: unknown) {
      const error = e instanceof FetchError ? e : new FetchError("fetchFollowing", "network", errorMessage(e));
      log.error(`Error fetching following list: ${error.message}`);
      return err(error);
    }

    log.info(`Found ${accounts.length} total users being followed`);
    return ok(accounts);
  }

  /**
   * Follow or unfollow `targetFid`. Never throws: a failed call is `false`.
   * A 400/409 saying the relationship is already in the requested state
   * counts as success, so re-running a batch is safe.
   */
  async mutateRelationship(params: MutateRelationshipParams, log: Logger = this.logger): Promise<boolean> {
    const { targetFid, direction } = params;
    const verb = direction === "follow" ? "follow" : "unfollow";

    if (params.dryRun) {
      log.info(`[DRY RUN] Would ${verb} user with FID ${targetFid}`);
      return true;
    }

    const operation = direction === "follow" ? "followUser" : "unfollowUser";
    const method = direction === "follow" ? "POST" : "DELETE";
    const body = { signer_uuid: this.config.signerUuid, target_fids: [targetFid] };

    log.info(`${direction === "follow" ? "Following" : "Unfollowing"} user with FID ${targetFid} (as FID ${params.ownFid})`);

    let raw: RawResponse;
    try {
      raw = await this.send(operation, `${this.baseUrl}/user/follow`, method, body);
    } catch (e: unknown) {
      log.error(`Error ${direction === "follow" ? "following" : "unfollowing"} user ${targetFid}: ${errorMessage(e)}`);
      return false;
    }

    if (BENIGN_STATUSES.has(raw.status)) {
      const detail = this.errorDetail(raw).toLowerCase();
      if (ALREADY_IN_STATE[direction].some((phrase) => detail.includes(phrase))) {
        log.info(`${direction === "follow" ? "Already following" : "Not following"} user with FID ${targetFid}`);
        return true;
      }
    }

    if (!raw.ok) {
      const rateLimited = raw.status === 429 ? "rate limited: " : "";
      log.error(
        `Error ${direction === "follow" ? "following" : "unfollowing"} user ${targetFid}: ` +
          `${operation} failed (HTTP ${raw.status}): ${rateLimited}${this.errorDetail(raw)}`,
      );
      return false;
    }

    log.info(`Successfully ${verb}ed user with FID ${targetFid}`);
    return true;
  }

  /**
   * The FID the signer acts for. `null` when the signer has none yet
   * (e.g. still pending approval).
   */
  async resolveOwnFid(log: Logger = this.logger): Promise<Result<number | null>> {
    const params = new URLSearchParams({ signer_uuid: this.config.signerUuid });
    try {
      const signer = await this.getJson("resolveOwnFid", `${this.baseUrl}/signer/?${params}`, SignerSchema);
      return ok(signer.fid ?? null);
    } catch (e: unknown) {
      const error = e instanceof FetchError ? e : new FetchError("resolveOwnFid", "network", errorMessage(e));
      log.error(`Error fetching my FID: ${error.message}`);
      return err(error);
    }
  }

  /** Profile lookup; null when missing or the call fails. */
  async getUser(fid: number, log: Logger = this.logger): Promise<FollowedAccount | null> {
    const params = new URLSearchParams({ fid: fid.toString() });
    try {
      const data = await this.getJson("getUser", `${this.baseUrl}/user?${params}`, UserLookupSchema);
      return data.user ? toAccount(data.user) : null;
    } catch (e: unknown) {
      log.error(`Error fetching user info for FID ${fid}: ${errorMessage(e)}`);
      return null;
    }
  }
}
