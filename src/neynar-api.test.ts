import { describe, it, expect, vi, afterEach } from "vitest";
import { ConfigError } from "./errors.js";
import { NeynarApiClient } from "./neynar-api.js";

const BASE = "https://api.test/v2/farcaster";

function makeClient(sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined)): NeynarApiClient {
  return new NeynarApiClient(
    { apiKey: "test-key", signerUuid: "test-signer", baseUrl: BASE },
    { sleep },
  );
}

function response(body: unknown, status = 200): unknown {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers(),
    text: () => Promise.resolve(typeof body === "string" ? body : JSON.stringify(body)),
  };
}

function stubFetch(...responses: unknown[]) {
  const fn = vi.fn();
  for (const r of responses) fn.mockResolvedValueOnce(r);
  vi.stubGlobal("fetch", fn);
  return fn;
}

function requestInit(fn: ReturnType<typeof vi.fn>, call: number): RequestInit {
  return fn.mock.calls[call][1];
}

describe("NeynarApiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("constructor", () => {
    it("requires an API key", () => {
      expect(() => new NeynarApiClient({ apiKey: "", signerUuid: "test-signer" })).toThrow(ConfigError);
    });

    it("requires a signer UUID", () => {
      expect(() => new NeynarApiClient({ apiKey: "test-key", signerUuid: "" })).toThrow("NEYNAR_SIGNER_UUID is required");
    });
  });

  describe("fetchFollowing", () => {
    it("follows cursors until absent and keeps page order", async () => {
      const fetchMock = stubFetch(
        response({
          users: [
            { object: "follow", user: { fid: 1, username: "alice", display_name: "Alice" } },
            { object: "follow" },
            { object: "follow", user: { fid: 2, username: "bob" } },
          ],
          next: { cursor: "c1" },
        }),
        response({
          users: [
            {
              user: {
                fid: 3,
                username: "carol",
                display_name: "Carol",
                pfp_url: "https://img.test/c.png",
                custody_address: "0xabc",
              },
            },
          ],
          next: { cursor: "c2" },
        }),
        response({ users: [{ user: { fid: 4 } }], next: { cursor: null } }),
      );
      const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
      const client = makeClient(sleep);

      const result = await client.fetchFollowing(42);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual([
        { fid: 1, username: "alice", display_name: "Alice", pfp_url: "", custody_address: "" },
        { fid: 2, username: "bob", display_name: "", pfp_url: "", custody_address: "" },
        { fid: 3, username: "carol", display_name: "Carol", pfp_url: "https://img.test/c.png", custody_address: "0xabc" },
        { fid: 4, username: "", display_name: "", pfp_url: "", custody_address: "" },
      ]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/following/?fid=42&limit=100`);
      expect(fetchMock.mock.calls[1][0]).toBe(`${BASE}/following/?fid=42&limit=100&cursor=c1`);
      expect(fetchMock.mock.calls[2][0]).toBe(`${BASE}/following/?fid=42&limit=100&cursor=c2`);
    });

    it("skips entries whose user is null", async () => {
      stubFetch(
        response({
          users: [
            { object: "follow", user: { fid: 1, username: "alice" } },
            { object: "follow", user: null },
            { object: "follow", user: { fid: 3, username: "carol" } },
          ],
          next: { cursor: null },
        }),
      );

      const result = await makeClient().fetchFollowing(5);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((a) => a.fid)).toEqual([1, 3]);
    });

    it("sleeps between pages but not after the last", async () => {
      stubFetch(
        response({ users: [], next: { cursor: "c1" } }),
        response({ users: [] }),
      );
      const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
      const client = makeClient(sleep);

      await client.fetchFollowing(42);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(100);
    });

    it("treats an empty cursor string as the last page", async () => {
      const fetchMock = stubFetch(response({ users: [{ user: { fid: 9 } }], next: { cursor: "" } }));
      const result = await makeClient().fetchFollowing(42);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.ok && result.value.map((a) => a.fid)).toEqual([9]);
    });

    it("sends the API key header on GET requests", async () => {
      const fetchMock = stubFetch(response({ users: [] }));
      await makeClient().fetchFollowing(42);

      const init = requestInit(fetchMock, 0);
      expect(init.method).toBe("GET");
      expect(init.headers).toEqual({
        accept: "application/json",
        "content-type": "application/json",
        api_key: "test-key",
      });
    });

    it("returns no partial list when a later page fails", async () => {
      stubFetch(
        response({ users: [{ user: { fid: 1 } }], next: { cursor: "c1" } }),
        response({ message: "boom" }, 500),
      );

      const result = await makeClient().fetchFollowing(42);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("http");
      expect(result.error.status).toBe(500);
      expect(result.error.message).toBe("fetchFollowing failed (HTTP 500): boom");
    });

    it("reports transport failures as network errors", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

      const result = await makeClient().fetchFollowing(42);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("network");
      expect(result.error.message).toBe("fetchFollowing failed: fetch failed");
    });

    it("reports timeouts", async () => {
      const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(timeout));

      const result = await makeClient().fetchFollowing(42);

      expect(!result.ok && result.error.kind).toBe("timeout");
    });

    it("rejects a page with a user lacking a fid", async () => {
      stubFetch(response({ users: [{ user: { username: "nofid" } }] }));

      const result = await makeClient().fetchFollowing(42);

      expect(!result.ok && result.error.kind).toBe("parse");
    });

    it("rejects a non-JSON body", async () => {
      stubFetch(response("<html>gateway</html>"));

      const result = await makeClient().fetchFollowing(42);

      expect(!result.ok && result.error.kind).toBe("parse");
    });

    it("labels rate limiting", async () => {
      stubFetch(response({ message: "Too many requests" }, 429));

      const result = await makeClient().fetchFollowing(42);

      expect(!result.ok && result.error.message).toBe(
        "fetchFollowing failed (HTTP 429): rate limited: Too many requests",
      );
    });
  });

  describe("mutateRelationship", () => {
    it("unfollows with DELETE and the signer payload", async () => {
      const fetchMock = stubFetch(response({ success: true }));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: false });

      expect(ok).toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/user/follow`);
      const init = requestInit(fetchMock, 0);
      expect(init.method).toBe("DELETE");
      expect(init.body).toBe(JSON.stringify({ signer_uuid: "test-signer", target_fids: [7] }));
    });

    it("follows with POST", async () => {
      const fetchMock = stubFetch(response({ success: true }));

      await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "follow", dryRun: false });

      expect(requestInit(fetchMock, 0).method).toBe("POST");
    });

    it("treats 409 'not following' as a successful unfollow", async () => {
      stubFetch(response({ message: "You are not following this user" }, 409));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: false });

      expect(ok).toBe(true);
    });

    it("treats 400 'already following' as a successful follow", async () => {
      stubFetch(response({ message: "You are already following this user" }, 400));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "follow", dryRun: false });

      expect(ok).toBe(true);
    });

    it("does not apply the follow phrasing to unfollows", async () => {
      stubFetch(response({ message: "You are already following this user" }, 400));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: false });

      expect(ok).toBe(false);
    });

    it("only normalizes 400 and 409", async () => {
      stubFetch(response({ message: "not following" }, 404));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: false });

      expect(ok).toBe(false);
    });

    it("returns false on other client errors", async () => {
      stubFetch(response({ message: "Invalid signer" }, 400));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "follow", dryRun: false });

      expect(ok).toBe(false);
    });

    it("returns false on server errors", async () => {
      stubFetch(response("upstream error", 502));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: false });

      expect(ok).toBe(false);
    });

    it("returns false instead of throwing on transport failure", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

      const ok = await makeClient().mutateRelationship({ ownFid: 42, targetFid: 7, direction: "follow", dryRun: false });

      expect(ok).toBe(false);
    });

    it("makes no request in dry-run mode, for either direction", async () => {
      const fetchMock = stubFetch();
      const client = makeClient();

      expect(await client.mutateRelationship({ ownFid: 42, targetFid: 7, direction: "follow", dryRun: true })).toBe(true);
      expect(await client.mutateRelationship({ ownFid: 42, targetFid: 7, direction: "unfollow", dryRun: true })).toBe(true);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("resolveOwnFid", () => {
    it("reads the fid from the signer", async () => {
      const fetchMock = stubFetch(response({ signer_uuid: "test-signer", status: "approved", fid: 99 }));

      const result = await makeClient().resolveOwnFid();

      expect(result).toEqual({ ok: true, value: 99 });
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/signer/?signer_uuid=test-signer`);
    });

    it("returns null for a signer without a fid", async () => {
      stubFetch(response({ signer_uuid: "test-signer", status: "pending_approval" }));

      const result = await makeClient().resolveOwnFid();

      expect(result).toEqual({ ok: true, value: null });
    });

    it("returns an error for rejected credentials", async () => {
      stubFetch(response({ message: "Unauthorized" }, 401));

      const result = await makeClient().resolveOwnFid();

      expect(!result.ok && result.error.message).toBe("resolveOwnFid failed (HTTP 401): Unauthorized");
    });
  });

  describe("getUser", () => {
    it("returns the profile", async () => {
      const fetchMock = stubFetch(response({ user: { fid: 5, username: "eve", display_name: "Eve" } }));

      const user = await makeClient().getUser(5);

      expect(user).toEqual({ fid: 5, username: "eve", display_name: "Eve", pfp_url: "", custody_address: "" });
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/user?fid=5`);
    });

    it("returns null on error", async () => {
      stubFetch(response({ message: "User not found" }, 404));

      expect(await makeClient().getUser(5)).toBeNull();
    });
  });
});
