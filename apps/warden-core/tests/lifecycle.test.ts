import { GuildSettingsCache } from "@warden-core/src/guild-cache";
import { LifecycleHandler } from "@warden-core/src/lifecycle";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  buildTempStore,
  FlakyStore,
  type TempStore,
  waitUntil,
} from "./behaviors/test-harness";

let temp: TempStore;
let store: FlakyStore;
let cache: GuildSettingsCache;
let lifecycle: LifecycleHandler;

beforeEach(async () => {
  temp = await buildTempStore();
  store = new FlakyStore(temp.store);
  cache = new GuildSettingsCache();
  lifecycle = new LifecycleHandler(store, cache, {
    attempts: 2,
    baseDelayMs: 1,
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await temp.cleanup();
});

describe("handleJoined", () => {
  test("writes defaults to the store and the cache", async () => {
    const result = await lifecycle.handleJoined({
      guildId: "123",
      ownerId: "456",
      memberCount: 3,
    });

    expect(result.ok).toBe(true);
    expect(await temp.store.get("123")).toEqual({
      guildId: "123",
      prefix: "-",
      ownerId: "456",
      muteType: "timeout",
      muteRoleId: "0",
    });
    expect((await cache.get("123"))?.prefix).toBe("-");
    expect(lifecycle.stateOf("123")).toBe("tracked");
  });

  test("a repeated join keeps the customized prefix", async () => {
    await lifecycle.handleJoined({ guildId: "123", ownerId: "456", memberCount: 3 });
    await temp.store.updatePrefix("123", "!");
    await cache.upsert("123", (current) => ({ ...current, prefix: "!" }), () => {
      throw new Error("unexpected seed");
    });

    const again = await lifecycle.handleJoined({
      guildId: "123",
      ownerId: "789",
      memberCount: 3,
    });

    expect(again.ok && again.value.prefix).toBe("!");
    expect((await temp.store.get("123"))?.prefix).toBe("!");
    expect((await temp.store.get("123"))?.ownerId).toBe("456");
  });

  test("retries a failing store write", async () => {
    store.failNext("upsert", 2);

    const result = await lifecycle.handleJoined({
      guildId: "123",
      ownerId: "456",
      memberCount: 3,
    });

    expect(result.ok).toBe(true);
    expect(store.calls.filter((call) => call === "upsert")).toHaveLength(3);
    expect(lifecycle.pendingCount).toBe(0);
  });

  test("exhausted retries queue the event and leave the cache alone", async () => {
    store.failNext("upsert", 3);

    const result = await lifecycle.handleJoined({
      guildId: "123",
      ownerId: "456",
      memberCount: 3,
    });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("store_write_failure");
    expect(await cache.get("123")).toBeUndefined();
    expect(await temp.store.get("123")).toBeNull();
    expect(lifecycle.pendingCount).toBe(1);
    expect(lifecycle.stateOf("123")).toBe("unknown");

    const retried = await lifecycle.retryPending();
    expect(retried).toEqual({ processed: 1, failed: 0 });
    expect(lifecycle.pendingCount).toBe(0);
    expect((await cache.get("123"))?.ownerId).toBe("456");
  });

  test("rejects ids that are not snowflakes", async () => {
    const result = await lifecycle.handleJoined({
      guildId: "not-a-guild",
      ownerId: "456",
      memberCount: 3,
    });

    expect(!result.ok && result.error.kind).toBe("validation_error");
    expect(store.calls).toEqual([]);
  });
});

describe("handleLeft", () => {
  test("deletes from the store and the cache", async () => {
    await lifecycle.handleJoined({ guildId: "123", ownerId: "456", memberCount: 3 });

    const result = await lifecycle.handleLeft({ guildId: "123" });

    expect(result.ok && result.value?.guildId).toBe("123");
    expect(await temp.store.get("123")).toBeNull();
    expect(await cache.get("123")).toBeUndefined();
    expect(lifecycle.stateOf("123")).toBe("removed");
  });

  test("leaving an unknown guild succeeds", async () => {
    const result = await lifecycle.handleLeft({ guildId: "999" });

    expect(result).toEqual({ ok: true, value: undefined });
  });

  test("a failed delete keeps the cache entry until retried", async () => {
    await lifecycle.handleJoined({ guildId: "123", ownerId: "456", memberCount: 3 });
    store.failNext("delete", 3);

    const result = await lifecycle.handleLeft({ guildId: "123" });

    expect(result.ok).toBe(false);
    expect((await cache.get("123"))?.guildId).toBe("123");
    expect(lifecycle.pendingCount).toBe(1);

    store.failNext("delete", 3);
    expect(await lifecycle.retryPending()).toEqual({ processed: 0, failed: 1 });
    expect(lifecycle.pendingCount).toBe(1);

    expect(await lifecycle.retryPending()).toEqual({ processed: 1, failed: 0 });
    expect(await cache.get("123")).toBeUndefined();
  });

  test("a successful later event clears the queued one", async () => {
    store.failNext("upsert", 3);
    await lifecycle.handleJoined({ guildId: "123", ownerId: "456", memberCount: 3 });

    await lifecycle.handleLeft({ guildId: "123" });

    expect(lifecycle.pendingCount).toBe(0);
    expect(lifecycle.stateOf("123")).toBe("removed");
    expect(await lifecycle.retryPending()).toEqual({ processed: 0, failed: 0 });
  });
});

describe("retryPending", () => {
  test("skips a queued join once the guild has been left", async () => {
    const single = new LifecycleHandler(store, cache, {
      attempts: 0,
      baseDelayMs: 1,
    });
    store.failNext("upsert", 2);
    await single.handleJoined({ guildId: "111", ownerId: "1", memberCount: 3 });
    await single.handleJoined({ guildId: "222", ownerId: "1", memberCount: 3 });
    expect(single.pendingCount).toBe(2);

    const release = store.hold("upsert");
    const replaying = single.retryPending();
    await waitUntil(
      () => store.calls.filter((call) => call === "upsert").length === 3,
      1000,
    );
    const leaving = single.handleLeft({ guildId: "222" });
    release();

    expect(await replaying).toEqual({ processed: 1, failed: 0 });
    expect((await leaving).ok).toBe(true);
    expect((await cache.get("111"))?.ownerId).toBe("1");
    expect(await cache.get("222")).toBeUndefined();
    expect(await temp.store.get("222")).toBeNull();
    expect(single.stateOf("222")).toBe("removed");
    expect(single.pendingCount).toBe(0);
  });

  test("a live event waits for the replay and its failure stays queued", async () => {
    const single = new LifecycleHandler(store, cache, {
      attempts: 0,
      baseDelayMs: 1,
    });
    store.failNext("upsert", 1);
    await single.handleJoined({ guildId: "111", ownerId: "1", memberCount: 3 });

    const release = store.hold("upsert");
    const replaying = single.retryPending();
    await waitUntil(() => store.calls.length === 2, 1000);
    store.failNext("delete", 1);
    const leaving = single.handleLeft({ guildId: "111" });
    release();

    expect(await replaying).toEqual({ processed: 1, failed: 0 });
    expect((await leaving).ok).toBe(false);
    expect(single.pendingCount).toBe(1);
    expect((await cache.get("111"))?.ownerId).toBe("1");

    expect(await single.retryPending()).toEqual({ processed: 1, failed: 0 });
    expect(await cache.get("111")).toBeUndefined();
  });
});

describe("failure logging", () => {
  test("a queued event is logged under lifecycle.write_failed", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    store.failNext("upsert", 3);

    await lifecycle.handleJoined({ guildId: "123", ownerId: "456", memberCount: 3 });

    const lines = stderr.mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(lines).toContainEqual(
      expect.objectContaining({
        level: "error",
        event: "lifecycle.write_failed",
        lifecycleEvent: "joined",
        guildId: "123",
        pending: 1,
      }),
    );
  });
});
