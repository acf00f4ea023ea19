import { defaultGuildSettings } from "@guildwarden/domain";
import {
  GuildSettingsCache,
  keepExisting,
  setPrefix,
} from "@warden-core/src/guild-cache";
import { describe, expect, test } from "vitest";

describe("GuildSettingsCache", () => {
  test("upsert seeds a missing guild", async () => {
    const cache = new GuildSettingsCache();
    const entry = await cache.upsert("123", keepExisting, () =>
      defaultGuildSettings("123", "456"),
    );

    expect(entry).toEqual({
      guildId: "123",
      prefix: "-",
      ownerId: "456",
      muteType: "timeout",
      muteRoleId: "0",
    });
    expect(await cache.size()).toBe(1);
  });

  test("keepExisting leaves a cached entry untouched", async () => {
    const cache = new GuildSettingsCache();
    await cache.upsert("123", setPrefix("!"), () =>
      defaultGuildSettings("123", "456"),
    );

    const entry = await cache.upsert("123", keepExisting, () =>
      defaultGuildSettings("123", "999"),
    );
    expect(entry.prefix).toBe("!");
    expect(entry.ownerId).toBe("456");
  });

  test("returned entries are copies", async () => {
    const cache = new GuildSettingsCache();
    const entry = await cache.upsert("123", keepExisting, () =>
      defaultGuildSettings("123", "456"),
    );
    entry.prefix = "mutated";

    const fetched = await cache.get("123");
    expect(fetched?.prefix).toBe("-");
  });

  test("remove returns the evicted entry once", async () => {
    const cache = new GuildSettingsCache();
    await cache.upsert("123", keepExisting, () =>
      defaultGuildSettings("123", "456"),
    );

    expect((await cache.remove("123"))?.ownerId).toBe("456");
    expect(await cache.remove("123")).toBeUndefined();
    expect(await cache.get("123")).toBeUndefined();
    expect(await cache.size()).toBe(0);
  });

  test("hydrate loads many entries", async () => {
    const cache = new GuildSettingsCache();
    const size = await cache.hydrate([
      { ...defaultGuildSettings("1", "10"), prefix: "?" },
      defaultGuildSettings("2", "20"),
    ]);

    expect(size).toBe(2);
    expect((await cache.get("1"))?.prefix).toBe("?");
  });

  test("concurrent upserts on one guild do not lose updates", async () => {
    const cache = new GuildSettingsCache();
    const seed = () => defaultGuildSettings("123", "456");

    await Promise.all(
      ["a", "b", "c", "d"].map((suffix) =>
        cache.upsert(
          "123",
          (current) => ({ ...current, prefix: current.prefix + suffix }),
          seed,
        ),
      ),
    );

    expect((await cache.get("123"))?.prefix).toBe("-abcd");
  });
});
