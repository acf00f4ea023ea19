import { describe, expect, test } from "vitest";
import { BehaviorTestHarness } from "./test-harness";

describe("end to end", () => {
  test("join, change the prefix, leave", async () => {
    const harness = new BehaviorTestHarness({ admins: ["123:111"] });
    await harness.start();

    try {
      await harness.joinGuild("123", "456");
      expect((await harness.ctx.cache.get("123"))?.prefix).toBe("-");

      await harness.sendMessage("123", "111", "-prefix !");
      expect(harness.gateway.lastReply()?.description).toBe(
        "Prefix set to ```!```",
      );
      expect((await harness.ctx.cache.get("123"))?.prefix).toBe("!");
      expect((await harness.store.get("123"))?.prefix).toBe("!");

      await harness.leaveGuild("123");
      expect(await harness.ctx.cache.get("123")).toBeUndefined();
      expect(await harness.store.get("123")).toBeNull();
    } finally {
      await harness.stop();
    }
  });
});
