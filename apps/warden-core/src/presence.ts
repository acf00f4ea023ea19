import type { GatewayPort } from "@guildwarden/ports";
import { SingleShot } from "@warden-core/src/concurrency";
import type { GuildSettingsCache } from "@warden-core/src/guild-cache";
import { logInfo, logWarn } from "@warden-core/src/logging";
import { sleep } from "@warden-core/src/timers";

export const DEFAULT_PRESENCE_INTERVAL_MS = 3_000;

export const formatPresence = (guildCount: number): string =>
  `Monitoring a total of ${guildCount} guilds | -help`;

export type PresenceLoopOptions = {
  intervalMs?: number;
  stopSignal?: AbortSignal;
};

/**
 * Republishes the guild count as the bot's presence on a fixed interval.
 *
 * The cache-ready signal recurs on every reconnect; `launch` forwards each
 * one to a single-shot supervisor, so only the first starts the loop.
 * Publishing is best-effort: a failed tick is logged and the next tick
 * tries again.
 */
export class PresenceLoop {
  private readonly supervisor = new SingleShot("presence_loop");
  private readonly intervalMs: number;
  private ticks = 0;

  constructor(
    private readonly cache: GuildSettingsCache,
    private readonly gateway: Pick<GatewayPort, "setPresence">,
    private readonly options: PresenceLoopOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_PRESENCE_INTERVAL_MS;
  }

  launch(): boolean {
    const launched = this.supervisor.start(() => this.run());
    if (launched) {
      logInfo("presence.loop_started", { intervalMs: this.intervalMs });
    }
    return launched;
  }

  get isLaunched(): boolean {
    return this.supervisor.started;
  }

  get tickCount(): number {
    return this.ticks;
  }

  whenStopped(): Promise<void> {
    return this.supervisor.whenSettled();
  }

  async tick(): Promise<void> {
    this.ticks += 1;
    const status = formatPresence(await this.cache.size());
    try {
      await this.gateway.setPresence(status);
    } catch (error) {
      logWarn("presence.publish_failed", { status, error: String(error) });
    }
  }

  private async run(): Promise<void> {
    const signal = this.options.stopSignal;
    while (!signal?.aborted) {
      await this.tick();
      await sleep(this.intervalMs, signal);
    }
    logInfo("presence.loop_stopped", { ticks: this.ticks });
  }
}
