import type { GuildSettings } from "@guildwarden/domain";
import { GuildSettingsCache } from "@warden-core/src/guild-cache";
import { LifecycleHandler } from "@warden-core/src/lifecycle";
import { PrefixCommand } from "@warden-core/src/prefix-command";
import { PresenceLoop } from "@warden-core/src/presence";
import type { WorkerDeps, WorkerOptions } from "@warden-core/src/worker-types";

/**
 * Holds all per-process state for the worker. Every handler receives the
 * same context; there are no module globals.
 */
export class WorkerContext {
  readonly cache = new GuildSettingsCache();
  readonly lifecycle: LifecycleHandler;
  readonly prefixCommand: PrefixCommand;
  readonly presence: PresenceLoop;

  constructor(deps: WorkerDeps, options: WorkerOptions = {}) {
    this.lifecycle = new LifecycleHandler(deps.store, this.cache, {
      ...(options.lifecycleRetryAttempts === undefined
        ? {}
        : { attempts: options.lifecycleRetryAttempts }),
      ...(options.lifecycleRetryBaseMs === undefined
        ? {}
        : { baseDelayMs: options.lifecycleRetryBaseMs }),
    });
    this.prefixCommand = new PrefixCommand(
      this.cache,
      deps.store,
      deps.permissions,
    );
    this.presence = new PresenceLoop(this.cache, deps.gateway, {
      intervalMs: options.presenceIntervalMs,
      stopSignal: options.stopSignal,
    });
  }

  /** Loads every stored guild into the cache and marks it tracked. */
  async hydrate(settings: GuildSettings[]): Promise<number> {
    const size = await this.cache.hydrate(settings);
    this.lifecycle.markTracked(settings.map((entry) => entry.guildId));
    return size;
  }
}
