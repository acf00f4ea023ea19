import {
  defaultGuildSettings,
  type GuildLifecycleEvent,
  type GuildLifecycleState,
  type GuildSettings,
  isSnowflake,
  type Result,
  transitionGuild,
  WardenError,
} from "@guildwarden/domain";
import type { GuildSettingsStore } from "@guildwarden/ports";
import { ReadWriteLock } from "@warden-core/src/concurrency";
import {
  type GuildSettingsCache,
  keepExisting,
} from "@warden-core/src/guild-cache";
import {
  logError,
  logInfo,
  logWarn,
  nowIso,
} from "@warden-core/src/logging";
import { Duration, Effect, Either, Schedule } from "effect";

export type GuildJoinedInput = {
  guildId: string;
  ownerId: string;
  memberCount: number;
  name?: string;
};

export type GuildLeftInput = {
  guildId: string;
};

type PendingLifecycleEvent =
  | { event: "joined"; input: GuildJoinedInput; failedAt: string }
  | { event: "left"; input: GuildLeftInput; failedAt: string };

export type LifecycleRetryOptions = {
  /** Retries after the first attempt. 0 disables retrying. */
  attempts: number;
  baseDelayMs: number;
};

const DEFAULT_RETRY: LifecycleRetryOptions = { attempts: 3, baseDelayMs: 250 };

/**
 * Keeps the store and the cache in lockstep as guilds are joined and left.
 * The durable write always happens first; the cache follows only once the
 * store has confirmed. A write that still fails after the retry schedule
 * leaves the event queued for `retryPending` instead of failing the process.
 *
 * Live events and replays run one at a time, so a replay never interleaves
 * with a newer event for the same guild.
 */
export class LifecycleHandler {
  private readonly states = new Map<string, GuildLifecycleState>();
  private readonly pending = new Map<string, PendingLifecycleEvent>();
  private readonly retry: LifecycleRetryOptions;
  private readonly serial = new ReadWriteLock();

  constructor(
    private readonly store: GuildSettingsStore,
    private readonly cache: GuildSettingsCache,
    retry: Partial<LifecycleRetryOptions> = {},
  ) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  /** Guilds loaded from the store at startup are already tracked. */
  markTracked(guildIds: Iterable<string>): void {
    for (const guildId of guildIds) {
      this.states.set(guildId, "tracked");
    }
  }

  stateOf(guildId: string): GuildLifecycleState {
    return this.states.get(guildId) ?? "unknown";
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async handleJoined(input: GuildJoinedInput): Promise<Result<GuildSettings>> {
    return this.serial.withWrite(() => this.applyJoined(input));
  }

  async handleLeft(
    input: GuildLeftInput,
  ): Promise<Result<GuildSettings | undefined>> {
    return this.serial.withWrite(() => this.applyLeft(input));
  }

  /**
   * Re-runs every queued event once. Failures are queued again; an entry
   * superseded by a later event for its guild is skipped.
   */
  async retryPending(): Promise<{ processed: number; failed: number }> {
    const queued = [...this.pending.values()];
    let processed = 0;
    let failed = 0;

    for (const entry of queued) {
      const outcome = await this.serial.withWrite(() => this.replay(entry));
      if (outcome === "processed") {
        processed += 1;
      } else if (outcome === "failed") {
        failed += 1;
      }
    }

    if (queued.length > 0) {
      logInfo("lifecycle.pending_retried", {
        queued: queued.length,
        processed,
        failed,
      });
    }
    return { processed, failed };
  }

  private async replay(
    entry: PendingLifecycleEvent,
  ): Promise<"processed" | "failed" | "superseded"> {
    if (this.pending.get(entry.input.guildId) !== entry) {
      return "superseded";
    }
    const result =
      entry.event === "joined"
        ? await this.applyJoined(entry.input)
        : await this.applyLeft(entry.input);
    return result.ok ? "processed" : "failed";
  }

  private async applyJoined(
    input: GuildJoinedInput,
  ): Promise<Result<GuildSettings>> {
    const invalid = this.validateIds(input.guildId, input.ownerId);
    if (invalid) {
      return { ok: false, error: invalid };
    }

    const transition = this.describeTransition(input.guildId, "joined");
    const defaults = defaultGuildSettings(input.guildId, input.ownerId);
    const persist = this.storeWrite("insert", input.guildId, () =>
      this.store.upsert(defaults),
    );
    const cache = this.cache;

    const program = Effect.gen(function* () {
      yield* persist;
      return yield* Effect.promise(() =>
        cache.upsert(input.guildId, keepExisting, () => defaults),
      );
    });

    const outcome = await Effect.runPromise(Effect.either(program));
    if (Either.isLeft(outcome)) {
      this.enqueue({ event: "joined", input, failedAt: nowIso() });
      return { ok: false, error: outcome.left };
    }

    this.states.set(input.guildId, "tracked");
    this.pending.delete(input.guildId);
    logInfo("lifecycle.joined", {
      guildId: input.guildId,
      ownerId: input.ownerId,
      memberCount: input.memberCount,
      name: input.name ?? null,
      transition,
      prefix: outcome.right.prefix,
    });
    return { ok: true, value: outcome.right };
  }

  private async applyLeft(
    input: GuildLeftInput,
  ): Promise<Result<GuildSettings | undefined>> {
    const invalid = this.validateIds(input.guildId);
    if (invalid) {
      return { ok: false, error: invalid };
    }

    const transition = this.describeTransition(input.guildId, "left");
    const persist = this.storeWrite("delete", input.guildId, () =>
      this.store.delete(input.guildId),
    );
    const cache = this.cache;

    const program = Effect.gen(function* () {
      yield* persist;
      return yield* Effect.promise(() => cache.remove(input.guildId));
    });

    const outcome = await Effect.runPromise(Effect.either(program));
    if (Either.isLeft(outcome)) {
      this.enqueue({ event: "left", input, failedAt: nowIso() });
      return { ok: false, error: outcome.left };
    }

    this.states.set(input.guildId, "removed");
    this.pending.delete(input.guildId);
    logInfo("lifecycle.left", {
      guildId: input.guildId,
      transition,
      wasCached: outcome.right !== undefined,
    });
    return { ok: true, value: outcome.right };
  }

  private storeWrite(
    operation: "insert" | "delete",
    guildId: string,
    run: () => Promise<void>,
  ): Effect.Effect<void, WardenError> {
    const schedule = Schedule.exponential(
      Duration.millis(this.retry.baseDelayMs),
    ).pipe(Schedule.intersect(Schedule.recurs(this.retry.attempts)));

    return Effect.tryPromise({
      try: run,
      catch: (cause) =>
        new WardenError(
          "store_write_failure",
          `Failed to ${operation} settings for guild ${guildId}: ${String(cause)}`,
          { cause },
        ),
    }).pipe(
      Effect.tapError((error) =>
        Effect.sync(() =>
          logWarn("lifecycle.write_attempt_failed", {
            guildId,
            operation,
            error: error.message,
          }),
        ),
      ),
      Effect.retry(schedule),
    );
  }

  private describeTransition(
    guildId: string,
    event: GuildLifecycleEvent,
  ): string {
    const from = this.stateOf(guildId);
    const transition = transitionGuild(from, event);
    return transition.ok ? `${from}->${transition.next}` : transition.reason;
  }

  private validateIds(...ids: string[]): WardenError | null {
    const bad = ids.find((id) => !isSnowflake(id));
    if (bad === undefined) {
      return null;
    }
    return new WardenError("validation_error", `Invalid snowflake id: ${bad}`);
  }

  private enqueue(entry: PendingLifecycleEvent): void {
    this.pending.set(entry.input.guildId, entry);
    logError("lifecycle.write_failed", {
      guildId: entry.input.guildId,
      lifecycleEvent: entry.event,
      failedAt: entry.failedAt,
      pending: this.pending.size,
    });
  }
}
