import type { GuildSettings } from "@guildwarden/domain";
import { ReadWriteLock } from "@warden-core/src/concurrency";

export type SettingsMutator = (current: GuildSettings) => GuildSettings;

const copy = (settings: GuildSettings): GuildSettings => ({ ...settings });

/**
 * In-memory mirror of the guild settings store, keyed by guild id.
 *
 * One reader/writer lock guards the whole map. Every critical section is
 * synchronous, so the lock is released before any caller goes on to store
 * I/O. Entries handed out are copies; the cache is the only owner of the
 * live values.
 */
export class GuildSettingsCache {
  private readonly entries = new Map<string, GuildSettings>();
  private readonly lock = new ReadWriteLock();

  async get(guildId: string): Promise<GuildSettings | undefined> {
    return this.lock.withRead(() => {
      const entry = this.entries.get(guildId);
      return entry ? copy(entry) : undefined;
    });
  }

  /**
   * Applies `mutate` to the current entry, or to `seed()` when the guild is
   * not cached yet, and stores the result in one step.
   */
  async upsert(
    guildId: string,
    mutate: SettingsMutator,
    seed: () => GuildSettings,
  ): Promise<GuildSettings> {
    return this.lock.withWrite(() => {
      const current = this.entries.get(guildId) ?? seed();
      const next = { ...mutate(copy(current)), guildId };
      this.entries.set(guildId, next);
      return copy(next);
    });
  }

  async remove(guildId: string): Promise<GuildSettings | undefined> {
    return this.lock.withWrite(() => {
      const entry = this.entries.get(guildId);
      this.entries.delete(guildId);
      return entry ? copy(entry) : undefined;
    });
  }

  async size(): Promise<number> {
    return this.lock.withRead(() => this.entries.size);
  }

  async hydrate(settings: GuildSettings[]): Promise<number> {
    return this.lock.withWrite(() => {
      for (const entry of settings) {
        this.entries.set(entry.guildId, copy(entry));
      }
      return this.entries.size;
    });
  }
}

export const keepExisting: SettingsMutator = (current) => current;

export const setPrefix =
  (prefix: string): SettingsMutator =>
  (current) => ({ ...current, prefix });
