import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { type GuildSettings, parseMuteType } from "@guildwarden/domain";
import type { GuildSettingsStore } from "@guildwarden/ports";

type GuildSettingsRow = {
  guild_id: bigint;
  prefix: string;
  owner_id: bigint;
  mute_type: string;
  mute_role: bigint;
};

// SQLite integers are signed 64-bit; unsigned ids are stored by their
// two's-complement bit pattern.
const toSqlId = (id: string): bigint => BigInt.asIntN(64, BigInt(id));
const fromSqlId = (value: bigint): string =>
  BigInt.asUintN(64, value).toString();

const asRow = (settings: GuildSettings) => ({
  guild_id: toSqlId(settings.guildId),
  prefix: settings.prefix,
  owner_id: toSqlId(settings.ownerId),
  mute_type: settings.muteType,
  mute_role: toSqlId(settings.muteRoleId),
});

const fromRow = (row: GuildSettingsRow): GuildSettings => ({
  guildId: fromSqlId(row.guild_id),
  prefix: row.prefix,
  ownerId: fromSqlId(row.owner_id),
  muteType: parseMuteType(row.mute_type),
  muteRoleId: fromSqlId(row.mute_role),
});

const byGuildId = (a: GuildSettings, b: GuildSettings): number => {
  const left = BigInt(a.guildId);
  const right = BigInt(b.guildId);
  return left < right ? -1 : left > right ? 1 : 0;
};

/**
 * Durable guild settings, one row per guild. Snowflakes are bound and read
 * as BigInt so ids above 2^53 survive the round trip.
 */
export class SqliteGuildSettingsStore implements GuildSettingsStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.dbPath), { recursive: true });
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.exec(`
      CREATE TABLE IF NOT EXISTS guild_settings (
        guild_id INTEGER PRIMARY KEY,
        prefix TEXT NOT NULL,
        owner_id INTEGER NOT NULL,
        mute_type TEXT NOT NULL DEFAULT 'timeout',
        mute_role INTEGER NOT NULL DEFAULT 0
      );
    `);
    this.db = db;
  }

  async ping(): Promise<void> {
    this.ensureDb().prepare("SELECT 1 as ok").get();
  }

  async upsert(settings: GuildSettings): Promise<void> {
    this.ensureDb()
      .prepare<ReturnType<typeof asRow>>(
        `
          INSERT INTO guild_settings (guild_id, prefix, owner_id, mute_type, mute_role)
          VALUES ($guild_id, $prefix, $owner_id, $mute_type, $mute_role)
          ON CONFLICT(guild_id) DO NOTHING
        `,
      )
      .run(asRow(settings));
  }

  async updatePrefix(guildId: string, prefix: string): Promise<void> {
    this.ensureDb()
      .prepare<{ guild_id: bigint; prefix: string }>(
        `
          UPDATE guild_settings
          SET prefix = $prefix
          WHERE guild_id = $guild_id
        `,
      )
      .run({ guild_id: toSqlId(guildId), prefix });
  }

  async delete(guildId: string): Promise<void> {
    this.ensureDb()
      .prepare<{ guild_id: bigint }>(
        `DELETE FROM guild_settings WHERE guild_id = $guild_id`,
      )
      .run({ guild_id: toSqlId(guildId) });
  }

  async get(guildId: string): Promise<GuildSettings | null> {
    const row = this.ensureDb()
      .prepare<{ guild_id: bigint }, GuildSettingsRow>(
        `
          SELECT guild_id, prefix, owner_id, mute_type, mute_role
          FROM guild_settings
          WHERE guild_id = $guild_id
        `,
      )
      .safeIntegers(true)
      .get({ guild_id: toSqlId(guildId) });

    return row ? fromRow(row) : null;
  }

  async listAll(): Promise<GuildSettings[]> {
    const rows = this.ensureDb()
      .prepare<[], GuildSettingsRow>(
        `
          SELECT guild_id, prefix, owner_id, mute_type, mute_role
          FROM guild_settings
        `,
      )
      .safeIntegers(true)
      .all();

    return rows.map(fromRow).sort(byGuildId);
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new Error("SqliteGuildSettingsStore is not initialized");
    }
    return this.db;
  }
}
