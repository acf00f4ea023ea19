import {
  DEFAULT_PREFIX,
  defaultGuildSettings,
  type GuildSettings,
  type Result,
  validatePrefix,
  WardenError,
} from "@guildwarden/domain";
import type {
  GuildSettingsStore,
  OutboundReply,
  PermissionOracle,
} from "@guildwarden/ports";
import {
  type GuildSettingsCache,
  keepExisting,
  setPrefix,
} from "@warden-core/src/guild-cache";
import { logError, logInfo } from "@warden-core/src/logging";

export type PrefixCommandInput = {
  guildId: string | null;
  channelId: string;
  invokerId: string;
  argument: string;
};

export type PrefixOutcome =
  | { kind: "missing_context"; reply: OutboundReply }
  | { kind: "permission_denied"; reply: OutboundReply }
  | { kind: "shown"; prefix: string; reply: OutboundReply }
  | { kind: "validation_error"; reply: OutboundReply }
  | { kind: "updated"; prefix: string; reply: OutboundReply }
  | { kind: "failed"; error: WardenError; reply: OutboundReply };

const TITLE = "Prefix";

const reply = (
  channelId: string,
  description: string,
  footer?: string,
): OutboundReply =>
  footer === undefined
    ? { channelId, title: TITLE, description }
    : { channelId, title: TITLE, description, footer };

export const prefixReplies = {
  directMessage: (channelId: string) =>
    reply(
      channelId,
      `The bot's default prefix is \`\`\`${DEFAULT_PREFIX}\`\`\``,
      `Use \`${DEFAULT_PREFIX}prefix <new prefix>\` to change it in a server.`,
    ),
  denied: (channelId: string) =>
    reply(
      channelId,
      "You must be an administrator to use this command.",
      `Use \`${DEFAULT_PREFIX}prefix <new prefix>\` to change it in a server.`,
    ),
  current: (channelId: string, prefix: string) =>
    reply(
      channelId,
      `The bot's prefix in this server is \`\`\`${prefix}\`\`\``,
      `Use \`${prefix}prefix <new prefix>\` to change it.`,
    ),
  whitespace: (channelId: string) =>
    reply(channelId, "Prefixes cannot contain spaces."),
  updated: (channelId: string, prefix: string) =>
    reply(channelId, `Prefix set to \`\`\`${prefix}\`\`\``),
  failed: (channelId: string) =>
    reply(
      channelId,
      "Something went wrong while saving the prefix. Please try again later.",
    ),
};

/**
 * `prefix [new_prefix]`: shows or changes the guild's command prefix.
 *
 * Changes are written through: the store is updated first and the cache is
 * only touched once the store has confirmed, so a failed write leaves both
 * sides on the old prefix.
 */
export class PrefixCommand {
  constructor(
    private readonly cache: GuildSettingsCache,
    private readonly store: GuildSettingsStore,
    private readonly permissions: PermissionOracle,
  ) {}

  async execute(input: PrefixCommandInput): Promise<PrefixOutcome> {
    const { guildId, channelId } = input;
    if (guildId === null) {
      return {
        kind: "missing_context",
        reply: prefixReplies.directMessage(channelId),
      };
    }

    if (!(await this.isAdministrator(guildId, input.invokerId))) {
      return {
        kind: "permission_denied",
        reply: prefixReplies.denied(channelId),
      };
    }

    const validation = validatePrefix(input.argument);
    if (!validation.ok && validation.reason === "EMPTY") {
      return this.showCurrent(guildId, channelId);
    }
    if (!validation.ok) {
      return {
        kind: "validation_error",
        reply: prefixReplies.whitespace(channelId),
      };
    }

    return this.update(guildId, channelId, input.invokerId, validation.prefix);
  }

  private async isAdministrator(
    guildId: string,
    invokerId: string,
  ): Promise<boolean> {
    try {
      return await this.permissions.isAdministrator(guildId, invokerId);
    } catch (error) {
      // An unresolvable member is treated as lacking permission.
      logError("command.prefix.permission_lookup_failed", {
        guildId,
        invokerId,
        error: String(error),
      });
      return false;
    }
  }

  private async showCurrent(
    guildId: string,
    channelId: string,
  ): Promise<PrefixOutcome> {
    const cached = await this.cache.get(guildId);
    if (cached) {
      return {
        kind: "shown",
        prefix: cached.prefix,
        reply: prefixReplies.current(channelId, cached.prefix),
      };
    }

    const loaded = await this.loadFromStore(guildId);
    if (!loaded.ok) {
      return this.fail(channelId, loaded.error);
    }

    const stored = loaded.value;
    if (!stored) {
      const missing = new WardenError(
        "not_found",
        `No settings stored for guild ${guildId}`,
      );
      logInfo("command.prefix.not_found", {
        guildId,
        kind: missing.kind,
        error: missing.message,
      });
      return {
        kind: "shown",
        prefix: DEFAULT_PREFIX,
        reply: prefixReplies.current(channelId, DEFAULT_PREFIX),
      };
    }

    const entry = await this.cache.upsert(guildId, keepExisting, () => stored);
    return {
      kind: "shown",
      prefix: entry.prefix,
      reply: prefixReplies.current(channelId, entry.prefix),
    };
  }

  private async loadFromStore(
    guildId: string,
  ): Promise<Result<GuildSettings | null>> {
    try {
      return { ok: true, value: await this.store.get(guildId) };
    } catch (cause) {
      return {
        ok: false,
        error: new WardenError(
          "store_read_failure",
          `Failed to load settings for guild ${guildId}`,
          { cause },
        ),
      };
    }
  }

  private async update(
    guildId: string,
    channelId: string,
    invokerId: string,
    prefix: string,
  ): Promise<PrefixOutcome> {
    const base = await this.resolveBase(guildId, invokerId);
    if (!base.ok) {
      return this.fail(channelId, base.error);
    }
    const seed = base.value;

    try {
      await this.store.upsert(seed);
      await this.store.updatePrefix(guildId, prefix);
    } catch (cause) {
      return this.fail(
        channelId,
        new WardenError(
          "store_write_failure",
          `Failed to save prefix for guild ${guildId}`,
          { cause },
        ),
      );
    }

    const updated = await this.cache.upsert(
      guildId,
      setPrefix(prefix),
      () => seed,
    );

    logInfo("command.prefix.set", {
      guildId,
      invokerId,
      prefix: updated.prefix,
    });
    return {
      kind: "updated",
      prefix: updated.prefix,
      reply: prefixReplies.updated(channelId, updated.prefix),
    };
  }

  private async resolveBase(
    guildId: string,
    invokerId: string,
  ): Promise<Result<GuildSettings>> {
    const cached = await this.cache.get(guildId);
    if (cached) {
      return { ok: true, value: cached };
    }

    const loaded = await this.loadFromStore(guildId);
    if (!loaded.ok) {
      return loaded;
    }
    // A guild missing from both stores is created on first change; the
    // invoker stands in for the owner, as no join event recorded one.
    return {
      ok: true,
      value: loaded.value ?? defaultGuildSettings(guildId, invokerId),
    };
  }

  private fail(channelId: string, error: WardenError): PrefixOutcome {
    logError("command.prefix.failed", {
      kind: error.kind,
      error: error.message,
      cause: String(error.cause),
    });
    return { kind: "failed", error, reply: prefixReplies.failed(channelId) };
  }
}
