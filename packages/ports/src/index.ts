import type { GuildSettings } from "@guildwarden/domain";

export interface GuildSettingsStore {
  init(): Promise<void>;
  ping(): Promise<void>;
  /** Insert-or-ignore: an existing row, custom prefix included, is kept. */
  upsert(settings: GuildSettings): Promise<void>;
  updatePrefix(guildId: string, prefix: string): Promise<void>;
  delete(guildId: string): Promise<void>;
  get(guildId: string): Promise<GuildSettings | null>;
  listAll(): Promise<GuildSettings[]>;
}

export interface PermissionOracle {
  isAdministrator(guildId: string, userId: string): Promise<boolean>;
}

export type InboundCommandMessage = {
  guildId: string | null;
  channelId: string;
  authorId: string;
  authorIsBot: boolean;
  content: string;
};

export type GatewayEvent =
  | {
      type: "guild_joined";
      guildId: string;
      ownerId: string;
      memberCount: number;
      name: string;
    }
  | { type: "guild_left"; guildId: string }
  | { type: "cache_ready"; guildIds: string[] }
  | { type: "message"; message: InboundCommandMessage };

export type GatewayListener = (event: GatewayEvent) => Promise<void>;

export type OutboundReply = {
  channelId: string;
  title: string;
  description: string;
  footer?: string;
};

export interface GatewayPort {
  start(listener: GatewayListener): Promise<void>;
  stop(): Promise<void>;
  setPresence(text: string): Promise<void>;
  sendReply(reply: OutboundReply): Promise<void>;
}
