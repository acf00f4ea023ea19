import {
  ActivityType,
  type APIEmbed,
  Client,
  EmbedBuilder,
  Events,
  GatewayIntentBits,
  type Guild,
  type Message,
  PermissionFlagsBits,
  type ThreadChannel,
} from "discord.js";

import type {
  GatewayEvent,
  GatewayListener,
  GatewayPort,
  InboundCommandMessage,
  OutboundReply,
  PermissionOracle,
} from "@guildwarden/ports";

export const REPLY_COLOR = 0x008b_0000;

/**
 * Structured error for gateway calls that cannot be delivered.
 * Lets callers branch on `operation` instead of matching message text.
 */
export class DiscordGatewayError extends Error {
  readonly operation: "setPresence" | "sendReply" | "isAdministrator";

  constructor(
    operation: DiscordGatewayError["operation"],
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Discord ${operation} failed: ${message}`, options);
    this.name = "DiscordGatewayError";
    this.operation = operation;
  }
}

export const buildReplyEmbed = (reply: OutboundReply): APIEmbed => {
  const embed = new EmbedBuilder()
    .setColor(REPLY_COLOR)
    .setTitle(reply.title)
    .setDescription(reply.description);
  if (reply.footer) {
    embed.setFooter({ text: reply.footer });
  }
  return embed.toJSON();
};

export const mapGuildJoined = (guild: Guild): GatewayEvent => ({
  type: "guild_joined",
  guildId: guild.id,
  ownerId: guild.ownerId,
  memberCount: guild.memberCount,
  name: guild.name,
});

export const mapInboundMessage = (message: Message): InboundCommandMessage => ({
  guildId: message.guildId,
  channelId: message.channelId,
  authorId: message.author.id,
  authorIsBot: message.author.bot,
  content: message.content,
});

export type ReadySummary = {
  userId: string;
  tag: string;
  guildCount: number;
};

export const summarizeReady = (client: {
  user: { id: string; tag: string };
  guilds: { cache: { size: number } };
}): ReadySummary => ({
  userId: client.user.id,
  tag: client.user.tag,
  guildCount: client.guilds.cache.size,
});

export type DiscordGatewayOptions = {
  autoJoinThreads?: boolean;
  /** Receives failures of work the gateway runs on its own behalf. */
  onError: (error: unknown, context: string) => void;
  onThreadJoined?: (thread: { id: string; name: string }) => void;
  onReady?: (summary: ReadySummary) => void;
};

export class DiscordGatewayAdapter implements GatewayPort, PermissionOracle {
  private readonly client: Client;
  private listener: GatewayListener | null = null;

  constructor(
    private readonly botToken: string,
    private readonly options: DiscordGatewayOptions,
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });
  }

  async start(listener: GatewayListener): Promise<void> {
    this.listener = listener;

    this.client.once(Events.ClientReady, (ready) => {
      this.options.onReady?.(summarizeReady(ready));
      this.track("ready", this.replayKnownGuilds(ready.guilds.cache.values()));
    });
    this.client.on(Events.ShardResume, () => {
      this.emit({
        type: "cache_ready",
        guildIds: [...this.client.guilds.cache.keys()],
      });
    });
    this.client.on(Events.GuildCreate, (guild) => {
      this.emit(mapGuildJoined(guild));
    });
    this.client.on(Events.GuildDelete, (guild) => {
      this.emit({ type: "guild_left", guildId: guild.id });
    });
    this.client.on(Events.MessageCreate, (message) => {
      this.emit({ type: "message", message: mapInboundMessage(message) });
    });
    this.client.on(Events.ThreadCreate, (thread, newlyCreated) => {
      if (newlyCreated && this.options.autoJoinThreads !== false) {
        this.track("thread_join", this.joinThread(thread));
      }
    });

    await this.client.login(this.botToken);
  }

  async stop(): Promise<void> {
    this.listener = null;
    await this.client.destroy();
  }

  async setPresence(text: string): Promise<void> {
    const user = this.client.user;
    if (!user) {
      throw new DiscordGatewayError("setPresence", "client is not logged in");
    }
    user.setActivity(text, { type: ActivityType.Playing });
  }

  async sendReply(reply: OutboundReply): Promise<void> {
    const channel = await this.client.channels.fetch(reply.channelId);
    if (!channel?.isSendable()) {
      throw new DiscordGatewayError(
        "sendReply",
        `channel ${reply.channelId} does not accept messages`,
      );
    }
    await channel.send({ embeds: [buildReplyEmbed(reply)] });
  }

  async isAdministrator(guildId: string, userId: string): Promise<boolean> {
    try {
      const guild = await this.client.guilds.fetch(guildId);
      const member = await guild.members.fetch(userId);
      return member.permissions.has(PermissionFlagsBits.Administrator);
    } catch (error) {
      throw new DiscordGatewayError(
        "isAdministrator",
        `could not resolve member ${userId} in guild ${guildId}`,
        { cause: error },
      );
    }
  }

  // Guilds known at login are replayed as joins before the cache is
  // announced ready, so the store catches up on guilds added while offline.
  private async replayKnownGuilds(guilds: Iterable<Guild>): Promise<void> {
    const guildIds: string[] = [];
    for (const guild of guilds) {
      guildIds.push(guild.id);
      await this.deliver(mapGuildJoined(guild));
    }
    await this.deliver({ type: "cache_ready", guildIds });
  }

  private async joinThread(thread: ThreadChannel): Promise<void> {
    if (!thread.joinable || thread.joined) {
      return;
    }
    await thread.join();
    this.options.onThreadJoined?.({ id: thread.id, name: thread.name });
  }

  private emit(event: GatewayEvent): void {
    this.track(event.type, this.deliver(event));
  }

  private async deliver(event: GatewayEvent): Promise<void> {
    if (!this.listener) {
      return;
    }
    await this.listener(event);
  }

  private track(context: string, task: Promise<void>): void {
    task.catch((error: unknown) => {
      this.options.onError(error, context);
    });
  }
}
