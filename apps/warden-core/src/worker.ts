import {
  DEFAULT_PREFIX,
  type GuildSettings,
  isStoreFailure,
  WardenError,
} from "@guildwarden/domain";
import type {
  GatewayEvent,
  InboundCommandMessage,
  OutboundReply,
} from "@guildwarden/ports";
import { isPrefixCommand, parseCommand } from "@warden-core/src/commands";
import { logError, logInfo } from "@warden-core/src/logging";
import { WorkerContext } from "@warden-core/src/worker-context";
import type { WorkerDeps, WorkerOptions } from "@warden-core/src/worker-types";

export { WorkerContext } from "@warden-core/src/worker-context";

const sendReply = async (
  deps: WorkerDeps,
  reply: OutboundReply,
  fields: { command: string; outcome: string },
): Promise<void> => {
  try {
    await deps.gateway.sendReply(reply);
    logInfo("chat.reply.sent", { channelId: reply.channelId, ...fields });
  } catch (error) {
    logError("chat.reply.failed", {
      channelId: reply.channelId,
      ...fields,
      error: String(error),
    });
  }
};

const resolvePrefix = async (
  ctx: WorkerContext,
  guildId: string | null,
): Promise<string> => {
  if (guildId === null) {
    return DEFAULT_PREFIX;
  }
  return (await ctx.cache.get(guildId))?.prefix ?? DEFAULT_PREFIX;
};

export const handleCommandMessage = async (
  ctx: WorkerContext,
  deps: WorkerDeps,
  message: InboundCommandMessage,
): Promise<void> => {
  if (message.authorIsBot) {
    return;
  }

  const prefix = await resolvePrefix(ctx, message.guildId);
  const command = parseCommand(message.content, prefix);
  if (!command || !isPrefixCommand(command)) {
    return;
  }

  const outcome = await ctx.prefixCommand.execute({
    guildId: message.guildId,
    channelId: message.channelId,
    invokerId: message.authorId,
    argument: command.argument,
  });

  logInfo("command.prefix.handled", {
    guildId: message.guildId,
    invokerId: message.authorId,
    outcome: outcome.kind,
  });
  await sendReply(deps, outcome.reply, {
    command: command.name,
    outcome: outcome.kind,
  });
};

export const handleGatewayEvent = async (
  ctx: WorkerContext,
  deps: WorkerDeps,
  event: GatewayEvent,
): Promise<void> => {
  switch (event.type) {
    case "guild_joined": {
      const result = await ctx.lifecycle.handleJoined(event);
      if (!result.ok) {
        logError("gateway.guild_joined.unprocessed", {
          guildId: event.guildId,
          kind: result.error.kind,
          queued: isStoreFailure(result.error),
        });
      }
      return;
    }
    case "guild_left": {
      const result = await ctx.lifecycle.handleLeft(event);
      if (!result.ok) {
        logError("gateway.guild_left.unprocessed", {
          guildId: event.guildId,
          kind: result.error.kind,
          queued: isStoreFailure(result.error),
        });
      }
      return;
    }
    case "cache_ready": {
      logInfo("gateway.cache_ready", {
        guildIds: event.guildIds.length,
        cached: await ctx.cache.size(),
      });
      ctx.presence.launch();
      await ctx.lifecycle.retryPending();
      return;
    }
    case "message":
      await handleCommandMessage(ctx, deps, event.message);
      return;
  }
};

/**
 * Loads stored settings into a fresh context and subscribes it to the
 * gateway. A failed initial load is a `store_read_failure` and nothing is
 * subscribed.
 */
export const bootWorker = async (
  deps: WorkerDeps,
  options: WorkerOptions = {},
): Promise<WorkerContext> => {
  const ctx = new WorkerContext(deps, options);

  let stored: GuildSettings[];
  try {
    stored = await deps.store.listAll();
  } catch (cause) {
    throw new WardenError(
      "store_read_failure",
      "Failed to load guild settings at startup",
      { cause },
    );
  }

  const cached = await ctx.hydrate(stored);
  logInfo("worker.cache_hydrated", { guilds: cached });

  await deps.gateway.start((event) => handleGatewayEvent(ctx, deps, event));
  logInfo("worker.gateway_started");
  return ctx;
};

/** Runs the worker until `stopSignal` aborts, then disconnects. */
export const startGatewayWorker = async (
  deps: WorkerDeps,
  options: WorkerOptions & { stopSignal: AbortSignal },
): Promise<void> => {
  const ctx = await bootWorker(deps, options);
  const { stopSignal } = options;

  await new Promise<void>((resolve) => {
    if (stopSignal.aborted) {
      resolve();
      return;
    }
    stopSignal.addEventListener("abort", () => resolve(), { once: true });
  });

  await deps.gateway.stop();
  await ctx.presence.whenStopped();
  logInfo("worker.stopped", {
    pendingLifecycleEvents: ctx.lifecycle.pendingCount,
  });
};
