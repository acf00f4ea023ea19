import { fileURLToPath } from "node:url";

import { DiscordGatewayAdapter } from "@guildwarden/adapters-discord";
import { SqliteGuildSettingsStore } from "@guildwarden/adapters-sqlite";
import { loadConfig } from "@warden-core/src/config";
import { startHttpServer } from "@warden-core/src/http";
import { logError, logInfo, logWarn } from "@warden-core/src/logging";
import { startGatewayWorker } from "@warden-core/src/worker";

const waitForAbort = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

export const runEntrypoint = async (): Promise<number> => {
  const config = loadConfig();
  const store = new SqliteGuildSettingsStore(config.sqlitePath);
  await store.init();

  const server = startHttpServer({ port: config.port, store });
  const stopController = new AbortController();

  const requestStop = (reason: string): void => {
    if (stopController.signal.aborted) {
      return;
    }
    stopController.abort();
    logInfo("runtime.stop_requested", { reason });
  };

  process.on("SIGINT", () => requestStop("sigint"));
  process.on("SIGTERM", () => requestStop("sigterm"));

  logInfo("runtime.booted", {
    configSourcePath: config.configSourcePath,
    envOverridesApplied: config.envOverridesApplied,
    port: config.port,
    nodeEnv: config.nodeEnv,
    sqlitePath: config.sqlitePath,
    gatewayEnabled: config.discordBotToken !== null,
    presenceIntervalMs: config.presenceIntervalMs,
  });

  let exitCode = 0;
  if (config.discordBotToken) {
    const gateway = new DiscordGatewayAdapter(config.discordBotToken, {
      autoJoinThreads: config.autoJoinThreads,
      onError: (error, context) =>
        logError("gateway.listener_failed", { context, error: String(error) }),
      onReady: (summary) => logInfo("gateway.ready", summary),
      onThreadJoined: (thread) =>
        logInfo("gateway.thread_joined", {
          threadId: thread.id,
          name: thread.name,
        }),
    });

    try {
      await startGatewayWorker(
        { gateway, permissions: gateway, store },
        {
          presenceIntervalMs: config.presenceIntervalMs,
          lifecycleRetryAttempts: config.lifecycleRetryAttempts,
          lifecycleRetryBaseMs: config.lifecycleRetryBaseMs,
          stopSignal: stopController.signal,
        },
      );
    } catch (error) {
      logError("runtime.worker_failed", { error: String(error) });
      exitCode = 1;
    }
  } else {
    logWarn("runtime.gateway_disabled", {
      reason: "DISCORD_BOT_TOKEN is not set",
    });
    await waitForAbort(stopController.signal);
  }

  server.close();
  store.close();
  return exitCode;
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const exitCode = await runEntrypoint();
  process.exit(exitCode);
}
