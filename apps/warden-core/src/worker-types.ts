import type {
  GatewayPort,
  GuildSettingsStore,
  PermissionOracle,
} from "@guildwarden/ports";

export type WorkerDeps = {
  gateway: GatewayPort;
  permissions: PermissionOracle;
  store: GuildSettingsStore;
};

export type WorkerOptions = {
  presenceIntervalMs?: number;
  lifecycleRetryAttempts?: number;
  lifecycleRetryBaseMs?: number;
  stopSignal?: AbortSignal;
};

export type LogFields = Record<string, string | number | boolean | null>;
