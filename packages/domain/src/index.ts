export type MuteType = "timeout" | "role";

export type GuildSettings = {
  guildId: string;
  prefix: string;
  ownerId: string;
  muteType: MuteType;
  /** "0" when no mute role has been configured. */
  muteRoleId: string;
};

export const DEFAULT_PREFIX = "-";
export const DEFAULT_MUTE_TYPE: MuteType = "timeout";
export const UNSET_ROLE_ID = "0";

export const defaultGuildSettings = (
  guildId: string,
  ownerId: string,
): GuildSettings => ({
  guildId,
  prefix: DEFAULT_PREFIX,
  ownerId,
  muteType: DEFAULT_MUTE_TYPE,
  muteRoleId: UNSET_ROLE_ID,
});

export const parseMuteType = (value: string): MuteType =>
  value === "role" ? "role" : "timeout";

const SNOWFLAKE_PATTERN = /^\d{1,20}$/;
const UINT64_MAX = 18_446_744_073_709_551_615n;

/** Snowflakes are unsigned 64-bit integers carried as decimal strings. */
export const isSnowflake = (value: string): boolean =>
  SNOWFLAKE_PATTERN.test(value) && BigInt(value) <= UINT64_MAX;

export const containsWhitespace = (value: string): boolean => /\s/.test(value);

export type PrefixValidation =
  | { ok: true; prefix: string }
  | { ok: false; reason: "EMPTY" | "WHITESPACE" };

export const validatePrefix = (candidate: string): PrefixValidation => {
  const trimmed = candidate.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: "EMPTY" };
  }
  if (containsWhitespace(trimmed)) {
    return { ok: false, reason: "WHITESPACE" };
  }
  return { ok: true, prefix: trimmed };
};

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type WardenErrorKind =
  | "missing_context"
  | "permission_denied"
  | "validation_error"
  | "not_found"
  | "store_write_failure"
  | "store_read_failure";

/**
 * Structured error for every failure the configuration core can report.
 * Validation kinds end a command without touching either store; the store
 * kinds carry the underlying driver error as `cause`.
 */
export class WardenError extends Error {
  readonly kind: WardenErrorKind;

  constructor(kind: WardenErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WardenError";
    this.kind = kind;
  }
}

export const isStoreFailure = (error: WardenError): boolean =>
  error.kind === "store_write_failure" || error.kind === "store_read_failure";

export type Result<T, E = WardenError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ---------------------------------------------------------------------------
// Guild lifecycle
// ---------------------------------------------------------------------------

export type GuildLifecycleState = "unknown" | "tracked" | "removed";

export type GuildLifecycleEvent = "joined" | "left";

export type LifecycleTransition =
  | { ok: true; next: GuildLifecycleState }
  | { ok: false; reason: "NO_OP" };

const LIFECYCLE_TRANSITIONS: Record<
  GuildLifecycleState,
  Partial<Record<GuildLifecycleEvent, GuildLifecycleState>>
> = {
  unknown: { joined: "tracked", left: "removed" },
  tracked: { left: "removed" },
  // A re-join starts a new occurrence of the guild.
  removed: { joined: "tracked" },
};

export const transitionGuild = (
  current: GuildLifecycleState,
  event: GuildLifecycleEvent,
): LifecycleTransition => {
  const next = LIFECYCLE_TRANSITIONS[current][event];
  if (!next) {
    return { ok: false, reason: "NO_OP" };
  }
  return { ok: true, next };
};
