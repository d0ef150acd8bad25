/**
 * Stable functional identifiers.
 *
 * Pattern: FN_<MODULE>_<ACTION>
 *
 * Attached to every structured log event as `functionId` so operations can
 * be traced across log categories.
 */

/* ------------------------------------------------------------------------- */
/* Sync engine                                                               */
/* ------------------------------------------------------------------------- */

export const FN_SYNC_HANDSHAKE = 'FN_SYNC_HANDSHAKE' as const;
export const FN_SYNC_PUSH = 'FN_SYNC_PUSH' as const;
export const FN_SYNC_PULL = 'FN_SYNC_PULL' as const;
export const FN_SYNC_APPLY_OPERATION = 'FN_SYNC_APPLY_OPERATION' as const;
export const FN_SYNC_RESOLVE_CONFLICT = 'FN_SYNC_RESOLVE_CONFLICT' as const;

/* ------------------------------------------------------------------------- */
/* Platform                                                                  */
/* ------------------------------------------------------------------------- */

export const FN_HEALTH_GET = 'FN_HEALTH_GET' as const;
export const FN_AUTH_VALIDATE_ACCESS_TOKEN =
  'FN_AUTH_VALIDATE_ACCESS_TOKEN' as const;
export const FN_LOG_SYSTEM_EVENT = 'FN_LOG_SYSTEM_EVENT' as const;
export const FN_LOG_SECURITY_EVENT = 'FN_LOG_SECURITY_EVENT' as const;

/* ------------------------------------------------------------------------- */
/* Aggregates & Type Helpers                                                 */
/* ------------------------------------------------------------------------- */

export const ALL_FUNCTIONAL_IDS = [
  FN_SYNC_HANDSHAKE,
  FN_SYNC_PUSH,
  FN_SYNC_PULL,
  FN_SYNC_APPLY_OPERATION,
  FN_SYNC_RESOLVE_CONFLICT,
  FN_HEALTH_GET,
  FN_AUTH_VALIDATE_ACCESS_TOKEN,
  FN_LOG_SYSTEM_EVENT,
  FN_LOG_SECURITY_EVENT,
] as const;

/**
 * Union type of all known functional IDs.
 */
export type FunctionalId = (typeof ALL_FUNCTIONAL_IDS)[number];

/**
 * Type guard to validate whether a string is a known FunctionalId.
 */
export function isFunctionalId(value: string): value is FunctionalId {
  return (ALL_FUNCTIONAL_IDS as readonly string[]).includes(value);
}
