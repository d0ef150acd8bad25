// apps/api/src/fieldsync/core/sync/sync.types.ts

/**
 * Wire-level types for /sync/handshake, /sync/push and /sync/pull.
 * Field names are snake_case because they are serialised as-is.
 */

export const SYNC_ENTITY_TYPES = [
  'property',
  'inspection',
  'apartment',
  'defect',
  'measurement',
] as const;

export type SyncEntityType = (typeof SYNC_ENTITY_TYPES)[number];

export const SYNC_ACTIONS = ['create', 'update', 'delete'] as const;

export type SyncAction = (typeof SYNC_ACTIONS)[number];

/**
 * JSON-serialisable snapshot of an entity or of a client's field changes.
 */
export type SyncSnapshot = Record<string, unknown>;

/**
 * One queued client mutation, after envelope validation.
 */
export interface SyncOperation {
  op_id: string;
  entity_type: string;
  action: string;
  client_id: string | null;
  server_id: number | null;
  base_revision: number;
  payload: SyncSnapshot;
}

export type RejectionReason =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'internal_error';

export interface SyncConflict {
  entity_type: SyncEntityType;
  server_id: number;
  current_revision: number;
  base_revision: number;
  server_state: SyncSnapshot;
  recommended_action: 'pull_and_rebase';
}

export interface RejectedOp {
  op_id: string;
  reason: RejectionReason;
  message: string;
  details?: Record<string, unknown>;
  conflict?: SyncConflict;
}

export interface IdMapEntry {
  entity_type: SyncEntityType;
  client_id: string | null;
  server_id: number;
  revision: number;
}

export interface PushResponse {
  acked_op_ids: string[];
  rejected_ops: RejectedOp[];
  id_map: IdMapEntry[];
  server_cursor: string;
}

export interface PullChange {
  change_id: string;
  entity_type: string;
  server_id: number;
  action: SyncAction;
  revision: number;
  updated_at: string;
  payload: SyncSnapshot | null;
}

export interface PullResponse {
  changes: PullChange[];
  next_cursor: string;
  has_more: boolean;
}

export interface HandshakeResponse {
  server_time: string;
  min_client_version: string;
  conflict_policy_default: string;
  max_ops_per_push: number;
  max_pull_limit: number;
  change_log_retention_days: number;
}

export function isSyncEntityType(value: string): value is SyncEntityType {
  return (SYNC_ENTITY_TYPES as readonly string[]).includes(value);
}

export function isSyncAction(value: string): value is SyncAction {
  return (SYNC_ACTIONS as readonly string[]).includes(value);
}
