import { ConfigService } from '@nestjs/config';

import type { ConflictStrategy } from './conflicts/conflict-resolver.service';

/**
 * Injection token for the typed sync engine settings.
 */
export const SYNC_SETTINGS = 'sync_settings';

export interface SyncSettings {
  maxOpsPerPush: number;
  defaultPullLimit: number;
  maxPullLimit: number;
  idempotencyTtlSeconds: number;
  changeLogRetentionDays: number;
  minClientVersion: string;
  conflictPolicyDefault: ConflictStrategy;
}

export const DEFAULT_SYNC_SETTINGS: SyncSettings = {
  maxOpsPerPush: 500,
  defaultPullLimit: 200,
  maxPullLimit: 500,
  idempotencyTtlSeconds: 24 * 60 * 60,
  changeLogRetentionDays: 90,
  minClientVersion: '1.0.0',
  conflictPolicyDefault: 'LWW',
};

export function syncSettingsFromConfig(config: ConfigService): SyncSettings {
  return {
    maxOpsPerPush:
      config.get<number>('SYNC_MAX_OPS_PER_PUSH') ??
      DEFAULT_SYNC_SETTINGS.maxOpsPerPush,
    defaultPullLimit:
      config.get<number>('SYNC_DEFAULT_PULL_LIMIT') ??
      DEFAULT_SYNC_SETTINGS.defaultPullLimit,
    maxPullLimit:
      config.get<number>('SYNC_MAX_PULL_LIMIT') ??
      DEFAULT_SYNC_SETTINGS.maxPullLimit,
    idempotencyTtlSeconds:
      config.get<number>('SYNC_IDEMPOTENCY_TTL_SECONDS') ??
      DEFAULT_SYNC_SETTINGS.idempotencyTtlSeconds,
    changeLogRetentionDays:
      config.get<number>('SYNC_CHANGE_LOG_RETENTION_DAYS') ??
      DEFAULT_SYNC_SETTINGS.changeLogRetentionDays,
    minClientVersion:
      config.get<string>('SYNC_MIN_CLIENT_VERSION') ??
      DEFAULT_SYNC_SETTINGS.minClientVersion,
    conflictPolicyDefault:
      config.get<ConflictStrategy>('SYNC_CONFLICT_POLICY_DEFAULT') ??
      DEFAULT_SYNC_SETTINGS.conflictPolicyDefault,
  };
}
