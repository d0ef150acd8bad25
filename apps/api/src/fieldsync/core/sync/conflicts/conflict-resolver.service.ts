// apps/api/src/fieldsync/core/sync/conflicts/conflict-resolver.service.ts

import { Injectable } from '@nestjs/common';

import { FN_SYNC_RESOLVE_CONFLICT } from '../../functional-ids';
import { LogCategory, LogLevel, LogService } from '../../logging/log.service';
import type { SyncSnapshot } from '../sync.types';

export const CONFLICT_STRATEGIES = ['LWW', 'manual', 'field_merge'] as const;
export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

export const FIELD_STRATEGIES = ['client_wins', 'server_wins', 'LWW'] as const;
export type FieldStrategy = (typeof FIELD_STRATEGIES)[number];

export type ConflictWinner = 'server' | 'client' | 'merged';

export interface ResolvedConflict {
  resolved: true;
  winner: ConflictWinner;
  state: SyncSnapshot;
}

export interface UnresolvedConflict {
  resolved: false;
  conflict: {
    server_state: SyncSnapshot;
    client_changes: SyncSnapshot;
    requires_manual_resolution: true;
  };
}

export type ConflictResolution = ResolvedConflict | UnresolvedConflict;

export function isConflictStrategy(value: string): value is ConflictStrategy {
  return (CONFLICT_STRATEGIES as readonly string[]).includes(value);
}

/**
 * ConflictResolverService
 *
 * Pure policy functions over two snapshots. The push path does not call
 * this: it always rejects a stale write and reports the conflict, leaving
 * reconciliation to the client. The configured default strategy is only
 * advertised through /sync/handshake.
 */
@Injectable()
export class ConflictResolverService {
  constructor(private readonly logService: LogService) {}

  resolve(
    serverState: SyncSnapshot,
    clientChanges: SyncSnapshot,
    strategy: ConflictStrategy = 'LWW',
    fieldStrategies: Partial<Record<string, FieldStrategy>> = {},
  ): ConflictResolution {
    switch (strategy) {
      case 'manual':
        return {
          resolved: false,
          conflict: {
            server_state: serverState,
            client_changes: clientChanges,
            requires_manual_resolution: true,
          },
        };
      case 'field_merge':
        return {
          resolved: true,
          winner: 'merged',
          state: this.mergeFields(serverState, clientChanges, fieldStrategies),
        };
      case 'LWW':
      default:
        return this.lastWriteWins(serverState, clientChanges);
    }
  }

  /**
   * Starts from the server state and takes each client field according to
   * its strategy (LWW when unlisted).
   */
  mergeFields(
    serverState: SyncSnapshot,
    clientChanges: SyncSnapshot,
    fieldStrategies: Partial<Record<string, FieldStrategy>> = {},
  ): SyncSnapshot {
    const merged: SyncSnapshot = { ...serverState };
    const clientIsNewer = isStrictlyNewer(clientChanges, serverState);

    for (const [field, value] of Object.entries(clientChanges)) {
      const strategy = fieldStrategies[field] ?? 'LWW';

      if (strategy === 'client_wins' || (strategy === 'LWW' && clientIsNewer)) {
        merged[field] = value;
      }
    }

    this.logService.logEvent({
      category: LogCategory.SYNC,
      level: LogLevel.DEBUG,
      message: `Merged ${Object.keys(clientChanges).length} client field(s) into server state`,
      functionId: FN_SYNC_RESOLVE_CONFLICT,
      metadata: { clientIsNewer, fieldStrategies },
    });

    return merged;
  }

  private lastWriteWins(
    serverState: SyncSnapshot,
    clientChanges: SyncSnapshot,
  ): ResolvedConflict {
    if (isStrictlyNewer(clientChanges, serverState)) {
      return { resolved: true, winner: 'client', state: clientChanges };
    }
    return { resolved: true, winner: 'server', state: serverState };
  }
}

function timestampOf(snapshot: SyncSnapshot): number | null {
  const value = snapshot.updated_at;

  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

/** Ties and missing or unparseable timestamps favour the server. */
function isStrictlyNewer(candidate: SyncSnapshot, reference: SyncSnapshot): boolean {
  const candidateTime = timestampOf(candidate);
  const referenceTime = timestampOf(reference);

  if (candidateTime === null || referenceTime === null) {
    return false;
  }
  return candidateTime > referenceTime;
}
