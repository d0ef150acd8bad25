// apps/api/src/fieldsync/core/sync/pull/pull-processor.service.ts

import { Inject, Injectable } from '@nestjs/common';

import { FN_SYNC_PULL } from '../../functional-ids';
import { LogCategory, LogLevel, LogService } from '../../logging/log.service';
import { ChangeLogEntry } from '../change-ledger/change-log.entity';
import { ChangeLedgerService } from '../change-ledger/change-ledger.service';
import { decodeCursor, encodeCursor } from '../change-ledger/cursor';
import { SYNC_SETTINGS, SyncSettings } from '../sync-settings';
import type { PullChange, PullResponse } from '../sync.types';

/**
 * PullProcessorService
 *
 * Serves pages of the change ledger after a client cursor. The ledger is
 * append-only, so a page for a given cursor never changes and pulls are safe
 * to retry.
 *
 * The stream is global: every authenticated caller sees every change. The
 * user id is only recorded in the log.
 */
@Injectable()
export class PullProcessorService {
  constructor(
    private readonly changeLedger: ChangeLedgerService,
    private readonly logService: LogService,
    @Inject(SYNC_SETTINGS) private readonly settings: SyncSettings,
  ) {}

  async processPull(
    userId: string,
    sinceCursor?: string | null,
    limit?: number | null,
  ): Promise<PullResponse> {
    const sinceId = decodeCursor(sinceCursor);
    const pageSize = this.clampLimit(limit);

    // One extra row tells us whether another page exists.
    const rows = await this.changeLedger.readAfter(sinceId, pageSize + 1);
    const page = rows.slice(0, pageSize);
    const hasMore = rows.length > pageSize;

    const last = page[page.length - 1];
    const nextCursor = last
      ? encodeCursor(last.id)
      : sinceCursor || encodeCursor(0);

    this.logService.logEvent({
      category: LogCategory.SYNC,
      level: LogLevel.DEBUG,
      message: `Pull served ${page.length} change(s)`,
      functionId: FN_SYNC_PULL,
      actorUserId: userId,
      metadata: { sinceId, limit: pageSize, hasMore, nextCursor },
    });

    return {
      changes: page.map(toPullChange),
      next_cursor: nextCursor,
      has_more: hasMore,
    };
  }

  clampLimit(limit?: number | null): number {
    if (limit == null || !Number.isFinite(limit)) {
      return Math.min(this.settings.defaultPullLimit, this.settings.maxPullLimit);
    }
    return Math.max(1, Math.min(Math.trunc(limit), this.settings.maxPullLimit));
  }
}

function toPullChange(entry: ChangeLogEntry): PullChange {
  return {
    change_id: encodeCursor(entry.id),
    entity_type: entry.entity_type,
    server_id: entry.server_id,
    action: entry.action,
    revision: entry.revision,
    updated_at: entry.created_at.toISOString(),
    payload: entry.payload,
  };
}
