// apps/api/src/http-setup.ts

import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';

import { SYNC_SETTINGS, SyncSettings } from './fieldsync/core/sync/sync-settings';

/** Room per queued op in a push body, well above a realistic create. */
export const PUSH_BYTES_PER_OP = 4 * 1024;

const MIN_JSON_BODY_BYTES = 100 * 1024;

export function buildValidationPipe(): ValidationPipe {
  return new ValidationPipe({ whitelist: true, transform: true });
}

/**
 * JSON body limit large enough for a full push batch, so the op-count check
 * (413 payload_too_large) is what bounds a push rather than the parser.
 */
export function jsonBodyLimit(settings: SyncSettings): number {
  return Math.max(MIN_JSON_BODY_BYTES, settings.maxOpsPerPush * PUSH_BYTES_PER_OP);
}

/**
 * Request pipeline shared by the server entry point and the e2e tests.
 * The application must be created with `bodyParser: false`.
 */
export function configureHttpApp(app: NestExpressApplication): void {
  const settings = app.get<SyncSettings>(SYNC_SETTINGS);

  app.useBodyParser('json', { limit: jsonBodyLimit(settings) });
  app.useGlobalPipes(buildValidationPipe());
}
