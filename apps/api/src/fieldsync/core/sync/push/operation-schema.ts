import * as Joi from 'joi';

import type { RejectedOp, SyncOperation } from '../sync.types';

/**
 * Envelope of one queued client mutation. Domain fields inside `payload` are
 * validated later by the entity handler; this only checks the envelope.
 */
export const SYNC_OPERATION_SCHEMA = Joi.object<SyncOperation>({
  op_id: Joi.string().trim().min(1).max(255).required(),
  entity_type: Joi.string().trim().required(),
  action: Joi.string().trim().required(),
  client_id: Joi.string().trim().min(1).max(64).empty(null).default(null),
  server_id: Joi.number().integer().positive().empty(null).default(null),
  base_revision: Joi.number().integer().min(0).empty(null).default(0),
  payload: Joi.object().unknown(true).empty(null).default({}),
});

export type ParsedOperation =
  | { ok: true; operation: SyncOperation }
  | { ok: false; rejection: RejectedOp };

/**
 * Validates one raw op. Ops without a usable op_id are reported under a
 * positional placeholder ("#<index>") so the client can still match them.
 */
export function parseOperation(raw: unknown, index: number): ParsedOperation {
  const result = SYNC_OPERATION_SCHEMA.validate(raw, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (result.error) {
    return {
      ok: false,
      rejection: {
        op_id: rawOpId(raw) ?? `#${index}`,
        reason: 'validation',
        message: `Invalid operation: ${result.error.message}`,
        details: {
          errors: result.error.details.map((detail) => ({
            path: detail.path.join('.'),
            message: detail.message,
          })),
        },
      },
    };
  }

  return { ok: true, operation: result.value };
}

function rawOpId(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('op_id' in raw)) {
    return null;
  }
  const { op_id } = raw;
  return typeof op_id === 'string' && op_id.trim().length > 0 ? op_id : null;
}
