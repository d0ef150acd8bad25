export type EntityBuildErrorCode =
  | 'invalid_payload'
  | 'missing_reference'
  | 'unresolved_reference';

/**
 * Structured failure raised by entity handlers while validating a payload or
 * resolving a foreign reference. The push processor turns it into a
 * `validation` rejection; it is never logged as an internal error.
 */
export class EntityBuildError extends Error {
  constructor(
    readonly code: EntityBuildErrorCode,
    message: string,
    readonly field?: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'EntityBuildError';
  }

  toDetails(): Record<string, unknown> {
    return {
      code: this.code,
      ...(this.field ? { field: this.field } : {}),
      ...(this.details ?? {}),
    };
  }
}
