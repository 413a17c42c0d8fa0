/**
 * Coordinator error taxonomy.
 *
 * Every error carries a stable `code` for programmatic handling, whether the
 * caller may retry it, and the HTTP status the transport maps it to.
 */

export type ErrorCode =
  | 'INVALID_CONFIG'
  | 'SESSION_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'SESSION_NOT_FOUND'
  | 'UNKNOWN_MODEL_VERSION'
  | 'STALE_VERSION'
  | 'MODEL_NOT_FOUND'
  | 'NOT_AUTHORIZED'
  | 'ALREADY_FINALIZED'
  | 'UNKNOWN_CONTRIBUTOR'
  | 'INVALID_AMOUNT'
  | 'INVALID_GRADIENT'
  | 'STORAGE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNAUTHENTICATED'
  | 'PENDING_CHANGED'
  | 'INVALID_DATASET'
  | 'DATASET_NOT_FOUND';

export class CoordinatorError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;
  public readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, status: number, retryable = false) {
    super(message);
    this.name = 'CoordinatorError';
    this.code = code;
    this.status = status;
    this.retryable = retryable;
  }
}

export class InvalidConfigError extends CoordinatorError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid training config: ${issues.join('; ')}`, 400);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

export class SessionConflictError extends CoordinatorError {
  public readonly activeSessionId: string;

  constructor(modelRef: string, activeSessionId: string) {
    super('SESSION_CONFLICT', `Lineage '${modelRef}' already has active session '${activeSessionId}'`, 409);
    this.name = 'SessionConflictError';
    this.activeSessionId = activeSessionId;
  }
}

export class InvalidTransitionError extends CoordinatorError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message, 409);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionNotFoundError extends CoordinatorError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Training session '${sessionId}' not found`, 404);
    this.name = 'SessionNotFoundError';
  }
}

/** Submission targets a version that was never created. */
export class UnknownModelVersionError extends CoordinatorError {
  constructor(version: number) {
    super('UNKNOWN_MODEL_VERSION', `Model version ${version} does not exist`, 404);
    this.name = 'UnknownModelVersionError';
  }
}

/** Submission targets a version that has already been finalized. */
export class StaleVersionError extends CoordinatorError {
  constructor(version: number) {
    super('STALE_VERSION', `Model version ${version} is finalized and no longer accepts gradients`, 409);
    this.name = 'StaleVersionError';
  }
}

export class ModelNotFoundError extends CoordinatorError {
  constructor(ref: number | string) {
    super('MODEL_NOT_FOUND', `Model '${ref}' not found`, 404);
    this.name = 'ModelNotFoundError';
  }
}

export class NotAuthorizedError extends CoordinatorError {
  constructor(message: string) {
    super('NOT_AUTHORIZED', message, 403);
    this.name = 'NotAuthorizedError';
  }
}

export class AlreadyFinalizedError extends CoordinatorError {
  constructor(version: number) {
    super('ALREADY_FINALIZED', `Model version ${version} has already been finalized`, 409);
    this.name = 'AlreadyFinalizedError';
  }
}

export class UnknownContributorError extends CoordinatorError {
  constructor(identity: string) {
    super('UNKNOWN_CONTRIBUTOR', `Contributor '${identity}' is not registered`, 404);
    this.name = 'UnknownContributorError';
  }
}

export class InvalidAmountError extends CoordinatorError {
  constructor(amount: number) {
    super('INVALID_AMOUNT', `Reputation amount must be a positive integer, got ${amount}`, 400);
    this.name = 'InvalidAmountError';
  }
}

export class InvalidGradientError extends CoordinatorError {
  constructor(message: string) {
    super('INVALID_GRADIENT', message, 422);
    this.name = 'InvalidGradientError';
  }
}

/** Transient content-store failure. Safe to retry. */
export class StorageUnavailableError extends CoordinatorError {
  constructor(message: string) {
    super('STORAGE_UNAVAILABLE', message, 503, true);
    this.name = 'StorageUnavailableError';
  }
}

/** Content missing from the store. Not retryable: signals data loss. */
export class ContentNotFoundError extends CoordinatorError {
  public readonly cid: string;

  constructor(cid: string) {
    super('NOT_FOUND', `Content '${cid}' not found`, 404);
    this.name = 'ContentNotFoundError';
    this.cid = cid;
  }
}

export class ValidationError extends CoordinatorError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

export class UnauthenticatedError extends CoordinatorError {
  constructor(message: string) {
    super('UNAUTHENTICATED', message, 401);
    this.name = 'UnauthenticatedError';
  }
}

/** Gradients arrived after the weights were composed; compose again. */
export class PendingSetChangedError extends CoordinatorError {
  constructor(version: number, expected: number, actual: number) {
    super(
      'PENDING_CHANGED',
      `Model version ${version} has ${actual} pending gradients, weights were composed from ${expected}`,
      409,
      true
    );
    this.name = 'PendingSetChangedError';
  }
}

export class InvalidDatasetError extends CoordinatorError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_DATASET', `Validation failed: ${issues.join('; ')}`, 422);
    this.name = 'InvalidDatasetError';
    this.issues = issues;
  }
}

export class DatasetNotFoundError extends CoordinatorError {
  constructor(datasetId: string) {
    super('DATASET_NOT_FOUND', `Dataset '${datasetId}' not found`, 404);
    this.name = 'DatasetNotFoundError';
  }
}

export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
