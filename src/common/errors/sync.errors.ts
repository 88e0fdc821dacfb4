import type { SyncEntity } from '../../integrations/integration.types';

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Base class for every failure the synchronization engine reports.
 * Only {@link ConnectionError} aborts a whole invocation; the others are
 * recorded against the record being processed.
 */
export abstract class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export class ConnectionError extends SyncError {
  readonly name = 'ConnectionError';

  constructor(
    readonly url: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Not connected to Odoo at ${url}: ${reason}`, cause);
  }
}

export class RemoteCallError extends SyncError {
  readonly name = 'RemoteCallError';

  constructor(
    readonly model: string,
    readonly method: string,
    cause: unknown,
  ) {
    super(`Odoo ${model}.${method} failed: ${errorMessage(cause)}`, cause);
  }
}

export class MappingConflictError extends SyncError {
  readonly name = 'MappingConflictError';

  constructor(
    readonly entity: SyncEntity,
    readonly localId: string,
    readonly remoteId: number,
    detail: string,
  ) {
    super(
      `Cannot map ${entity} ${localId} to remote ${remoteId}: ${detail}`,
    );
  }
}

export class DependencyUnresolvedError extends SyncError {
  readonly name = 'DependencyUnresolvedError';

  constructor(
    readonly entity: SyncEntity,
    readonly reference: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Unresolved ${entity} ${reference}: ${reason}`, cause);
  }
}

export class LocalPersistenceError extends SyncError {
  readonly name = 'LocalPersistenceError';

  constructor(
    readonly entity: string,
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Could not ${operation} ${entity}: ${errorMessage(cause)}`, cause);
  }
}

export class IntegrationNotFoundError extends Error {
  readonly name = 'IntegrationNotFoundError';

  constructor(readonly integrationId: string) {
    super(`Odoo integration ${integrationId} not found`);
  }
}

export class SyncInProgressError extends Error {
  readonly name = 'SyncInProgressError';

  constructor(readonly key: string) {
    super(`A sync is already running for ${key}`);
  }
}

export class SyncLogFinalizedError extends Error {
  readonly name = 'SyncLogFinalizedError';

  constructor(readonly logId: string) {
    super(`Sync log ${logId} is finalized and cannot be changed`);
  }
}
