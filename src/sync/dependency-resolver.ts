import { Logger } from '@nestjs/common';
import {
  ConnectionError,
  DependencyUnresolvedError,
  errorMessage,
} from '../common/errors/sync.errors';
import type { PerEntity, SyncEntity } from '../integrations/integration.types';
import { IdentityMapping } from '../mappings/identity-mapping';
import { MappingStore } from '../mappings/mapping.store';
import type { SyncContext } from './sync-context';

export type Resolution =
  | { resolved: true; mapping: IdentityMapping }
  | { resolved: false; error: DependencyUnresolvedError };

/** Single-record synchronization, used to bring one missing dependency across. */
export interface RecordSynchronizer {
  /** Pushes one local record and returns its remote id. */
  exportOne(context: SyncContext, localId: string): Promise<number>;
  /** Pulls one remote record and returns its local id. */
  importOne(context: SyncContext, remoteId: number): Promise<string>;
}

/**
 * Looks up the mapping a dependent record needs and, when it is missing,
 * synchronizes that one dependency before looking again.
 *
 * Only a {@link ConnectionError} escapes; every other failure comes back as
 * an unresolved result for the caller to record against its own record.
 */
export class DependencyResolver {
  private readonly logger = new Logger(DependencyResolver.name);

  constructor(
    private readonly mappings: MappingStore,
    private readonly synchronizers: PerEntity<RecordSynchronizer>,
  ) {}

  async resolveLocal(
    context: SyncContext,
    entity: SyncEntity,
    localId: string,
  ): Promise<Resolution> {
    const integrationId = context.integration.id;
    const existing = await this.mappings.findByLocal(integrationId, entity, localId);
    if (existing) {
      return { resolved: true, mapping: existing };
    }

    this.logger.log(`Exporting missing ${entity} ${localId} first`);
    try {
      await this.synchronizers[entity].exportOne(context, localId);
    } catch (error) {
      return unresolved(entity, localId, error);
    }

    const mapping = await this.mappings.findByLocal(integrationId, entity, localId);
    return mapping
      ? { resolved: true, mapping }
      : unresolved(entity, localId, 'no mapping after export');
  }

  async resolveRemote(
    context: SyncContext,
    entity: SyncEntity,
    remoteId: number,
  ): Promise<Resolution> {
    const integrationId = context.integration.id;
    const reference = `remote #${remoteId}`;
    const existing = await this.mappings.findByRemote(integrationId, entity, remoteId);
    if (existing) {
      return { resolved: true, mapping: existing };
    }

    this.logger.log(`Importing missing ${entity} ${reference} first`);
    try {
      await this.synchronizers[entity].importOne(context, remoteId);
    } catch (error) {
      return unresolved(entity, reference, error);
    }

    const mapping = await this.mappings.findByRemote(integrationId, entity, remoteId);
    return mapping
      ? { resolved: true, mapping }
      : unresolved(entity, reference, 'no mapping after import');
  }
}

function unresolved(
  entity: SyncEntity,
  reference: string,
  failure: unknown,
): { resolved: false; error: DependencyUnresolvedError } {
  if (failure instanceof ConnectionError) {
    throw failure;
  }
  if (failure instanceof DependencyUnresolvedError) {
    return { resolved: false, error: failure };
  }
  const reason = typeof failure === 'string' ? failure : errorMessage(failure);
  return {
    resolved: false,
    error: new DependencyUnresolvedError(
      entity,
      reference,
      reason,
      typeof failure === 'string' ? undefined : failure,
    ),
  };
}
