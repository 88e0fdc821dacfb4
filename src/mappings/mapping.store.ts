import { MappingConflictError } from '../common/errors/sync.errors';
import type { SyncEntity } from '../integrations/integration.types';
import { IdentityMapping } from './identity-mapping';

/**
 * Bijection between local and remote ids, per integration and entity kind.
 *
 * Implementations provide the lookups and the raw insert; `upsert` owns the
 * lookup-before-create discipline so that neither side is ever mapped twice.
 */
export abstract class MappingStore {
  abstract findByLocal(
    integrationId: string,
    entity: SyncEntity,
    localId: string,
  ): Promise<IdentityMapping | null>;

  abstract findByRemote(
    integrationId: string,
    entity: SyncEntity,
    remoteId: number,
  ): Promise<IdentityMapping | null>;

  /** Refreshes `lastSyncAt` of an existing mapping. */
  abstract touch(
    integrationId: string,
    entity: SyncEntity,
    localId: string,
  ): Promise<void>;

  /** Stores a new mapping; a uniqueness violation must surface as MappingConflictError. */
  protected abstract insert(mapping: IdentityMapping): Promise<IdentityMapping>;

  async upsert(
    integrationId: string,
    entity: SyncEntity,
    localId: string,
    remoteId: number,
  ): Promise<IdentityMapping> {
    const byLocal = await this.findByLocal(integrationId, entity, localId);
    if (byLocal) {
      if (byLocal.remoteId !== remoteId) {
        throw new MappingConflictError(
          entity,
          localId,
          remoteId,
          `local record is already mapped to remote ${byLocal.remoteId}`,
        );
      }
      await this.touch(integrationId, entity, localId);
      return { ...byLocal, lastSyncAt: new Date() };
    }

    const byRemote = await this.findByRemote(integrationId, entity, remoteId);
    if (byRemote) {
      throw new MappingConflictError(
        entity,
        localId,
        remoteId,
        `remote record is already mapped to local ${byRemote.localId}`,
      );
    }

    return this.insert({
      integrationId,
      entity,
      localId,
      remoteId,
      lastSyncAt: new Date(),
    });
  }
}
