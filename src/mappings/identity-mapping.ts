import type { SyncEntity } from '../integrations/integration.types';

/** One local-id <-> remote-id pair, scoped to an integration and an entity kind. */
export interface IdentityMapping {
  integrationId: string;
  entity: SyncEntity;
  localId: string;
  remoteId: number;
  lastSyncAt: Date;
}
