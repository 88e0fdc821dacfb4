import type {
  SyncDirection,
  SyncEntity,
} from '../integrations/integration.types';

export const SYNC_QUEUE = 'odoo-sync';
export const SYNC_JOB = 'sync-entity';

export interface SyncJobData {
  integrationId: string;
  entity: SyncEntity;
  direction: SyncDirection;
}

/** Scheduled and manual runs without an explicit direction push local changes. */
export const DEFAULT_DIRECTION: SyncDirection = 'export';
