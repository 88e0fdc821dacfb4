import type {
  SyncDirection,
  SyncEntity,
} from '../integrations/integration.types';

export const SYNC_STATUSES = ['success', 'error', 'partial'] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

export interface SyncedRecord {
  localId: string;
  remoteId: number;
  name: string;
}

export interface FailedRecord {
  localId?: string;
  remoteId?: number;
  name: string;
  error: string;
  errorType: string;
}

export interface SyncLogDetails {
  succeeded: SyncedRecord[];
  failed: FailedRecord[];
}

export interface SyncLogEntry {
  id: string;
  integrationId: string;
  entity: SyncEntity;
  direction: SyncDirection;
  status: SyncStatus;
  startedAt: Date;
  recordsProcessed: number;
  recordsSucceeded: number;
  recordsFailed: number;
  details: SyncLogDetails;
  errorMessage: string | null;
  /** Set once; the entry is read-only afterwards. */
  finalizedAt: Date | null;
}

export interface SyncLogFilter {
  integrationId?: string;
  entity?: SyncEntity;
  direction?: SyncDirection;
  status?: SyncStatus;
  from?: Date;
  to?: Date;
  limit?: number;
}
