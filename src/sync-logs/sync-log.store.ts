import type {
  SyncDirection,
  SyncEntity,
} from '../integrations/integration.types';
import { SyncLogEntry, SyncLogFilter } from './sync-log.types';

export interface OpenSyncLog {
  integrationId: string;
  entity: SyncEntity;
  direction: SyncDirection;
  startedAt: Date;
}

/** Append-only audit trail of sync invocations. */
export abstract class SyncLogStore {
  /** Creates an entry with zero counters and status `success`. */
  abstract open(init: OpenSyncLog): Promise<SyncLogEntry>;

  /** @throws SyncLogFinalizedError when the entry was already finalized. */
  abstract update(entry: SyncLogEntry): Promise<void>;

  /** Persists the final state and stamps `finalizedAt`. */
  abstract finalize(entry: SyncLogEntry): Promise<SyncLogEntry>;

  /** Newest first. */
  abstract findAll(filter?: SyncLogFilter): Promise<SyncLogEntry[]>;

  abstract findById(id: string): Promise<SyncLogEntry | null>;
}
