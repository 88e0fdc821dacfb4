import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, isValidObjectId, Model } from 'mongoose';
import { SyncLogFinalizedError } from '../common/errors/sync.errors';
import { SyncLog, SyncLogDocument } from './schemas/sync-log.schema';
import { OpenSyncLog, SyncLogStore } from './sync-log.store';
import { SyncLogEntry, SyncLogFilter } from './sync-log.types';

const DEFAULT_LIMIT = 100;

@Injectable()
export class SyncLogsService extends SyncLogStore {
  constructor(
    @InjectModel(SyncLog.name) private syncLogModel: Model<SyncLog>,
  ) {
    super();
  }

  async open(init: OpenSyncLog): Promise<SyncLogEntry> {
    const log = new this.syncLogModel({
      ...init,
      status: 'success',
      recordsProcessed: 0,
      recordsSucceeded: 0,
      recordsFailed: 0,
      details: { succeeded: [], failed: [] },
    });
    return toEntry(await log.save());
  }

  async update(entry: SyncLogEntry): Promise<void> {
    const result = await this.syncLogModel
      .updateOne(
        { _id: entry.id, finalizedAt: null },
        { $set: mutableFields(entry) },
      )
      .exec();
    if (result.matchedCount === 0) {
      throw new SyncLogFinalizedError(entry.id);
    }
  }

  async finalize(entry: SyncLogEntry): Promise<SyncLogEntry> {
    const finalizedAt = new Date();
    const result = await this.syncLogModel
      .updateOne(
        { _id: entry.id, finalizedAt: null },
        { $set: { ...mutableFields(entry), finalizedAt } },
      )
      .exec();
    if (result.matchedCount === 0) {
      throw new SyncLogFinalizedError(entry.id);
    }
    return { ...entry, finalizedAt };
  }

  async findAll(filter: SyncLogFilter = {}): Promise<SyncLogEntry[]> {
    const query: FilterQuery<SyncLog> = {};
    if (filter.integrationId) query.integrationId = filter.integrationId;
    if (filter.entity) query.entity = filter.entity;
    if (filter.direction) query.direction = filter.direction;
    if (filter.status) query.status = filter.status;
    if (filter.from || filter.to) {
      query.startedAt = {
        ...(filter.from ? { $gte: filter.from } : {}),
        ...(filter.to ? { $lte: filter.to } : {}),
      };
    }

    const docs = await this.syncLogModel
      .find(query)
      .sort({ startedAt: -1, _id: -1 })
      .limit(filter.limit ?? DEFAULT_LIMIT)
      .exec();
    return docs.map(toEntry);
  }

  async findById(id: string): Promise<SyncLogEntry | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.syncLogModel.findById(id).exec();
    return doc ? toEntry(doc) : null;
  }
}

function mutableFields(entry: SyncLogEntry) {
  return {
    status: entry.status,
    recordsProcessed: entry.recordsProcessed,
    recordsSucceeded: entry.recordsSucceeded,
    recordsFailed: entry.recordsFailed,
    details: entry.details,
    errorMessage: entry.errorMessage,
  };
}

function toEntry(doc: SyncLogDocument): SyncLogEntry {
  return {
    id: String(doc._id),
    integrationId: doc.integrationId,
    entity: doc.entity,
    direction: doc.direction,
    status: doc.status,
    startedAt: doc.startedAt,
    recordsProcessed: doc.recordsProcessed,
    recordsSucceeded: doc.recordsSucceeded,
    recordsFailed: doc.recordsFailed,
    details: {
      succeeded: [...(doc.details?.succeeded ?? [])],
      failed: [...(doc.details?.failed ?? [])],
    },
    errorMessage: doc.errorMessage,
    finalizedAt: doc.finalizedAt,
  };
}
