import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConnectionError,
  DependencyUnresolvedError,
  errorMessage,
  RemoteCallError,
} from '../../common/errors/sync.errors';
import { IntegrationStore } from '../../integrations/integration.store';
import type {
  SyncDirection,
  SyncEntity,
} from '../../integrations/integration.types';
import { MappingStore } from '../../mappings/mapping.store';
import {
  OdooDomain,
  OdooRecord,
  OdooValues,
} from '../../odoo/interfaces/odoo.interface';
import { SyncLogStore } from '../../sync-logs/sync-log.store';
import {
  FailedRecord,
  SyncedRecord,
  SyncLogEntry,
} from '../../sync-logs/sync-log.types';
import type { RecordSynchronizer } from '../dependency-resolver';
import { displayName, toOdooDateTime } from '../odoo-fields';
import { carriesPatch } from '../local-changes';
import type { SyncContext } from '../sync-context';

export interface Synchronizer extends RecordSynchronizer {
  readonly entity: SyncEntity;
  sync(context: SyncContext, direction: SyncDirection): Promise<SyncLogEntry>;
}

const IMPORT_ORDER = 'write_date asc, id asc';

/**
 * Shared run loop of the four entity synchronizers.
 *
 * One invocation opens a log entry, walks the changeset one record at a
 * time and finalizes the entry. A failing record is recorded and skipped;
 * only a connection failure, or a failure outside the per-record work,
 * ends the invocation early with status `error` and leaves the watermark
 * where it was.
 */
export abstract class EntitySynchronizer<L extends { id: string }>
  implements Synchronizer
{
  abstract readonly entity: SyncEntity;

  /** Odoo model of the parent record. */
  protected abstract readonly model: string;

  protected readonly logger = new Logger(this.constructor.name);

  constructor(
    protected readonly mappings: MappingStore,
    protected readonly logs: SyncLogStore,
    protected readonly integrations: IntegrationStore,
    protected readonly configService: ConfigService,
  ) {}

  protected abstract findChangedLocal(since: Date | null): Promise<L[]>;

  protected abstract findLocal(id: string): Promise<L | null>;

  protected abstract localName(record: L): string;

  /** Creates or updates the remote counterpart and returns its id. */
  protected abstract exportRecord(context: SyncContext, record: L): Promise<number>;

  /** Creates or updates the local counterpart and returns its id. */
  protected abstract importRecord(
    context: SyncContext,
    record: OdooRecord,
  ): Promise<SyncedRecord>;

  protected abstract importDomain(context: SyncContext): OdooDomain;

  protected abstract importFields(context: SyncContext): string[];

  async sync(context: SyncContext, direction: SyncDirection): Promise<SyncLogEntry> {
    const { integration } = context;
    // Captured before the changeset is read so edits made during the run
    // fall inside the next window.
    const startedAt = new Date();
    const log = await this.logs.open({
      integrationId: integration.id,
      entity: this.entity,
      direction,
      startedAt,
    });

    this.logger.log(
      `Starting ${this.entity} ${direction} for integration ${integration.name}`,
    );

    try {
      context.client.assertConnected();

      if (direction === 'export') {
        await this.runExport(context, log);
      } else {
        await this.runImport(context, log);
      }

      log.status = log.recordsFailed > 0 ? 'partial' : 'success';
      await this.integrations.advanceWatermark(integration.id, this.entity, startedAt);

      this.logger.log(
        `Finished ${this.entity} ${direction}: ${log.recordsSucceeded}/${log.recordsProcessed} succeeded`,
      );
    } catch (error) {
      log.status = 'error';
      log.errorMessage = errorMessage(error);
      this.logger.error(
        `${this.entity} ${direction} for integration ${integration.name} aborted: ${log.errorMessage}`,
      );
    }

    return this.logs.finalize(log);
  }

  async exportOne(context: SyncContext, localId: string): Promise<number> {
    const record = await this.findLocal(localId);
    if (!record) {
      throw new DependencyUnresolvedError(this.entity, localId, 'local record not found');
    }
    const remoteId = await this.exportRecord(context, record);
    this.logger.log(`Exported ${this.entity} ${localId} as #${remoteId}`);
    return remoteId;
  }

  async importOne(context: SyncContext, remoteId: number): Promise<string> {
    const [record] = await context.client.searchRead(
      this.model,
      [['id', '=', remoteId]],
      { fields: this.importFields(context), limit: 1 },
    );
    if (!record) {
      throw new DependencyUnresolvedError(
        this.entity,
        `remote #${remoteId}`,
        `not found in ${this.model}`,
      );
    }
    const imported = await this.importRecord(context, record);
    this.logger.log(`Imported ${this.entity} #${remoteId} as ${imported.localId}`);
    return imported.localId;
  }

  private async runExport(context: SyncContext, log: SyncLogEntry): Promise<void> {
    const watermark = context.integration.watermarks[this.entity];
    const candidates = await this.findChangedLocal(watermark);

    for (const record of candidates) {
      const name = this.localName(record);
      await this.processRecord(log, { localId: record.id, name }, async () => ({
        localId: record.id,
        remoteId: await this.exportRecord(context, record),
        name,
      }));
    }
  }

  private async runImport(context: SyncContext, log: SyncLogEntry): Promise<void> {
    const watermark = context.integration.watermarks[this.entity];
    const domain: OdooDomain = [...this.importDomain(context)];
    if (watermark) {
      domain.push(['write_date', '>', toOdooDateTime(watermark)]);
    }

    const pageSize = this.configService.get<number>('sync.importPageSize', 200);
    for (let offset = 0; ; offset += pageSize) {
      const page = await context.client.searchRead(this.model, domain, {
        fields: this.importFields(context),
        limit: pageSize,
        offset,
        order: IMPORT_ORDER,
      });

      for (const record of page) {
        await this.processRecord(
          log,
          { remoteId: record.id, name: displayName(record, this.model) },
          () => this.importRecord(context, record),
        );
      }

      if (page.length < pageSize) {
        break;
      }
    }
  }

  /** Runs one record's work and records its outcome; a connection failure ends the run. */
  private async processRecord(
    log: SyncLogEntry,
    ref: Omit<FailedRecord, 'error' | 'errorType'>,
    work: () => Promise<SyncedRecord>,
  ): Promise<void> {
    try {
      const synced = await work();
      log.recordsSucceeded += 1;
      log.details.succeeded.push(synced);
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      log.recordsFailed += 1;
      log.details.failed.push({
        ...ref,
        error: errorMessage(error),
        errorType: error instanceof Error ? error.name : 'Error',
      });
      this.logger.warn(`Failed to sync ${this.entity} ${ref.name}: ${errorMessage(error)}`);
    }
    log.recordsProcessed += 1;
    await this.logs.update(log);
  }

  /**
   * Writes the parent record: `write` when a mapping exists, else `create`
   * followed by a new mapping.
   */
  protected async pushRemote(
    context: SyncContext,
    localId: string,
    values: OdooValues,
    createOnly: OdooValues = {},
  ): Promise<{ remoteId: number; created: boolean }> {
    const integrationId = context.integration.id;
    const mapping = await this.mappings.findByLocal(integrationId, this.entity, localId);

    if (mapping) {
      const written = await context.client.write(this.model, [mapping.remoteId], values);
      if (!written) {
        throw new RemoteCallError(this.model, 'write', new Error('write was not acknowledged'));
      }
      await this.mappings.touch(integrationId, this.entity, localId);
      return { remoteId: mapping.remoteId, created: false };
    }

    const remoteId = await context.client.create(this.model, { ...values, ...createOnly });
    await this.mappings.upsert(integrationId, this.entity, localId, remoteId);
    return { remoteId, created: true };
  }

  /**
   * Finds the local counterpart of a remote record: the local id tagged on
   * it at export, when that record still exists, then the mapping by remote
   * id. The match, if any, is recorded as the record's mapping.
   */
  protected async matchLocal(
    context: SyncContext,
    remoteId: number,
    backofficeId: string | null,
    fallback?: () => Promise<string | null>,
  ): Promise<string | null> {
    const integrationId = context.integration.id;

    let localId: string | null = null;
    if (backofficeId !== null && (await this.findLocal(backofficeId))) {
      localId = backofficeId;
    }
    if (localId === null) {
      const mapping = await this.mappings.findByRemote(integrationId, this.entity, remoteId);
      localId = mapping?.localId ?? null;
    }
    if (localId === null && fallback) {
      localId = await fallback();
    }

    if (localId !== null) {
      await this.mappings.upsert(integrationId, this.entity, localId, remoteId);
    }
    return localId;
  }

  /**
   * Applies an imported patch to a local record. A record that already
   * carries every value is left alone so its `updatedAt` stays put and the
   * next export does not send it back.
   */
  protected async updateLocal<P extends object>(
    localId: string,
    patch: P,
    update: (id: string, patch: P) => Promise<L>,
  ): Promise<L> {
    const current = await this.findLocal(localId);
    if (current && carriesPatch(current, patch)) {
      this.logger.debug(`${this.entity} ${localId} is unchanged; skipping the local write`);
      return current;
    }
    return update(localId, patch);
  }

  protected async recordMapping(
    context: SyncContext,
    localId: string,
    remoteId: number,
  ): Promise<void> {
    await this.mappings.upsert(context.integration.id, this.entity, localId, remoteId);
  }

  /** Deletes every child line matched by `domain`. */
  protected async clearRemoteLines(
    context: SyncContext,
    lineModel: string,
    domain: OdooDomain,
  ): Promise<void> {
    const lines = await context.client.searchRead(lineModel, domain, { fields: ['id'] });
    if (lines.length > 0) {
      await context.client.delete(
        lineModel,
        lines.map((line) => line.id),
      );
    }
  }

  protected async resolveOrFail(
    context: SyncContext,
    entity: SyncEntity,
    localId: string,
  ): Promise<number> {
    const resolution = await context.resolver.resolveLocal(context, entity, localId);
    if (!resolution.resolved) {
      throw resolution.error;
    }
    return resolution.mapping.remoteId;
  }

  protected async resolveRemoteOrFail(
    context: SyncContext,
    entity: SyncEntity,
    remoteId: number,
  ): Promise<string> {
    const resolution = await context.resolver.resolveRemote(context, entity, remoteId);
    if (!resolution.resolved) {
      throw resolution.error;
    }
    return resolution.mapping.localId;
  }
}
