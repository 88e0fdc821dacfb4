import { Process, Processor } from '@nestjs/bull';
import { Logger } from '@nestjs/common';
import { Job } from 'bull';
import { SyncStatus } from '../sync-logs/sync-log.types';
import { SYNC_JOB, SYNC_QUEUE, SyncJobData } from './sync.constants';
import { OdooSyncService } from './sync.service';

export interface SyncJobResult {
  logId: string;
  status: SyncStatus;
  recordsProcessed: number;
  recordsFailed: number;
}

@Processor(SYNC_QUEUE)
export class SyncProcessor {
  private readonly logger = new Logger(SyncProcessor.name);

  constructor(private readonly syncService: OdooSyncService) {}

  @Process(SYNC_JOB)
  async handleSync(
    job: Pick<Job<SyncJobData>, 'data' | 'attemptsMade'>,
  ): Promise<SyncJobResult> {
    const { integrationId, entity, direction } = job.data;

    this.logger.log(
      `Processing ${entity} ${direction} for integration ${integrationId} (attempt ${job.attemptsMade + 1})`,
    );

    const startTime = Date.now();
    const log = await this.syncService.syncEntity(integrationId, entity, direction);
    const duration = Date.now() - startTime;

    if (log.status === 'error') {
      this.logger.error(
        `${entity} ${direction} for integration ${integrationId} failed after ${duration}ms: ${log.errorMessage}`,
      );
      // Failing the job hands the retry to the queue's attempts and backoff.
      throw new Error(log.errorMessage ?? `${entity} ${direction} failed`);
    }

    this.logger.log(
      `${entity} ${direction} for integration ${integrationId} ended ${log.status} in ${duration}ms`,
    );

    return {
      logId: log.id,
      status: log.status,
      recordsProcessed: log.recordsProcessed,
      recordsFailed: log.recordsFailed,
    };
  }
}
