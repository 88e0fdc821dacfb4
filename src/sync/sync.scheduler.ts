import { InjectQueue } from '@nestjs/bull';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bull';
import { IntegrationStore } from '../integrations/integration.store';
import {
  IntegrationConfig,
  SYNC_ENTITIES,
} from '../integrations/integration.types';
import {
  DEFAULT_DIRECTION,
  SYNC_JOB,
  SYNC_QUEUE,
  SyncJobData,
} from './sync.constants';

const MINUTE_MS = 60 * 1000;

/**
 * Keeps one repeatable queue job per active integration and enabled entity,
 * repeating at the entity's interval.
 */
@Injectable()
export class SyncScheduler implements OnModuleInit {
  private readonly logger = new Logger(SyncScheduler.name);

  constructor(
    @InjectQueue(SYNC_QUEUE) private readonly syncQueue: Queue<SyncJobData>,
    private readonly integrations: IntegrationStore,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.configService.get<boolean>('sync.schedulerEnabled', true)) {
      this.logger.log('Scheduled sync is disabled');
      return;
    }

    const integrations = await this.integrations.findAll({ active: true });
    for (const integration of integrations) {
      await this.schedule(integration);
    }
  }

  /** Replaces the integration's repeatable jobs with ones matching its current settings. */
  async schedule(integration: IntegrationConfig): Promise<number> {
    await this.unschedule(integration.id);
    if (!integration.active) {
      return 0;
    }

    const attempts = this.configService.get<number>('sync.jobAttempts', 3);
    const delay = this.configService.get<number>('sync.jobBackoffMs', 60000);
    let scheduled = 0;

    for (const entity of SYNC_ENTITIES) {
      if (!integration.enabled[entity]) {
        continue;
      }
      const every = integration.intervals[entity] * MINUTE_MS;
      await this.syncQueue.add(
        SYNC_JOB,
        { integrationId: integration.id, entity, direction: DEFAULT_DIRECTION },
        {
          jobId: jobIdFor(integration.id, entity),
          repeat: { every },
          attempts,
          backoff: { type: 'fixed', delay },
          removeOnComplete: true,
        },
      );
      scheduled += 1;
    }

    this.logger.log(`Scheduled ${scheduled} sync jobs for integration ${integration.name}`);
    return scheduled;
  }

  async unschedule(integrationId: string): Promise<void> {
    const prefix = jobIdFor(integrationId, '');
    const jobs = await this.syncQueue.getRepeatableJobs();
    for (const job of jobs) {
      if (job.id && job.id.startsWith(prefix)) {
        await this.syncQueue.removeRepeatableByKey(job.key);
      }
    }
  }
}

function jobIdFor(integrationId: string, entity: string): string {
  return `${integrationId}:${entity}`;
}
