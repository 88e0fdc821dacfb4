import { getQueueToken } from '@nestjs/bull';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { IntegrationStore } from '../integrations/integration.store';
import { FakeQueue } from '../../test/fakes/fake-queue';
import {
  InMemoryIntegrationStore,
  TEST_INPUT,
} from '../../test/fakes/in-memory-integration.store';
import { SYNC_JOB, SYNC_QUEUE } from './sync.constants';
import { SyncScheduler } from './sync.scheduler';

describe('SyncScheduler', () => {
  let queue: FakeQueue;
  let integrations: InMemoryIntegrationStore;

  async function createScheduler(settings: Record<string, unknown> = {}): Promise<SyncScheduler> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        SyncScheduler,
        { provide: getQueueToken(SYNC_QUEUE), useValue: queue },
        { provide: IntegrationStore, useValue: integrations },
        { provide: ConfigService, useValue: new ConfigService({ sync: settings }) },
      ],
    }).compile();
    return moduleRef.get(SyncScheduler);
  }

  beforeEach(() => {
    queue = new FakeQueue();
    integrations = new InMemoryIntegrationStore();
  });

  it('adds one repeatable export job per enabled entity', async () => {
    const scheduler = await createScheduler({ jobAttempts: 5, jobBackoffMs: 30000 });
    const integration = await integrations.create({
      ...TEST_INPUT,
      enabled: { invoice: false },
      intervals: { order: 15 },
    });

    await expect(scheduler.schedule(integration)).resolves.toBe(3);

    expect(queue.added.map((job) => job.data.entity)).toEqual(['customer', 'product', 'order']);
    expect(queue.added[2]).toEqual({
      name: SYNC_JOB,
      data: { integrationId: integration.id, entity: 'order', direction: 'export' },
      opts: {
        jobId: `${integration.id}:order`,
        repeat: { every: 15 * 60 * 1000 },
        attempts: 5,
        backoff: { type: 'fixed', delay: 30000 },
        removeOnComplete: true,
      },
    });
  });

  it('replaces the jobs of an integration when it is scheduled again', async () => {
    const scheduler = await createScheduler();
    const integration = await integrations.create(TEST_INPUT);
    await scheduler.schedule(integration);

    const updated = await integrations.update(integration.id, { enabled: { product: false } });
    await scheduler.schedule(updated);

    expect(queue.repeatables.map((job) => job.id)).toEqual([
      `${integration.id}:customer`,
      `${integration.id}:order`,
      `${integration.id}:invoice`,
    ]);
  });

  it('removes only the jobs of the given integration', async () => {
    const scheduler = await createScheduler();
    const first = await integrations.create(TEST_INPUT);
    const second = await integrations.create({ ...TEST_INPUT, name: 'Second Odoo' });
    await scheduler.schedule(first);
    await scheduler.schedule(second);

    await scheduler.unschedule(first.id);

    expect(queue.repeatables).toHaveLength(4);
    expect(queue.repeatables.every((job) => job.id.startsWith(`${second.id}:`))).toBe(true);
  });

  it('schedules nothing for an inactive integration', async () => {
    const scheduler = await createScheduler();
    const integration = await integrations.create({ ...TEST_INPUT, active: false });

    await expect(scheduler.schedule(integration)).resolves.toBe(0);
    expect(queue.added).toHaveLength(0);
  });

  it('schedules every active integration on start', async () => {
    const scheduler = await createScheduler();
    await integrations.create(TEST_INPUT);
    await integrations.create({ ...TEST_INPUT, active: false });

    await scheduler.onModuleInit();

    expect(queue.added).toHaveLength(4);
    expect(new Set(queue.added.map((job) => job.data.integrationId))).toEqual(
      new Set(['integration-1']),
    );
  });

  it('stays idle on start when scheduling is switched off', async () => {
    const scheduler = await createScheduler({ schedulerEnabled: false });
    await integrations.create(TEST_INPUT);

    await scheduler.onModuleInit();

    expect(queue.added).toHaveLength(0);
  });
});
