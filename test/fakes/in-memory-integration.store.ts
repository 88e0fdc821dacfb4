import { IntegrationNotFoundError } from '../../src/common/errors/sync.errors';
import {
  IntegrationInput,
  IntegrationStore,
} from '../../src/integrations/integration.store';
import {
  DEFAULT_INTERVALS,
  IntegrationConfig,
  SyncEntity,
} from '../../src/integrations/integration.types';
import { FAKE_DB, FAKE_LOGIN, FAKE_SECRET } from './fake-odoo.server';

export const TEST_INPUT: IntegrationInput = {
  name: 'Main Odoo',
  url: 'http://odoo.test',
  database: FAKE_DB,
  username: FAKE_LOGIN,
  apiKey: FAKE_SECRET,
};

function copy(integration: IntegrationConfig): IntegrationConfig {
  return {
    ...integration,
    connection: { ...integration.connection },
    enabled: { ...integration.enabled },
    intervals: { ...integration.intervals },
    watermarks: { ...integration.watermarks },
  };
}

export class InMemoryIntegrationStore extends IntegrationStore {
  readonly integrations = new Map<string, IntegrationConfig>();
  private sequence = 0;

  async findById(id: string): Promise<IntegrationConfig> {
    const integration = this.integrations.get(id);
    if (!integration) {
      throw new IntegrationNotFoundError(id);
    }
    return copy(integration);
  }

  async findAll(filter?: { active?: boolean }): Promise<IntegrationConfig[]> {
    return [...this.integrations.values()]
      .filter((i) => filter?.active === undefined || i.active === filter.active)
      .map(copy);
  }

  async create(input: IntegrationInput = TEST_INPUT): Promise<IntegrationConfig> {
    this.sequence += 1;
    const integration: IntegrationConfig = {
      id: `integration-${this.sequence}`,
      name: input.name,
      active: input.active ?? true,
      connection: {
        url: input.url,
        database: input.database,
        username: input.username,
        apiKey: input.apiKey,
        companyId: input.companyId ?? 1,
        version: input.version ?? '16.0',
      },
      enabled: { customer: true, product: true, order: true, invoice: true, ...input.enabled },
      intervals: { ...DEFAULT_INTERVALS, ...input.intervals },
      watermarks: { customer: null, product: null, order: null, invoice: null },
    };
    this.integrations.set(integration.id, integration);
    return copy(integration);
  }

  async update(id: string, patch: Partial<IntegrationInput>): Promise<IntegrationConfig> {
    const current = await this.findById(id);
    const updated: IntegrationConfig = {
      ...current,
      name: patch.name ?? current.name,
      active: patch.active ?? current.active,
      connection: {
        url: patch.url ?? current.connection.url,
        database: patch.database ?? current.connection.database,
        username: patch.username ?? current.connection.username,
        apiKey: patch.apiKey ?? current.connection.apiKey,
        companyId: patch.companyId ?? current.connection.companyId,
        version: patch.version ?? current.connection.version,
      },
      enabled: { ...current.enabled, ...patch.enabled },
      intervals: { ...current.intervals, ...patch.intervals },
    };
    this.integrations.set(id, updated);
    return copy(updated);
  }

  async remove(id: string): Promise<void> {
    await this.findById(id);
    this.integrations.delete(id);
  }

  async advanceWatermark(id: string, entity: SyncEntity, at: Date): Promise<Date | null> {
    const integration = this.integrations.get(id);
    if (!integration) {
      throw new IntegrationNotFoundError(id);
    }
    const current = integration.watermarks[entity];
    if (current === null || current < at) {
      integration.watermarks[entity] = at;
    }
    return integration.watermarks[entity];
  }

  /** Sets a watermark directly, including backwards. */
  setWatermark(id: string, entity: SyncEntity, at: Date | null): void {
    const integration = this.integrations.get(id);
    if (integration) {
      integration.watermarks[entity] = at;
    }
  }
}
