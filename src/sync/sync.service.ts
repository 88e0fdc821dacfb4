import { Injectable, Logger } from '@nestjs/common';
import { SyncInProgressError } from '../common/errors/sync.errors';
import { IntegrationStore } from '../integrations/integration.store';
import {
  IntegrationConfig,
  OdooConnection,
  PerEntity,
  SYNC_ENTITIES,
  SyncDirection,
  SyncEntity,
} from '../integrations/integration.types';
import { MappingStore } from '../mappings/mapping.store';
import { OdooClientFactory } from '../odoo/odoo-client.factory';
import { SyncLogEntry } from '../sync-logs/sync-log.types';
import { DependencyResolver } from './dependency-resolver';
import type { SyncContext } from './sync-context';
import { Synchronizer } from './synchronizers/base.synchronizer';
import { CustomerSynchronizer } from './synchronizers/customer.synchronizer';
import { InvoiceSynchronizer } from './synchronizers/invoice.synchronizer';
import { OrderSynchronizer } from './synchronizers/order.synchronizer';
import { ProductSynchronizer } from './synchronizers/product.synchronizer';

export interface ConnectionReport {
  connected: boolean;
  error: string | null;
  connection: Omit<OdooConnection, 'apiKey'>;
}

/**
 * Entry point for every sync: builds the per-invocation context and makes
 * sure one (integration, entity) pair never runs twice at the same time.
 */
@Injectable()
export class OdooSyncService {
  private readonly logger = new Logger(OdooSyncService.name);
  private readonly running = new Set<string>();
  private readonly synchronizers: PerEntity<Synchronizer>;

  constructor(
    private readonly integrations: IntegrationStore,
    private readonly clientFactory: OdooClientFactory,
    private readonly mappings: MappingStore,
    customers: CustomerSynchronizer,
    products: ProductSynchronizer,
    orders: OrderSynchronizer,
    invoices: InvoiceSynchronizer,
  ) {
    this.synchronizers = {
      customer: customers,
      product: products,
      order: orders,
      invoice: invoices,
    };
  }

  syncProducts(integrationId: string, direction: SyncDirection): Promise<SyncLogEntry> {
    return this.syncEntity(integrationId, 'product', direction);
  }

  syncCustomers(integrationId: string, direction: SyncDirection): Promise<SyncLogEntry> {
    return this.syncEntity(integrationId, 'customer', direction);
  }

  syncOrders(integrationId: string, direction: SyncDirection): Promise<SyncLogEntry> {
    return this.syncEntity(integrationId, 'order', direction);
  }

  syncInvoices(integrationId: string, direction: SyncDirection): Promise<SyncLogEntry> {
    return this.syncEntity(integrationId, 'invoice', direction);
  }

  async syncEntity(
    integrationId: string,
    entity: SyncEntity,
    direction: SyncDirection,
  ): Promise<SyncLogEntry> {
    return this.runExclusive(integrationId, entity, async () => {
      const integration = await this.integrations.findById(integrationId);
      const context = await this.openContext(integration);
      return this.synchronizers[entity].sync(context, direction);
    });
  }

  /** Enabled entities in dependency order, one log entry each. */
  async syncAll(integrationId: string, direction: SyncDirection): Promise<SyncLogEntry[]> {
    const integration = await this.integrations.findById(integrationId);
    const context = await this.openContext(integration);
    const logs: SyncLogEntry[] = [];

    for (const entity of SYNC_ENTITIES) {
      if (!integration.enabled[entity]) {
        this.logger.log(`Skipping disabled ${entity} sync for ${integration.name}`);
        continue;
      }
      // Later entities read the watermarks the earlier runs advanced.
      context.integration = await this.integrations.findById(integrationId);
      try {
        logs.push(
          await this.runExclusive(integrationId, entity, () =>
            this.synchronizers[entity].sync(context, direction),
          ),
        );
      } catch (error) {
        if (!(error instanceof SyncInProgressError)) {
          throw error;
        }
        this.logger.warn(`Skipping ${entity} for ${integration.name}: ${error.message}`);
      }
    }
    return logs;
  }

  /** Opens a session and reports the outcome; nothing is written. */
  async testConnection(integrationId: string): Promise<ConnectionReport> {
    const integration = await this.integrations.findById(integrationId);
    const client = await this.clientFactory.connect(integration);
    const { url, database, username, companyId, version } = integration.connection;

    return {
      connected: client.isConnected,
      error: client.connectionFailure,
      connection: { url, database, username, companyId, version },
    };
  }

  private async openContext(integration: IntegrationConfig): Promise<SyncContext> {
    const client = await this.clientFactory.connect(integration);
    return {
      integration,
      client,
      resolver: new DependencyResolver(this.mappings, this.synchronizers),
    };
  }

  private async runExclusive<T>(
    integrationId: string,
    entity: SyncEntity,
    work: () => Promise<T>,
  ): Promise<T> {
    const key = `${integrationId}/${entity}`;
    if (this.running.has(key)) {
      throw new SyncInProgressError(key);
    }
    this.running.add(key);
    try {
      return await work();
    } finally {
      this.running.delete(key);
    }
  }
}
