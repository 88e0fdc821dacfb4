import { Test } from '@nestjs/testing';
import {
  IntegrationNotFoundError,
  SyncInProgressError,
} from '../common/errors/sync.errors';
import { IntegrationStore } from '../integrations/integration.store';
import { IntegrationConfig } from '../integrations/integration.types';
import { MappingStore } from '../mappings/mapping.store';
import { OdooClient } from '../odoo/odoo-client';
import { OdooClientFactory } from '../odoo/odoo-client.factory';
import { SyncLogEntry } from '../sync-logs/sync-log.types';
import { customerInput, productInput } from '../../test/fixtures';
import { createSyncHarness, SyncHarness } from '../../test/sync-harness';
import { OdooSyncService } from './sync.service';
import { CustomerSynchronizer } from './synchronizers/customer.synchronizer';
import { InvoiceSynchronizer } from './synchronizers/invoice.synchronizer';
import { OrderSynchronizer } from './synchronizers/order.synchronizer';
import { ProductSynchronizer } from './synchronizers/product.synchronizer';

describe('OdooSyncService', () => {
  let h: SyncHarness;
  let service: OdooSyncService;

  beforeEach(async () => {
    h = await createSyncHarness();
    const clientFactory: Pick<OdooClientFactory, 'connect'> = {
      connect: (integration: IntegrationConfig) =>
        OdooClient.connect(integration.connection, h.server),
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        OdooSyncService,
        { provide: IntegrationStore, useValue: h.integrations },
        { provide: OdooClientFactory, useValue: clientFactory },
        { provide: MappingStore, useValue: h.mappings },
        { provide: CustomerSynchronizer, useValue: h.customerSynchronizer },
        { provide: ProductSynchronizer, useValue: h.productSynchronizer },
        { provide: OrderSynchronizer, useValue: h.orderSynchronizer },
        { provide: InvoiceSynchronizer, useValue: h.invoiceSynchronizer },
      ],
    }).compile();
    service = moduleRef.get(OdooSyncService);
  });

  it('runs one entity in one direction', async () => {
    await h.products.create(productInput());

    const log = await service.syncProducts(h.integration.id, 'export');

    expect(log).toMatchObject({ entity: 'product', direction: 'export', status: 'success' });
    expect(h.server.rows('product.template')).toHaveLength(1);
  });

  it('refuses a second run of the same entity while one is in flight', async () => {
    const first = service.syncEntity(h.integration.id, 'product', 'export');

    await expect(
      service.syncEntity(h.integration.id, 'product', 'import'),
    ).rejects.toBeInstanceOf(SyncInProgressError);
    await expect(service.syncCustomers(h.integration.id, 'export')).resolves.toMatchObject({
      status: 'success',
    });

    await expect(first).resolves.toMatchObject({ status: 'success' });
    await expect(service.syncProducts(h.integration.id, 'import')).resolves.toMatchObject({
      status: 'success',
    });
  });

  it('runs the enabled entities in dependency order', async () => {
    const integration = await h.integrations.create({
      name: 'Orders elsewhere',
      url: 'http://odoo.test',
      database: h.integration.connection.database,
      username: h.integration.connection.username,
      apiKey: h.integration.connection.apiKey,
      enabled: { order: false },
    });
    await h.customers.create(customerInput());

    const logs = await service.syncAll(integration.id, 'export');

    expect(logs.map((log) => log.entity)).toEqual(['customer', 'product', 'invoice']);
    expect(logs.every((log) => log.status === 'success')).toBe(true);
    const stored = await h.integrations.findById(integration.id);
    expect(stored.watermarks.order).toBeNull();
    expect(stored.watermarks.customer).toEqual(logs[0].startedAt);
  });

  it('skips an entity that is already running and syncs the rest', async () => {
    let release: (log: SyncLogEntry) => void = () => undefined;
    jest.spyOn(h.productSynchronizer, 'sync').mockImplementationOnce(
      () =>
        new Promise<SyncLogEntry>((resolve) => {
          release = resolve;
        }),
    );
    const running = service.syncProducts(h.integration.id, 'export');

    const logs = await service.syncAll(h.integration.id, 'export');

    expect(logs.map((log) => log.entity)).toEqual(['customer', 'order', 'invoice']);
    expect(logs.every((log) => log.status === 'success')).toBe(true);
    release(logs[0]);
    await expect(running).resolves.toBe(logs[0]);
  });

  it('reports a working connection without the API key', async () => {
    const report = await service.testConnection(h.integration.id);

    expect(report).toEqual({
      connected: true,
      error: null,
      connection: {
        url: 'http://odoo.test',
        database: 'rental',
        username: 'admin',
        companyId: 1,
        version: '16.0',
      },
    });
  });

  it('reports rejected credentials', async () => {
    const integration = await h.integrations.create({
      name: 'Wrong key',
      url: 'http://odoo.test',
      database: 'rental',
      username: 'admin',
      apiKey: 'wrong-key',
    });

    await expect(service.testConnection(integration.id)).resolves.toMatchObject({
      connected: false,
      error: 'authentication failed',
    });
  });

  it('rejects an unknown integration', async () => {
    await expect(service.syncOrders('missing', 'export')).rejects.toBeInstanceOf(
      IntegrationNotFoundError,
    );
    await expect(service.syncInvoices('missing', 'export')).rejects.toThrow(
      'Odoo integration missing not found',
    );
  });
});
