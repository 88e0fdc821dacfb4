import { ConfigService } from '@nestjs/config';
import { IntegrationInput } from '../src/integrations/integration.store';
import { IntegrationConfig } from '../src/integrations/integration.types';
import { OdooClient } from '../src/odoo/odoo-client';
import { DependencyResolver } from '../src/sync/dependency-resolver';
import { SyncContext } from '../src/sync/sync-context';
import { CustomerSynchronizer } from '../src/sync/synchronizers/customer.synchronizer';
import { InvoiceSynchronizer } from '../src/sync/synchronizers/invoice.synchronizer';
import { OrderSynchronizer } from '../src/sync/synchronizers/order.synchronizer';
import { ProductSynchronizer } from '../src/sync/synchronizers/product.synchronizer';
import { FakeOdooServer } from './fakes/fake-odoo.server';
import {
  InMemoryIntegrationStore,
  TEST_INPUT,
} from './fakes/in-memory-integration.store';
import { InMemoryMappingStore } from './fakes/in-memory-mapping.store';
import {
  InMemoryCustomersRepository,
  InMemoryInvoicesRepository,
  InMemoryOrdersRepository,
  InMemoryProductsRepository,
  TestClock,
} from './fakes/in-memory-rental.repositories';
import { InMemorySyncLogStore } from './fakes/in-memory-sync-log.store';

export interface SyncHarness {
  server: FakeOdooServer;
  clock: TestClock;
  integrations: InMemoryIntegrationStore;
  mappings: InMemoryMappingStore;
  logs: InMemorySyncLogStore;
  products: InMemoryProductsRepository;
  customers: InMemoryCustomersRepository;
  orders: InMemoryOrdersRepository;
  invoices: InMemoryInvoicesRepository;
  productSynchronizer: ProductSynchronizer;
  customerSynchronizer: CustomerSynchronizer;
  orderSynchronizer: OrderSynchronizer;
  invoiceSynchronizer: InvoiceSynchronizer;
  integration: IntegrationConfig;
  /** Fresh context: current integration state and a new session. */
  context(): Promise<SyncContext>;
}

/** Synchronizers wired to in-memory stores and an in-process Odoo server. */
export async function createSyncHarness(
  overrides: Partial<IntegrationInput> = {},
  settings: { importPageSize?: number } = {},
): Promise<SyncHarness> {
  const server = new FakeOdooServer();
  const clock = new TestClock();
  const integrations = new InMemoryIntegrationStore();
  const mappings = new InMemoryMappingStore();
  const logs = new InMemorySyncLogStore();
  const products = new InMemoryProductsRepository(clock);
  const customers = new InMemoryCustomersRepository(clock);
  const orders = new InMemoryOrdersRepository(clock);
  const invoices = new InMemoryInvoicesRepository(clock);
  const configService = new ConfigService({
    sync: { importPageSize: settings.importPageSize ?? 200 },
  });

  const productSynchronizer = new ProductSynchronizer(
    products,
    mappings,
    logs,
    integrations,
    configService,
  );
  const customerSynchronizer = new CustomerSynchronizer(
    customers,
    mappings,
    logs,
    integrations,
    configService,
  );
  const orderSynchronizer = new OrderSynchronizer(
    orders,
    productSynchronizer,
    mappings,
    logs,
    integrations,
    configService,
  );
  const invoiceSynchronizer = new InvoiceSynchronizer(
    invoices,
    orders,
    productSynchronizer,
    mappings,
    logs,
    integrations,
    configService,
  );

  const integration = await integrations.create({ ...TEST_INPUT, ...overrides });
  const resolver = new DependencyResolver(mappings, {
    customer: customerSynchronizer,
    product: productSynchronizer,
    order: orderSynchronizer,
    invoice: invoiceSynchronizer,
  });

  return {
    server,
    clock,
    integrations,
    mappings,
    logs,
    products,
    customers,
    orders,
    invoices,
    productSynchronizer,
    customerSynchronizer,
    orderSynchronizer,
    invoiceSynchronizer,
    integration,
    async context() {
      const current = await integrations.findById(integration.id);
      return {
        integration: current,
        client: await OdooClient.connect(current.connection, server),
        resolver,
      };
    },
  };
}
