import {
  ConnectionError,
  DependencyUnresolvedError,
} from '../common/errors/sync.errors';
import { OdooClient } from '../odoo/odoo-client';
import { FakeOdooServer } from '../../test/fakes/fake-odoo.server';
import { InMemoryMappingStore } from '../../test/fakes/in-memory-mapping.store';
import { integrationConfig } from '../../test/fixtures';
import { DependencyResolver, RecordSynchronizer } from './dependency-resolver';
import { SyncContext } from './sync-context';

/** Stand-in synchronizer that maps whatever it is asked for, or fails as told. */
class StubSynchronizer implements RecordSynchronizer {
  exported: string[] = [];
  imported: number[] = [];
  failure: Error | null = null;
  skipMapping = false;

  constructor(private readonly mappings: InMemoryMappingStore) {}

  async exportOne(context: SyncContext, localId: string): Promise<number> {
    this.exported.push(localId);
    if (this.failure) throw this.failure;
    const remoteId = 100 + this.exported.length;
    if (!this.skipMapping) {
      await this.mappings.upsert(context.integration.id, 'customer', localId, remoteId);
    }
    return remoteId;
  }

  async importOne(context: SyncContext, remoteId: number): Promise<string> {
    this.imported.push(remoteId);
    if (this.failure) throw this.failure;
    const localId = `customer-${remoteId}`;
    if (!this.skipMapping) {
      await this.mappings.upsert(context.integration.id, 'customer', localId, remoteId);
    }
    return localId;
  }
}

describe('DependencyResolver', () => {
  let mappings: InMemoryMappingStore;
  let customers: StubSynchronizer;
  let others: StubSynchronizer;
  let resolver: DependencyResolver;
  let context: SyncContext;

  beforeEach(async () => {
    mappings = new InMemoryMappingStore();
    customers = new StubSynchronizer(mappings);
    others = new StubSynchronizer(mappings);
    resolver = new DependencyResolver(mappings, {
      customer: customers,
      product: others,
      order: others,
      invoice: others,
    });
    const integration = integrationConfig();
    context = {
      integration,
      client: await OdooClient.connect(integration.connection, new FakeOdooServer()),
      resolver,
    };
  });

  it('returns an existing mapping without syncing', async () => {
    mappings.seed({
      integrationId: 'integration-1',
      entity: 'customer',
      localId: 'customer-1',
      remoteId: 7,
    });

    const resolution = await resolver.resolveLocal(context, 'customer', 'customer-1');

    expect(resolution).toMatchObject({ resolved: true, mapping: { remoteId: 7 } });
    expect(customers.exported).toHaveLength(0);
  });

  it('exports a missing dependency once and returns its new mapping', async () => {
    const resolution = await resolver.resolveLocal(context, 'customer', 'customer-1');

    expect(resolution).toMatchObject({ resolved: true, mapping: { remoteId: 101 } });
    expect(customers.exported).toEqual(['customer-1']);
    expect(mappings.of('customer')).toHaveLength(1);
  });

  it('imports a missing remote dependency', async () => {
    const resolution = await resolver.resolveRemote(context, 'customer', 55);

    expect(resolution).toMatchObject({ resolved: true, mapping: { localId: 'customer-55' } });
    expect(customers.imported).toEqual([55]);
  });

  it('reports a failed dependency sync as unresolved', async () => {
    customers.failure = new Error('Email is invalid');

    const resolution = await resolver.resolveLocal(context, 'customer', 'customer-1');

    expect(resolution.resolved).toBe(false);
    if (!resolution.resolved) {
      expect(resolution.error).toBeInstanceOf(DependencyUnresolvedError);
      expect(resolution.error.message).toBe('Unresolved customer customer-1: Email is invalid');
    }
  });

  it('reports a sync that leaves no mapping as unresolved', async () => {
    customers.skipMapping = true;

    const local = await resolver.resolveLocal(context, 'customer', 'customer-1');
    const remote = await resolver.resolveRemote(context, 'customer', 9);

    expect(local).toMatchObject({
      resolved: false,
      error: { message: 'Unresolved customer customer-1: no mapping after export' },
    });
    expect(remote).toMatchObject({
      resolved: false,
      error: { message: 'Unresolved customer remote #9: no mapping after import' },
    });
  });

  it('passes an unresolved error from a nested dependency through', async () => {
    const nested = new DependencyUnresolvedError('product', 'product-3', 'template #8 has no variants');
    customers.failure = nested;

    const resolution = await resolver.resolveLocal(context, 'customer', 'customer-1');

    expect(resolution).toEqual({ resolved: false, error: nested });
  });

  it('lets a connection failure escape', async () => {
    customers.failure = new ConnectionError('http://odoo.test', 'authentication failed');

    await expect(resolver.resolveRemote(context, 'customer', 9)).rejects.toBeInstanceOf(
      ConnectionError,
    );
  });
});
