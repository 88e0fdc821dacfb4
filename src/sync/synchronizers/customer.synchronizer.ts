import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IntegrationStore } from '../../integrations/integration.store';
import { MappingStore } from '../../mappings/mapping.store';
import { OdooDomain, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { CustomersRepository } from '../../rental/rental.repositories';
import { Customer } from '../../rental/rental.types';
import { SyncLogStore } from '../../sync-logs/sync-log.store';
import { SyncedRecord } from '../../sync-logs/sync-log.types';
import {
  baseUsername,
  customerDomain,
  customerUpdateFrom,
  fullName,
  newCustomerFrom,
  PARTNER,
  PARTNER_FIELDS,
  readPartner,
  RemotePartner,
  toPartner,
} from '../projections/customer.projection';
import type { SyncContext } from '../sync-context';
import { EntitySynchronizer } from './base.synchronizer';

@Injectable()
export class CustomerSynchronizer extends EntitySynchronizer<Customer> {
  readonly entity = 'customer';
  protected readonly model = PARTNER;

  constructor(
    private readonly customers: CustomersRepository,
    mappings: MappingStore,
    logs: SyncLogStore,
    integrations: IntegrationStore,
    configService: ConfigService,
  ) {
    super(mappings, logs, integrations, configService);
  }

  protected findChangedLocal(since: Date | null): Promise<Customer[]> {
    return this.customers.findChangedSince(since);
  }

  protected findLocal(id: string): Promise<Customer | null> {
    return this.customers.findById(id);
  }

  protected localName(customer: Customer): string {
    return fullName(customer) || customer.username;
  }

  protected importDomain(context: SyncContext): OdooDomain {
    return customerDomain(context.integration);
  }

  protected importFields(): string[] {
    return PARTNER_FIELDS;
  }

  protected async exportRecord(context: SyncContext, customer: Customer): Promise<number> {
    const { remoteId } = await this.pushRemote(
      context,
      customer.id,
      toPartner(customer, context.integration),
    );
    return remoteId;
  }

  protected async importRecord(
    context: SyncContext,
    record: OdooRecord,
  ): Promise<SyncedRecord> {
    const remote = readPartner(record);
    const localId = await this.matchLocal(
      context,
      remote.id,
      remote.backofficeId,
      () => this.matchByEmail(remote),
    );

    if (localId !== null) {
      const customer = await this.updateLocal(localId, customerUpdateFrom(remote), (id, patch) =>
        this.customers.update(id, patch),
      );
      return { localId, remoteId: remote.id, name: this.localName(customer) };
    }

    const customer = await this.customers.create(
      newCustomerFrom(remote, await this.uniqueUsername(baseUsername(remote))),
    );
    await this.recordMapping(context, customer.id, remote.id);
    return { localId: customer.id, remoteId: remote.id, name: this.localName(customer) };
  }

  private async matchByEmail(remote: RemotePartner): Promise<string | null> {
    if (remote.email === null) {
      return null;
    }
    const customer = await this.customers.findByEmail(remote.email);
    return customer ? customer.id : null;
  }

  /** `ada`, then `ada1`, `ada2`, ... until one is free. */
  private async uniqueUsername(base: string): Promise<string> {
    let username = base;
    for (let counter = 1; await this.customers.usernameExists(username); counter += 1) {
      username = `${base}${counter}`;
    }
    return username;
  }
}
