import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IntegrationStore } from '../../integrations/integration.store';
import { MappingStore } from '../../mappings/mapping.store';
import { OdooDomain, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import {
  InvoicesRepository,
  OrdersRepository,
} from '../../rental/rental.repositories';
import { Invoice, InvoiceItem, InvoiceItemInput } from '../../rental/rental.types';
import { SyncLogStore } from '../../sync-logs/sync-log.store';
import { SyncedRecord } from '../../sync-logs/sync-log.types';
import {
  ACCOUNT_MOVE,
  ACCOUNT_MOVE_FIELDS,
  ACCOUNT_MOVE_LINE,
  ACCOUNT_MOVE_LINE_FIELDS,
  CUSTOMER_INVOICE,
  productLineCondition,
  readAccountMove,
  readAccountMoveLine,
  toAccountMove,
  toAccountMoveLine,
} from '../projections/invoice.projection';
import { fromMoveState } from '../status-translation';
import type { SyncContext } from '../sync-context';
import { EntitySynchronizer } from './base.synchronizer';
import { ProductSynchronizer } from './product.synchronizer';

@Injectable()
export class InvoiceSynchronizer extends EntitySynchronizer<Invoice> {
  readonly entity = 'invoice';
  protected readonly model = ACCOUNT_MOVE;

  constructor(
    private readonly invoices: InvoicesRepository,
    private readonly orders: OrdersRepository,
    private readonly productSynchronizer: ProductSynchronizer,
    mappings: MappingStore,
    logs: SyncLogStore,
    integrations: IntegrationStore,
    configService: ConfigService,
  ) {
    super(mappings, logs, integrations, configService);
  }

  protected findChangedLocal(since: Date | null): Promise<Invoice[]> {
    return this.invoices.findChangedSince(since);
  }

  protected findLocal(id: string): Promise<Invoice | null> {
    return this.invoices.findById(id);
  }

  protected localName(invoice: Invoice): string {
    return invoice.number;
  }

  protected importDomain(): OdooDomain {
    return [['move_type', '=', CUSTOMER_INVOICE]];
  }

  protected importFields(): string[] {
    return ACCOUNT_MOVE_FIELDS;
  }

  protected async exportRecord(context: SyncContext, invoice: Invoice): Promise<number> {
    const { integration } = context;
    const partnerId = await this.resolveOrFail(context, 'customer', invoice.customerId);
    const orderCode = await this.linkedOrderCode(context, invoice);

    const lines: Array<{ item: InvoiceItem; variantId: number | null }> = [];
    for (const item of invoice.items) {
      lines.push({
        item,
        variantId:
          item.productId === null
            ? null
            : await this.productSynchronizer.resolveVariant(context, item.productId),
      });
    }

    const { remoteId, created } = await this.pushRemote(
      context,
      invoice.id,
      toAccountMove(invoice, partnerId, orderCode, integration),
      { move_type: CUSTOMER_INVOICE },
    );

    if (!created) {
      await this.clearRemoteLines(context, ACCOUNT_MOVE_LINE, [
        ['move_id', '=', remoteId],
        productLineCondition(integration),
      ]);
    }
    for (const { item, variantId } of lines) {
      await context.client.create(
        ACCOUNT_MOVE_LINE,
        toAccountMoveLine(item, remoteId, variantId, integration),
      );
    }
    return remoteId;
  }

  protected async importRecord(
    context: SyncContext,
    record: OdooRecord,
  ): Promise<SyncedRecord> {
    const remote = readAccountMove(record);
    const customerId = await this.resolveRemoteOrFail(context, 'customer', remote.partnerId);
    const order =
      remote.invoiceOrigin === null
        ? null
        : await this.orders.findByCode(remote.invoiceOrigin);

    const lineRecords = await context.client.searchRead(
      ACCOUNT_MOVE_LINE,
      [['move_id', '=', remote.id], productLineCondition(context.integration)],
      { fields: ACCOUNT_MOVE_LINE_FIELDS, order: 'id asc' },
    );
    const items: InvoiceItemInput[] = [];
    for (const lineRecord of lineRecords) {
      const line = readAccountMoveLine(lineRecord);
      items.push({
        productId:
          line.variantId === null
            ? null
            : await this.productSynchronizer.findLocalProduct(context, line.variantId),
        name: line.name,
        description: line.name,
        quantity: line.quantity,
        unitPrice: line.priceUnit,
      });
    }

    const fields = {
      customerId,
      orderId: order ? order.id : null,
      issueDate: remote.invoiceDate,
      dueDate: remote.invoiceDateDue,
      status: fromMoveState(remote.state, remote.paymentState),
      amount: remote.amountTotal,
      paidAmount: remote.paidAmount,
      notes: remote.narration,
      items,
    };

    const localId = await this.matchLocal(context, remote.id, remote.backofficeId);
    if (localId !== null) {
      const invoice = await this.updateLocal(localId, fields, (id, patch) =>
        this.invoices.update(id, patch),
      );
      return { localId, remoteId: remote.id, name: invoice.number };
    }

    const invoice = await this.invoices.create({
      ...fields,
      code: remote.ref ?? (await this.invoices.nextCode()),
      number: remote.name ?? (await this.invoices.nextNumber()),
    });
    await this.recordMapping(context, invoice.id, remote.id);
    return { localId: invoice.id, remoteId: remote.id, name: invoice.number };
  }

  /** Code of the linked order once it exists in Odoo; the link itself is optional. */
  private async linkedOrderCode(
    context: SyncContext,
    invoice: Invoice,
  ): Promise<string | null> {
    if (invoice.orderId === null) {
      return null;
    }
    const resolution = await context.resolver.resolveLocal(context, 'order', invoice.orderId);
    if (!resolution.resolved) {
      this.logger.warn(
        `Invoice ${invoice.number} exported without its order: ${resolution.error.message}`,
      );
      return null;
    }
    const order = await this.orders.findById(invoice.orderId);
    return order ? order.code : null;
  }
}
