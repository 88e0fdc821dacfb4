import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IntegrationStore } from '../../integrations/integration.store';
import { MappingStore } from '../../mappings/mapping.store';
import { OdooDomain, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { OrdersRepository } from '../../rental/rental.repositories';
import { Order, OrderItem, OrderItemInput } from '../../rental/rental.types';
import { SyncLogStore } from '../../sync-logs/sync-log.store';
import { SyncedRecord } from '../../sync-logs/sync-log.types';
import {
  readSaleOrder,
  readSaleOrderLine,
  SALE_ORDER,
  SALE_ORDER_FIELDS,
  SALE_ORDER_LINE,
  SALE_ORDER_LINE_FIELDS,
  toSaleOrder,
  toSaleOrderLine,
} from '../projections/order.projection';
import { fromSaleOrderState } from '../status-translation';
import type { SyncContext } from '../sync-context';
import { EntitySynchronizer } from './base.synchronizer';
import { ProductSynchronizer } from './product.synchronizer';

@Injectable()
export class OrderSynchronizer extends EntitySynchronizer<Order> {
  readonly entity = 'order';
  protected readonly model = SALE_ORDER;

  constructor(
    private readonly orders: OrdersRepository,
    private readonly productSynchronizer: ProductSynchronizer,
    mappings: MappingStore,
    logs: SyncLogStore,
    integrations: IntegrationStore,
    configService: ConfigService,
  ) {
    super(mappings, logs, integrations, configService);
  }

  protected findChangedLocal(since: Date | null): Promise<Order[]> {
    return this.orders.findChangedSince(since);
  }

  protected findLocal(id: string): Promise<Order | null> {
    return this.orders.findById(id);
  }

  protected localName(order: Order): string {
    return order.code;
  }

  protected importDomain(): OdooDomain {
    return [];
  }

  protected importFields(): string[] {
    return SALE_ORDER_FIELDS;
  }

  protected async exportRecord(context: SyncContext, order: Order): Promise<number> {
    // Every dependency is settled before the order itself is written.
    const partnerId = await this.resolveOrFail(context, 'customer', order.customerId);
    const lines: Array<{ item: OrderItem; variantId: number }> = [];
    for (const item of order.items) {
      lines.push({
        item,
        variantId: await this.productSynchronizer.resolveVariant(context, item.productId),
      });
    }

    const { remoteId, created } = await this.pushRemote(
      context,
      order.id,
      toSaleOrder(order, partnerId, context.integration),
    );

    if (!created) {
      await this.clearRemoteLines(context, SALE_ORDER_LINE, [['order_id', '=', remoteId]]);
    }
    for (const { item, variantId } of lines) {
      await context.client.create(SALE_ORDER_LINE, toSaleOrderLine(item, remoteId, variantId));
    }
    return remoteId;
  }

  protected async importRecord(
    context: SyncContext,
    record: OdooRecord,
  ): Promise<SyncedRecord> {
    const remote = readSaleOrder(record);
    const customerId = await this.resolveRemoteOrFail(context, 'customer', remote.partnerId);

    const lineRecords = await context.client.searchRead(
      SALE_ORDER_LINE,
      [['order_id', '=', remote.id]],
      { fields: SALE_ORDER_LINE_FIELDS, order: 'id asc' },
    );
    const items: OrderItemInput[] = [];
    for (const lineRecord of lineRecords) {
      const line = readSaleOrderLine(lineRecord);
      items.push({
        productId: await this.productSynchronizer.resolveLocalProduct(context, line.variantId),
        name: line.name,
        quantity: line.quantity,
        price: line.priceUnit,
      });
    }

    const fields = {
      customerId,
      orderDate: remote.dateOrder,
      status: fromSaleOrderState(remote.state),
      notes: remote.note,
      items,
    };

    const localId = await this.matchLocal(context, remote.id, remote.backofficeId);
    if (localId !== null) {
      const order = await this.updateLocal(localId, fields, (id, patch) =>
        this.orders.update(id, patch),
      );
      return { localId, remoteId: remote.id, name: order.code };
    }

    const order = await this.orders.create({
      ...fields,
      code: remote.clientOrderRef ?? (await this.orders.nextCode()),
      tax: 0,
      deliveryFee: 0,
      paymentStatus: 'pending',
    });
    await this.recordMapping(context, order.id, remote.id);
    return { localId: order.id, remoteId: remote.id, name: order.code };
  }
}
