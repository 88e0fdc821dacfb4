import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DependencyUnresolvedError } from '../../common/errors/sync.errors';
import { IntegrationStore } from '../../integrations/integration.store';
import { MappingStore } from '../../mappings/mapping.store';
import { OdooDomain, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { ProductsRepository } from '../../rental/rental.repositories';
import { Product } from '../../rental/rental.types';
import { SyncLogStore } from '../../sync-logs/sync-log.store';
import { SyncedRecord } from '../../sync-logs/sync-log.types';
import {
  newProductFrom,
  PRODUCT_TEMPLATE,
  PRODUCT_TEMPLATE_FIELDS,
  PRODUCT_VARIANT,
  productUpdateFrom,
  readProductTemplate,
  toProductTemplate,
} from '../projections/product.projection';
import { requireMany2One } from '../odoo-fields';
import type { SyncContext } from '../sync-context';
import { EntitySynchronizer } from './base.synchronizer';

@Injectable()
export class ProductSynchronizer extends EntitySynchronizer<Product> {
  readonly entity = 'product';
  protected readonly model = PRODUCT_TEMPLATE;

  constructor(
    private readonly products: ProductsRepository,
    mappings: MappingStore,
    logs: SyncLogStore,
    integrations: IntegrationStore,
    configService: ConfigService,
  ) {
    super(mappings, logs, integrations, configService);
  }

  protected findChangedLocal(since: Date | null): Promise<Product[]> {
    return this.products.findChangedSince(since);
  }

  protected findLocal(id: string): Promise<Product | null> {
    return this.products.findById(id);
  }

  protected localName(product: Product): string {
    return product.name;
  }

  protected importDomain(): OdooDomain {
    return [];
  }

  protected importFields(): string[] {
    return PRODUCT_TEMPLATE_FIELDS;
  }

  protected async exportRecord(context: SyncContext, product: Product): Promise<number> {
    const { remoteId } = await this.pushRemote(
      context,
      product.id,
      toProductTemplate(product, context.integration),
    );
    return remoteId;
  }

  protected async importRecord(
    context: SyncContext,
    record: OdooRecord,
  ): Promise<SyncedRecord> {
    const remote = readProductTemplate(record);
    const localId = await this.matchLocal(context, remote.id, remote.backofficeId);

    if (localId !== null) {
      const product = await this.updateLocal(localId, productUpdateFrom(remote), (id, patch) =>
        this.products.update(id, patch),
      );
      return { localId, remoteId: remote.id, name: product.name };
    }

    const product = await this.products.create(
      newProductFrom(remote, await this.products.nextCode()),
    );
    await this.recordMapping(context, product.id, remote.id);
    return { localId: product.id, remoteId: remote.id, name: product.name };
  }

  /** First `product.product` variant of a template, which sale and invoice lines reference. */
  private async variantOf(context: SyncContext, templateId: number): Promise<number | null> {
    const [variant] = await context.client.searchRead(
      PRODUCT_VARIANT,
      [['product_tmpl_id', '=', templateId]],
      { fields: ['id'], limit: 1, order: 'id asc' },
    );
    return variant ? variant.id : null;
  }

  /** Template a `product.product` variant belongs to. */
  private async templateOf(context: SyncContext, variantId: number): Promise<number | null> {
    const [variant] = await context.client.searchRead(
      PRODUCT_VARIANT,
      [['id', '=', variantId]],
      { fields: ['product_tmpl_id'], limit: 1 },
    );
    return variant ? requireMany2One(variant, 'product_tmpl_id') : null;
  }

  /** Remote variant for a local product, exporting the product first when unmapped. */
  async resolveVariant(context: SyncContext, productId: string): Promise<number> {
    const templateId = await this.resolveOrFail(context, 'product', productId);
    const variantId = await this.variantOf(context, templateId);
    if (variantId === null) {
      throw new DependencyUnresolvedError(
        'product',
        productId,
        `template #${templateId} has no variants`,
      );
    }
    return variantId;
  }

  /** Local product behind a remote variant, importing its template first when unmapped. */
  async resolveLocalProduct(context: SyncContext, variantId: number): Promise<string> {
    const templateId = await this.templateOf(context, variantId);
    if (templateId === null) {
      throw new DependencyUnresolvedError(
        'product',
        `variant #${variantId}`,
        `not found in ${PRODUCT_VARIANT}`,
      );
    }
    return this.resolveRemoteOrFail(context, 'product', templateId);
  }

  /** Local product behind a remote variant when it is already mapped; never imports. */
  async findLocalProduct(context: SyncContext, variantId: number): Promise<string | null> {
    const templateId = await this.templateOf(context, variantId);
    if (templateId === null) {
      return null;
    }
    const mapping = await this.mappings.findByRemote(
      context.integration.id,
      'product',
      templateId,
    );
    return mapping ? mapping.localId : null;
  }
}
