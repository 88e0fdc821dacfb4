import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, UpdateQuery } from 'mongoose';
import { IntegrationNotFoundError } from '../common/errors/sync.errors';
import { IntegrationInput, IntegrationStore } from './integration.store';
import {
  DEFAULT_INTERVALS,
  IntegrationConfig,
  SYNC_ENTITIES,
  SyncEntity,
} from './integration.types';
import {
  OdooIntegration,
  OdooIntegrationDocument,
} from './schemas/odoo-integration.schema';

@Injectable()
export class IntegrationsService extends IntegrationStore {
  private readonly logger = new Logger(IntegrationsService.name);

  constructor(
    @InjectModel(OdooIntegration.name)
    private integrationModel: Model<OdooIntegration>,
  ) {
    super();
  }

  async findById(id: string): Promise<IntegrationConfig> {
    return toConfig(await this.getDocument(id));
  }

  async findAll(filter?: { active?: boolean }): Promise<IntegrationConfig[]> {
    const query =
      filter?.active === undefined ? {} : { active: filter.active };
    const docs = await this.integrationModel
      .find(query)
      .sort({ createdAt: -1 })
      .exec();
    return docs.map(toConfig);
  }

  async create(input: IntegrationInput): Promise<IntegrationConfig> {
    const integration = new this.integrationModel({
      ...input,
      enabled: { customer: true, product: true, order: true, invoice: true, ...input.enabled },
      intervals: { ...DEFAULT_INTERVALS, ...input.intervals },
    });
    const saved = await integration.save();

    this.logger.log(`Created Odoo integration ${saved.name} (${saved.url})`);
    return toConfig(saved);
  }

  async update(
    id: string,
    patch: Partial<IntegrationInput>,
  ): Promise<IntegrationConfig> {
    const { enabled, intervals, ...rest } = patch;
    const set: UpdateQuery<OdooIntegration> = { ...rest };

    // Dotted paths keep the sibling flags and watermarks intact.
    for (const entity of SYNC_ENTITIES) {
      if (enabled?.[entity] !== undefined) {
        set[`enabled.${entity}`] = enabled[entity];
      }
      if (intervals?.[entity] !== undefined) {
        set[`intervals.${entity}`] = intervals[entity];
      }
    }

    await this.getDocument(id);
    const updated = await this.integrationModel
      .findByIdAndUpdate(id, { $set: set }, { new: true, runValidators: true })
      .exec();
    if (!updated) {
      throw new IntegrationNotFoundError(id);
    }
    return toConfig(updated);
  }

  async remove(id: string): Promise<void> {
    await this.getDocument(id);
    await this.integrationModel.deleteOne({ _id: id }).exec();
  }

  async advanceWatermark(
    id: string,
    entity: SyncEntity,
    at: Date,
  ): Promise<Date | null> {
    const path = `watermarks.${entity}`;
    await this.integrationModel
      .updateOne(
        { _id: id, $or: [{ [path]: null }, { [path]: { $lt: at } }] },
        { $set: { [path]: at } },
      )
      .exec();

    const doc = await this.getDocument(id);
    return doc.watermarks?.[entity] ?? null;
  }

  private async getDocument(id: string): Promise<OdooIntegrationDocument> {
    if (!isValidObjectId(id)) {
      throw new IntegrationNotFoundError(id);
    }
    const doc = await this.integrationModel.findById(id).exec();
    if (!doc) {
      throw new IntegrationNotFoundError(id);
    }
    return doc;
  }
}

function toConfig(doc: OdooIntegrationDocument): IntegrationConfig {
  return {
    id: String(doc._id),
    name: doc.name,
    active: doc.active,
    connection: {
      url: doc.url,
      database: doc.database,
      username: doc.username,
      apiKey: doc.apiKey,
      companyId: doc.companyId,
      version: doc.version,
    },
    enabled: {
      customer: doc.enabled?.customer ?? true,
      product: doc.enabled?.product ?? true,
      order: doc.enabled?.order ?? true,
      invoice: doc.enabled?.invoice ?? true,
    },
    intervals: {
      customer: doc.intervals?.customer ?? DEFAULT_INTERVALS.customer,
      product: doc.intervals?.product ?? DEFAULT_INTERVALS.product,
      order: doc.intervals?.order ?? DEFAULT_INTERVALS.order,
      invoice: doc.intervals?.invoice ?? DEFAULT_INTERVALS.invoice,
    },
    watermarks: {
      customer: doc.watermarks?.customer ?? null,
      product: doc.watermarks?.product ?? null,
      order: doc.watermarks?.order ?? null,
      invoice: doc.watermarks?.invoice ?? null,
    },
  };
}
