import { BullModule } from '@nestjs/bull';
import { Module } from '@nestjs/common';
import { IntegrationsModule } from '../integrations/integrations.module';
import { MappingsModule } from '../mappings/mappings.module';
import { OdooModule } from '../odoo/odoo.module';
import { RentalModule } from '../rental/rental.module';
import { SyncLogsModule } from '../sync-logs/sync-logs.module';
import { SYNC_QUEUE } from './sync.constants';
import { SyncController } from './sync.controller';
import { SyncProcessor } from './sync.processor';
import { SyncScheduler } from './sync.scheduler';
import { OdooSyncService } from './sync.service';
import { CustomerSynchronizer } from './synchronizers/customer.synchronizer';
import { InvoiceSynchronizer } from './synchronizers/invoice.synchronizer';
import { OrderSynchronizer } from './synchronizers/order.synchronizer';
import { ProductSynchronizer } from './synchronizers/product.synchronizer';

@Module({
  imports: [
    BullModule.registerQueue({
      name: SYNC_QUEUE,
    }),
    IntegrationsModule,
    MappingsModule,
    OdooModule,
    RentalModule,
    SyncLogsModule,
  ],
  controllers: [SyncController],
  providers: [
    CustomerSynchronizer,
    ProductSynchronizer,
    OrderSynchronizer,
    InvoiceSynchronizer,
    OdooSyncService,
    SyncProcessor,
    SyncScheduler,
  ],
  exports: [OdooSyncService],
})
export class SyncModule {}
