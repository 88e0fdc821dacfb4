import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { IntegrationStore } from './integration.store';
import { IntegrationsService } from './integrations.service';
import {
  OdooIntegration,
  OdooIntegrationSchema,
} from './schemas/odoo-integration.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: OdooIntegration.name, schema: OdooIntegrationSchema },
    ]),
  ],
  providers: [
    IntegrationsService,
    { provide: IntegrationStore, useExisting: IntegrationsService },
  ],
  exports: [IntegrationStore],
})
export class IntegrationsModule {}
