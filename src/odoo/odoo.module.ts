import { Module } from '@nestjs/common';
import { OdooClientFactory } from './odoo-client.factory';

@Module({
  providers: [OdooClientFactory],
  exports: [OdooClientFactory],
})
export class OdooModule {}
