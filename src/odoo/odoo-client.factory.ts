import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { IntegrationConfig } from '../integrations/integration.types';
import { JsonRpcTransport } from './json-rpc.transport';
import { OdooClient } from './odoo-client';

@Injectable()
export class OdooClientFactory {
  constructor(private configService: ConfigService) {}

  connect(integration: IntegrationConfig): Promise<OdooClient> {
    const timeout = this.configService.get<number>('odoo.rpcTimeoutMs', 15000);
    return OdooClient.connect(
      integration.connection,
      JsonRpcTransport.create(integration.connection.url, timeout),
    );
  }
}
