import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  getStatus() {
    return {
      status: 'running',
      service: 'Rental Odoo Sync',
      version: '1.0.0',
      endpoints: {
        integrations: '/odoo/integrations',
        testConnection: '/odoo/integrations/:id/test-connection',
        sync: '/odoo/integrations/:id/sync/:entity',
        syncAll: '/odoo/integrations/:id/sync-all',
        syncLogs: '/odoo/sync-logs',
      },
    };
  }

  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
  }
}
