import type { IntegrationConfig } from '../integrations/integration.types';
import type { OdooClient } from '../odoo/odoo-client';
import type { DependencyResolver } from './dependency-resolver';

/** Everything one sync invocation needs; synchronizers keep no per-integration state. */
export interface SyncContext {
  integration: IntegrationConfig;
  client: OdooClient;
  resolver: DependencyResolver;
}
