/** Entity kinds in dependency order: customers and products before orders, orders before invoices. */
export const SYNC_ENTITIES = ['customer', 'product', 'order', 'invoice'] as const;
export type SyncEntity = (typeof SYNC_ENTITIES)[number];

export const SYNC_DIRECTIONS = ['import', 'export'] as const;
export type SyncDirection = (typeof SYNC_DIRECTIONS)[number];

export type PerEntity<T> = Record<SyncEntity, T>;

export interface OdooConnection {
  url: string;
  database: string;
  username: string;
  apiKey: string;
  companyId: number;
  version: string;
}

export interface IntegrationConfig {
  id: string;
  name: string;
  active: boolean;
  connection: OdooConnection;
  enabled: PerEntity<boolean>;
  /** Minutes between scheduled runs. */
  intervals: PerEntity<number>;
  /** Last successful sync start per entity; null means the next run is a full sync. */
  watermarks: PerEntity<Date | null>;
}

export const DEFAULT_INTERVALS: PerEntity<number> = {
  customer: 60,
  product: 60,
  order: 30,
  invoice: 30,
};

export function isSyncEntity(value: string): value is SyncEntity {
  return SYNC_ENTITIES.some((entity) => entity === value);
}

/** "16.0" -> 16, "saas~17.2" -> 17. Unparseable versions count as the current default. */
export function odooMajorVersion(version: string): number {
  const match = /(\d+)/.exec(version);
  return match ? parseInt(match[1], 10) : 16;
}
