export interface AppConfig {
  port: number;
  mongodbUri: string;
  redis: {
    host: string;
    port: number;
  };
  odoo: {
    rpcTimeoutMs: number;
  };
  sync: {
    importPageSize: number;
    jobAttempts: number;
    jobBackoffMs: number;
    schedulerEnabled: boolean;
  };
}

function toInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default (): AppConfig => ({
  port: toInt(process.env.PORT, 3000),
  mongodbUri:
    process.env.MONGODB_URI || 'mongodb://localhost:27017/rental-backoffice',
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: toInt(process.env.REDIS_PORT, 6379),
  },
  odoo: {
    rpcTimeoutMs: toInt(process.env.ODOO_RPC_TIMEOUT_MS, 15000),
  },
  sync: {
    importPageSize: toInt(process.env.SYNC_IMPORT_PAGE_SIZE, 200),
    jobAttempts: toInt(process.env.SYNC_JOB_ATTEMPTS, 3),
    jobBackoffMs: toInt(process.env.SYNC_JOB_BACKOFF_MS, 60000),
    schedulerEnabled: process.env.SYNC_SCHEDULER_ENABLED !== 'false',
  },
});
