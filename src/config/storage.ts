import type { StockStorageKind } from '../domains/stock/store';

export type StorageConfig = {
  kind: StockStorageKind;
  filePath: string;
  databaseUrl: string | null;
};

const DEFAULT_DB_FILE = 'stock_monitor_db.json';

function parseStorageKind(value: string | undefined): StockStorageKind {
  switch (value?.trim().toLowerCase()) {
    case 'postgres':
    case 'postgresql':
      return 'postgres';
    case 'memory':
      return 'memory';
    default:
      return 'file';
  }
}

export function getStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    kind: parseStorageKind(env.STOCK_STORAGE),
    filePath: env.STOCK_DB_FILE?.trim() || DEFAULT_DB_FILE,
    databaseUrl: env.DATABASE_URL?.trim() || null
  };
}
