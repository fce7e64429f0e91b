import type { StorageConfig } from '../config/storage';
import type { StockStore } from '../domains/stock/store';
import { InMemoryStockStore } from './inMemoryStockStore';
import { JsonFileStockStore } from './jsonFileStockStore';
import { PostgresStockStore } from './postgresStockStore';

export function createStockStore(config: StorageConfig): StockStore {
  switch (config.kind) {
    case 'postgres':
      return new PostgresStockStore();
    case 'file':
      return new JsonFileStockStore(config.filePath);
    case 'memory':
      return new InMemoryStockStore();
  }
}

export { InMemoryStockStore, JsonFileStockStore, PostgresStockStore };
