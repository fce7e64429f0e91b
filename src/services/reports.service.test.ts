import { describe, expect, it } from 'vitest';
import { InMemoryStockStore } from '../storage/inMemoryStockStore';
import { buildStockLevelReport, formatStockLevelCsv } from './reports.service';
import { StockService } from './stock.service';

describe('stock level report', () => {
  it('renders one CSV line per item with the status color', async () => {
    const service = new StockService(new InMemoryStockStore(), {
      warningMultiplier: 1.5,
      defaultLookbackDays: 30,
      overdrawPolicy: 'clamp'
    });
    await service.createItem({
      name: 'Steel Sheets',
      sku: 'STL-001',
      category: 'raw_material',
      unit: 'pc',
      minQuantity: 50,
      supplierRef: 'SUP-STEEL',
      warehouseRef: 'WH-MAIN',
      openingQuantity: 150
    });
    await service.createItem({
      name: 'Pellets, blue',
      sku: 'PLA-002',
      category: 'raw_material',
      unit: 'kg',
      minQuantity: 200,
      supplierRef: null,
      warehouseRef: null,
      openingQuantity: 100
    });

    const rows = await buildStockLevelReport(service);
    expect(rows.map((row) => row.status)).toEqual(['green', 'yellow']);
    expect(formatStockLevelCsv(rows)).toBe(
      [
        'id,name,sku,current_quantity,min_quantity,unit,status,warehouse,supplier',
        '1,Steel Sheets,STL-001,150,50,pc,green,WH-MAIN,SUP-STEEL',
        '2,"Pellets, blue",PLA-002,100,200,kg,yellow,,',
        ''
      ].join('\n')
    );
  });
});
