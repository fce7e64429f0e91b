import type { MigrationBuilder } from 'node-pg-migrate';

const MATERIAL_CATEGORIES = "('raw_material','packaging','chemical','component','other')";

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_items', {
    id: { type: 'serial', primaryKey: true },
    name: { type: 'text', notNull: true },
    sku: { type: 'text', notNull: true },
    category: { type: 'text', notNull: true, default: 'raw_material' },
    unit: { type: 'text', notNull: true },
    current_quantity: { type: 'numeric(18,6)', notNull: true, default: 0 },
    min_quantity: { type: 'numeric(18,6)', notNull: true, default: 0 },
    supplier_ref: { type: 'text' },
    warehouse_ref: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_items', 'uq_stock_items_sku', 'UNIQUE (sku)');
  pgm.addConstraint('stock_items', 'chk_stock_items_category', `CHECK (category IN ${MATERIAL_CATEGORIES})`);
  pgm.addConstraint('stock_items', 'chk_stock_items_current_quantity', 'CHECK (current_quantity >= 0)');
  pgm.addConstraint('stock_items', 'chk_stock_items_min_quantity', 'CHECK (min_quantity >= 0)');
  pgm.createIndex('stock_items', ['supplier_ref'], { name: 'idx_stock_items_supplier' });
  pgm.createIndex('stock_items', ['warehouse_ref'], { name: 'idx_stock_items_warehouse' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_items');
}
