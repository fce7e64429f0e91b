import type { MigrationBuilder } from 'node-pg-migrate';

const MOVEMENT_TYPES = "('in','out','adjustment')";

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_movements', {
    id: { type: 'bigserial', primaryKey: true },
    item_id: { type: 'integer', notNull: true, references: 'stock_items', onDelete: 'RESTRICT' },
    movement_type: { type: 'text', notNull: true },
    quantity: { type: 'numeric(18,6)', notNull: true },
    actor_id: { type: 'text' },
    notes: { type: 'text' },
    occurred_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_movements', 'chk_stock_movements_type', `CHECK (movement_type IN ${MOVEMENT_TYPES})`);
  pgm.addConstraint(
    'stock_movements',
    'chk_stock_movements_quantity',
    "CHECK ((movement_type = 'adjustment' AND quantity >= 0) OR (movement_type <> 'adjustment' AND quantity > 0))"
  );
  pgm.createIndex('stock_movements', ['item_id', 'occurred_at'], { name: 'idx_stock_movements_item_occurred' });

  pgm.sql(`
    CREATE FUNCTION stock_movements_append_only() RETURNS trigger AS $$
    BEGIN
      RAISE EXCEPTION 'stock_movements is append-only';
    END;
    $$ LANGUAGE plpgsql;
  `);
  pgm.sql(`
    CREATE TRIGGER trg_stock_movements_append_only
      BEFORE UPDATE OR DELETE ON stock_movements
      FOR EACH ROW EXECUTE FUNCTION stock_movements_append_only();
  `);
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.sql('DROP TRIGGER IF EXISTS trg_stock_movements_append_only ON stock_movements');
  pgm.dropTable('stock_movements');
  pgm.sql('DROP FUNCTION IF EXISTS stock_movements_append_only()');
}
