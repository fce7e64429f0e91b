import { Command } from 'commander';
import { MOVEMENT_TYPES, KIND_BY_MOVEMENT_TYPE, UNIT_TYPES, type MovementType } from '../../domains/stock/types';
import { colorStatus, field, heading, json, success, table } from '../format';
import { parseIntegerArg, parseNumberArg, withStockService } from '../session';

function parseMovementType(value: string): MovementType {
  const normalized = value.trim().toLowerCase();
  for (const type of MOVEMENT_TYPES) {
    if (type === normalized) return type;
  }
  throw new Error(`movement type must be one of ${MOVEMENT_TYPES.join(', ')}`);
}

export function registerStockCommands(program: Command): void {
  program
    .command('items')
    .description('List items with their current quantity and stock status')
    .option('--supplier <ref>', 'Only items from this supplier')
    .option('--warehouse <ref>', 'Only items stored in this warehouse')
    .option('-s, --search <text>', 'Match name or SKU')
    .option('--json', 'Print raw JSON')
    .action(async (opts: { supplier?: string; warehouse?: string; search?: string; json?: boolean }) => {
      await withStockService(async (service) => {
        const items = await service.listItems({
          supplierRef: opts.supplier,
          warehouseRef: opts.warehouse,
          search: opts.search
        });
        if (opts.json) {
          json(items);
          return;
        }
        heading(`Items (${items.length})`);
        table(
          items.map((item) => ({
            ID: item.id,
            SKU: item.sku,
            Name: item.name,
            Qty: item.currentQuantity,
            Min: item.minQuantity,
            Unit: item.unit,
            Status: colorStatus(item.status)
          }))
        );
        console.log();
      });
    });

  program
    .command('add-item <name> <sku> <unit>')
    .description(`Create an item (unit: ${UNIT_TYPES.join(', ')})`)
    .option('--min <qty>', 'Minimum quantity', '0')
    .option('--opening <qty>', 'Opening quantity, recorded as an ADJUST movement')
    .option('--category <category>', 'Material category', 'raw_material')
    .option('--supplier <ref>', 'Supplier reference')
    .option('--warehouse <ref>', 'Warehouse reference')
    .option('--actor <id>', 'Actor recorded on the opening movement')
    .action(
      async (
        name: string,
        sku: string,
        unit: string,
        opts: {
          min: string;
          opening?: string;
          category: string;
          supplier?: string;
          warehouse?: string;
          actor?: string;
        }
      ) => {
        await withStockService(async (service) => {
          const item = await service.createItem(
            {
              name,
              sku,
              unit,
              category: opts.category,
              minQuantity: parseNumberArg(opts.min, 'min'),
              supplierRef: opts.supplier ?? null,
              warehouseRef: opts.warehouse ?? null,
              openingQuantity: opts.opening === undefined ? undefined : parseNumberArg(opts.opening, 'opening')
            },
            opts.actor ?? null
          );
          success(`Created item ${item.id} (${item.sku}) at ${item.currentQuantity} ${item.unit}`);
        });
      }
    );

  program
    .command('status <itemId>')
    .description('Show one item and its stock status')
    .action(async (itemIdArg: string) => {
      await withStockService(async (service) => {
        const item = service.toItemView(await service.getItem(parseIntegerArg(itemIdArg, 'itemId')));
        heading(`${item.name} (${item.sku})`);
        field('Quantity', `${item.currentQuantity} ${item.unit}`);
        field('Minimum', item.minQuantity);
        field('Status', colorStatus(item.status));
        field('Supplier', item.supplierRef);
        field('Warehouse', item.warehouseRef);
        console.log();
      });
    });

  program
    .command('history <itemId>')
    .description('Show the movement history of an item, oldest first')
    .option('--since <date>', 'Only movements at or after this ISO date')
    .action(async (itemIdArg: string, opts: { since?: string }) => {
      await withStockService(async (service) => {
        const itemId = parseIntegerArg(itemIdArg, 'itemId');
        const since = opts.since === undefined ? undefined : new Date(opts.since);
        if (since && Number.isNaN(since.getTime())) {
          throw new Error('since must be an ISO date');
        }
        const movements = await service.history(itemId, since);
        heading(`Movements for item ${itemId} (${movements.length})`);
        table(
          movements.map((movement) => ({
            ID: movement.id,
            When: movement.timestamp.toISOString(),
            Kind: movement.kind,
            Qty: movement.quantity,
            Actor: movement.actorId,
            Notes: movement.note
          }))
        );
        console.log();
      });
    });

  program
    .command('move <itemId> <type> <quantity>')
    .description(`Record a movement (type: ${MOVEMENT_TYPES.join(', ')})`)
    .option('-n, --notes <text>', 'Free-text note')
    .option('--actor <id>', 'Who recorded the movement')
    .action(async (itemIdArg: string, typeArg: string, quantityArg: string, opts: { notes?: string; actor?: string }) => {
      await withStockService(async (service) => {
        const applied = await service.applyMovement({
          itemId: parseIntegerArg(itemIdArg, 'itemId'),
          kind: KIND_BY_MOVEMENT_TYPE[parseMovementType(typeArg)],
          quantity: parseNumberArg(quantityArg, 'quantity'),
          actorId: opts.actor ?? null,
          note: opts.notes ?? null
        });
        success(
          `Movement ${applied.movement.id}: ${applied.previousQuantity} → ${applied.item.currentQuantity} ${applied.item.unit}`
        );
        if (applied.statusChanged) {
          field('Status', `${colorStatus(applied.previousStatus)} → ${colorStatus(applied.item.status)}`);
        }
      });
    });
}
