import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import { signAccessToken } from './lib/auth';
import { initStockService, shutdownStockService } from './services/stock.service';
import { InMemoryStockStore } from './storage/inMemoryStockStore';

let server: Server;
let baseUrl: string;
const store = new InMemoryStockStore();
const token = signAccessToken({ sub: 'user-7', role: 'storekeeper' });

async function call(method: string, path: string, body?: unknown, authorized = true) {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (authorized) headers.authorization = `Bearer ${token}`;
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const text = await res.text();
  const type = res.headers.get('content-type') ?? '';
  return { status: res.status, body: type.includes('json') ? JSON.parse(text) : null, text, type };
}

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  await initStockService({
    store,
    policy: { warningMultiplier: 1.5, defaultLookbackDays: 30, overdrawPolicy: 'clamp' }
  });
  server = createApp().listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await shutdownStockService();
  vi.restoreAllMocks();
});

describe('stock HTTP API', () => {
  it('requires a token to create items', async () => {
    const res = await call('POST', '/items', { name: 'Steel Sheets', sku: 'STL-001', unit: 'pc' }, false);
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Missing access token.' });
  });

  it('walks an item from creation through a withdrawal', async () => {
    const created = await call('POST', '/items', {
      name: 'Steel Sheets',
      sku: 'STL-001',
      unit: 'pc',
      min_quantity: 50,
      opening_quantity: 150,
      warehouse: 'WH-MAIN'
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ id: 1, currentQuantity: 150, status: 'NORMAL', warehouse: 'WH-MAIN' });

    const moved = await call('POST', '/items/1/movements', { movement_type: 'out', quantity: 120, notes: 'Line 2' });
    expect(moved.status).toBe(201);
    expect(moved.body.movement).toMatchObject({
      id: 2,
      kind: 'OUT',
      movementType: 'out',
      quantity: 120,
      actorId: 'user-7',
      notes: 'Line 2'
    });
    expect(moved.body.item).toMatchObject({ currentQuantity: 30, status: 'WARNING' });
    expect(moved.body.previousStatus).toBe('NORMAL');

    const status = await call('GET', '/items/1/status');
    expect(status.body).toEqual({ itemId: 1, status: 'WARNING', statusColor: 'yellow' });

    const history = await call('GET', '/items/1/movements');
    expect(history.body.data.map((movement: { movementType: string }) => movement.movementType)).toEqual([
      'adjustment',
      'out'
    ]);

    const alerts = await call('GET', '/stock-alerts?status=yellow');
    expect(alerts.body.data).toHaveLength(1);
    expect(alerts.body.data[0]).toMatchObject({ itemId: 1, status: 'WARNING', statusColor: 'yellow' });
  });

  it('maps ledger errors to status codes', async () => {
    const missing = await call('POST', '/stock-movements', { item_id: 99, movement_type: 'in', quantity: 5 });
    expect(missing.status).toBe(404);
    expect(missing.body.code).toBe('ITEM_NOT_FOUND');

    const invalid = await call('POST', '/items/1/movements', { movement_type: 'in', quantity: 0 });
    expect(invalid.status).toBe(400);
    expect(invalid.body.code).toBe('INVALID_QUANTITY');

    const duplicate = await call('POST', '/items', { name: 'Steel again', sku: 'STL-001', unit: 'pc' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.code).toBe('SKU_CONFLICT');
  });

  it.each([
    ['null', { movement_type: 'adjustment', quantity: null }],
    ['empty', { movement_type: 'adjustment', quantity: '' }],
    ['boolean', { movement_type: 'in', quantity: true }],
    ['missing', { movement_type: 'out' }]
  ])('rejects a %s quantity without touching the item', async (_label, body) => {
    const res = await call('POST', '/items/1/movements', body);
    expect(res.status).toBe(400);
    expect(res.body.error.fieldErrors.quantity).toHaveLength(1);

    const item = await call('GET', '/items/1');
    expect(item.body.currentQuantity).toBe(30);
  });

  it('rejects item fields the catalog does not accept', async () => {
    const res = await call('POST', '/items', { name: 'Copper Wire', sku: 'CU-001', unit: 'm', min_quantity: null });
    expect(res.status).toBe(400);
    expect(res.body.error.fieldErrors.min_quantity).toHaveLength(1);

    const items = await call('GET', '/items?search=CU-001');
    expect(items.body.data).toEqual([]);
  });

  it('validates request bodies', async () => {
    const res = await call('POST', '/items/1/movements', { movement_type: 'transfer', quantity: 1 });
    expect(res.status).toBe(400);
    expect(res.body.error.fieldErrors.movement_type).toHaveLength(1);
  });

  it('serves the stock level report as CSV', async () => {
    const res = await call('GET', '/reports/stock-levels?format=csv');
    expect(res.status).toBe(200);
    expect(res.type).toContain('text/csv');
    expect(res.text.split('\n')[1]).toBe('1,Steel Sheets,STL-001,30,50,pc,yellow,WH-MAIN,');
  });

  it('reports readiness from the store', async () => {
    const ready = await call('GET', '/health/ready');
    expect(ready.status).toBe(200);
    expect(ready.body).toMatchObject({
      status: 'ready',
      details: { store: { ok: true, kind: 'memory' }, eventClients: 0 }
    });

    await store.close();
    try {
      const notReady = await call('GET', '/health/ready');
      expect(notReady.status).toBe(503);
      expect(notReady.body).toMatchObject({
        status: 'not_ready',
        details: { store: { ok: false, error: 'STORAGE_UNAVAILABLE' } }
      });
    } finally {
      await store.open();
    }
  });

  it('echoes a caller-supplied request id and generates one otherwise', async () => {
    const echoed = await fetch(`${baseUrl}/health/live`, { headers: { 'x-request-id': ' req-42 ' } });
    expect(echoed.headers.get('x-request-id')).toBe('req-42');
    await echoed.text();

    const generated = await fetch(`${baseUrl}/health/live`);
    expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    await generated.text();
  });

  it('answers unknown routes with 404', async () => {
    const res = await call('GET', '/nowhere');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
