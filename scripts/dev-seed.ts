import 'dotenv/config'
import { isStockError } from '../src/domains/stock/errors'
import { initStockService, shutdownStockService, type CreateItemInput } from '../src/services/stock.service'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const SEED_ACTOR = 'dev-seed'

const SEED_ITEMS: CreateItemInput[] = [
  {
    name: 'Steel Sheets',
    sku: 'STL-001',
    category: 'raw_material',
    unit: 'pc',
    minQuantity: 50,
    supplierRef: 'SUP-STEEL',
    warehouseRef: 'WH-MAIN',
    openingQuantity: 150
  },
  {
    name: 'Plastic Pellets',
    sku: 'PLA-001',
    category: 'raw_material',
    unit: 'kg',
    minQuantity: 200,
    supplierRef: 'SUP-POLY',
    warehouseRef: 'WH-MAIN',
    openingQuantity: 500
  },
  {
    name: 'Cardboard Boxes',
    sku: 'PKG-010',
    category: 'packaging',
    unit: 'pc',
    minQuantity: 100,
    supplierRef: 'SUP-PACK',
    warehouseRef: 'WH-EAST',
    openingQuantity: 120
  }
]

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'warn':
    case 'error':
      return value
    default:
      return 'info'
  }
}

function makeLogger(level: LogLevel) {
  const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }
  const log =
    (l: LogLevel) =>
    (msg: string, extra?: unknown) => {
      if (order[l] < order[level]) return
      const line = `[dev-seed] ${l.toUpperCase()} ${msg}`
      if (extra === undefined) {
        console.log(line)
      } else {
        console.log(line, extra)
      }
    }
  return { debug: log('debug'), info: log('info'), warn: log('warn'), error: log('error') }
}

async function main() {
  const logger = makeLogger(parseLogLevel(process.env.LOG_LEVEL))
  const service = await initStockService()
  logger.info(`store=${service.store.kind}`)

  try {
    for (const input of SEED_ITEMS) {
      try {
        const item = await service.createItem(input, SEED_ACTOR)
        logger.info(`created ${item.sku} id=${item.id} qty=${item.currentQuantity} status=${item.status}`)
      } catch (err) {
        if (!isStockError(err, 'SKU_CONFLICT')) throw err
        logger.warn(`skipped ${input.sku}: already exists`)
      }
    }
  } finally {
    await shutdownStockService()
  }
}

main().catch((err: unknown) => {
  console.error('[dev-seed] ERROR', err)
  process.exitCode = 1
})
