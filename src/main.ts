import 'dotenv/config';
import Fastify from 'fastify';
import { createInProcessInvalidationBus } from '@/cache/invalidation-bus.js';
import type { InvalidationBus } from '@/cache/invalidation-bus.js';
import { createRedisInvalidationBus } from '@/cache/redis-invalidation-bus.js';
import type { CostwardenConfig } from '@/config/types.js';
import { createLogger } from '@/observability/logger.js';
import { loadConfig } from '@/config/loader.js';
import { createDatabase } from '@/infrastructure/database.js';
import type { Database } from '@/infrastructure/database.js';
import { loadPriceCatalog } from '@/pricing/catalog.js';
import { createPgPriceStore } from '@/pricing/pg-price-store.js';
import { createInMemoryPriceStore } from '@/pricing/price-store.js';
import { createPricingResolver } from '@/pricing/pricing-resolver.js';
import type { PriceStore } from '@/pricing/types.js';
import { createBudgetLedger } from '@/budget/budget-ledger.js';
import { createAlertDispatcher } from '@/budget/alert-dispatcher.js';
import {
  createInMemoryAlertStore,
  createInMemoryBudgetLimitStore,
  createInMemorySpendStore,
} from '@/budget/memory-stores.js';
import { createPgAlertStore, createPgBudgetLimitStore, createPgSpendStore } from '@/budget/pg-stores.js';
import type { AlertStore, BudgetLimitStore, SpendStore } from '@/budget/types.js';
import { createCostRecorder } from '@/recording/cost-recorder.js';
import { createInMemoryCostRecordStore, createPgCostRecordStore } from '@/recording/cost-record-store.js';
import { createLoggingErrorReporter } from '@/recording/error-reporter.js';
import { createBullMQCostQueue } from '@/recording/bullmq-queue.js';
import { createInProcessCostQueue } from '@/recording/in-process-queue.js';
import type { CostEventQueue, CostRecordStore } from '@/recording/types.js';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import type { RouteDependencies } from '@/api/types.js';

const logger = createLogger();

interface Stores {
  priceStore: PriceStore;
  limitStore: BudgetLimitStore;
  spendStore: SpendStore;
  alertStore: AlertStore;
  recordStore: CostRecordStore;
}

/** PostgreSQL-backed stores when a database is connected, in-memory otherwise. */
function createStores(db: Database | undefined): Stores {
  if (db) {
    return {
      priceStore: createPgPriceStore(db.pool),
      limitStore: createPgBudgetLimitStore(db.pool),
      spendStore: createPgSpendStore(db.pool),
      alertStore: createPgAlertStore(db.pool),
      recordStore: createPgCostRecordStore(db.pool),
    };
  }
  return {
    priceStore: createInMemoryPriceStore(),
    limitStore: createInMemoryBudgetLimitStore(),
    spendStore: createInMemorySpendStore(),
    alertStore: createInMemoryAlertStore(),
    recordStore: createInMemoryCostRecordStore(),
  };
}

/** Redis pub/sub when the processes share a Redis, in-process otherwise. */
function createBus(config: CostwardenConfig): InvalidationBus {
  const transport = config.invalidation.transport ?? (config.redisUrl ? 'redis' : 'in-process');
  if (transport === 'redis' && config.redisUrl) {
    return createRedisInvalidationBus({
      redisUrl: config.redisUrl,
      channel: config.invalidation.channel,
      logger,
    });
  }
  return createInProcessInvalidationBus();
}

const server = Fastify({
  logger: false,
});

async function start(): Promise<void> {
  let db: Database | undefined;
  let queue: CostEventQueue | undefined;
  let bus: InvalidationBus | undefined;

  try {
    const configResult = await loadConfig(process.env['COSTWARDEN_CONFIG']);
    if (!configResult.ok) {
      throw configResult.error;
    }
    const config = configResult.value;

    if (config.databaseUrl) {
      db = createDatabase({ url: config.databaseUrl, logger });
      await db.connect();
      await db.migrate();
    } else {
      logger.warn('DATABASE_URL not set, using in-memory stores', { component: 'main' });
    }
    const stores = createStores(db);
    const { priceStore } = stores;

    bus = createBus(config);
    await bus.start();

    const catalog = await loadPriceCatalog(config.pricing.catalogPath, logger);
    const resolver = createPricingResolver({
      catalog,
      universalFallback: config.pricing.universalFallback,
      store: priceStore,
      logger,
      cacheTtlMs: config.pricing.cacheTtlMs,
      staleTtlMs: config.pricing.staleTtlMs,
      storeTimeoutMs: config.pricing.storeTimeoutMs,
      bus,
    });

    const ledger = createBudgetLedger({
      limitStore: stores.limitStore,
      spendStore: stores.spendStore,
      logger,
      limitCacheTtlMs: config.budget.limitCacheTtlMs,
      spendCacheTtlMs: config.budget.spendCacheTtlMs,
      storeTimeoutMs: config.budget.storeTimeoutMs,
      bus,
    });

    const recorder = createCostRecorder({
      resolver,
      ledger,
      alertDispatcher: createAlertDispatcher({ alertStore: stores.alertStore, logger }),
      recordStore: stores.recordStore,
      errorReporter: createLoggingErrorReporter(logger),
      logger,
      retry: {
        maxAttempts: config.recording.maxAttempts,
        baseDelayMs: config.recording.baseDelayMs,
        maxDelayMs: config.recording.maxDelayMs,
      },
    });

    recorder.on('alertThresholdCrossed', (event) => {
      logger.warn('Budget alert threshold crossed', {
        component: 'main',
        scopeType: event.scope.scopeType,
        scopeId: event.scope.scopeId,
        periodType: event.periodType,
        thresholdPercentage: event.thresholdPercentage,
        severity: event.severity,
      });
    });

    // Cost event consumer: a BullMQ worker serves producers in other processes
    queue =
      config.recording.queue === 'bullmq' && config.redisUrl
        ? createBullMQCostQueue({
            consumer: recorder,
            logger,
            redisUrl: config.redisUrl,
            concurrency: config.recording.concurrency,
            attempts: config.recording.maxAttempts,
          })
        : createInProcessCostQueue({
            consumer: recorder,
            logger,
            concurrency: config.recording.concurrency,
          });
    await queue.start();
    logger.info('Cost event queue started', { component: 'main', queue: config.recording.queue });

    registerErrorHandler(server);

    const pool = db?.pool;
    const deps: RouteDependencies = {
      ledger,
      resolver,
      alertStore: stores.alertStore,
      priceStore,
      defaultAlertThresholds: config.budget.defaultAlertThresholds,
      ...(pool && {
        healthCheck: async (): Promise<void> => {
          await pool.query('SELECT 1');
        },
      }),
      logger,
    };

    await server.register(
      async (prefixed) => {
        await prefixed.register(registerRoutes, deps);
      },
      { prefix: '/api/v1' },
    );

    // Graceful shutdown
    const activeQueue = queue;
    const activeBus = bus;
    const activeDb = db;
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await activeQueue.drain();
      await activeQueue.stop();
      resolver.close();
      ledger.close();
      await activeBus.close();
      if (activeDb) {
        await activeDb.disconnect();
      }
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    const { host, port } = config.server;
    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    await queue?.stop();
    await bus?.close();
    await db?.disconnect();
    process.exit(1);
  }
}

void start();
