import type { Logger } from 'pino';
import type { PipelineContext } from '../application/pipeline.js';
import type {
  AlertNotifier,
  BalanceProvider,
  EventSinks,
  FactProviders,
  LocationResolver,
} from '../domain/index.js';
import type { AppConfig } from './config/index.js';
import { createDbClient, ensureWarehouseTable, PostgresWarehouseSink } from './db/index.js';
import { MaxmindLocationResolver } from './geo/index.js';
import { GoogleChatNotifier } from './notifications/index.js';
import { HttpCreatorStatusProvider, LedgerBalanceProvider, SatsBalanceProvider } from './providers/index.js';
import { createRedisClient, RedisStreamSink } from './redis/index.js';
import { MixpanelClient } from './tracking/index.js';
import { WootheeClassifier } from './useragent/index.js';

/**
 * Everything a request handler needs, built once at startup.
 *
 * Immutable after construction and passed explicitly to the HTTP layer;
 * nothing here is reachable through module-level state.
 */
export interface AppContext extends PipelineContext {
  readonly config: AppConfig;
  readonly sinks: EventSinks;
  readonly providers: FactProviders;
  readonly notifier: AlertNotifier | null;
  /** Releases connections opened by {@link createAppContext}. */
  close(): Promise<void>;
}

function createBalanceProviders(config: AppConfig): BalanceProvider[] {
  const providers: BalanceProvider[] = [
    new LedgerBalanceProvider({ host: config.IC_HOST, ledgerCanisterId: config.BTC_LEDGER_CANISTER_ID }),
  ];
  if (config.SATS_BALANCE_URL) {
    providers.push(new SatsBalanceProvider(config.SATS_BALANCE_URL));
  }
  return providers;
}

async function openLocationResolver(config: AppConfig, log: Logger): Promise<LocationResolver | null> {
  if (!config.GEOIP_DB_PATH) {
    log.warn('GEOIP_DB_PATH not set, location lookups disabled');
    return null;
  }
  const resolver = await MaxmindLocationResolver.open(config.GEOIP_DB_PATH);
  log.info({ path: config.GEOIP_DB_PATH }, 'GeoIP database loaded');
  return resolver;
}

/**
 * Connects every sink and provider.
 *
 * Order:
 * 1) Redis, then the one-time stream-exists barrier
 * 2) Postgres, then the warehouse table bootstrap
 * 3) Fact providers and the chat notifier
 */
export async function createAppContext(config: AppConfig, log: Logger): Promise<AppContext> {
  const redis = await createRedisClient(config.REDIS_URL, log);
  const stream = await RedisStreamSink.create(redis, log, {
    streamKey: config.EVENT_STREAM_KEY,
    groupName: config.EVENT_STREAM_GROUP,
  });

  const { sql, db } = createDbClient(config.DATABASE_URL);
  await ensureWarehouseTable(sql);
  log.info('Warehouse table ready');

  const sinks: EventSinks = {
    tracking: new MixpanelClient({ token: config.MIXPANEL_PROJECT_TOKEN, host: config.MIXPANEL_API_HOST }, log),
    stream,
    warehouse: new PostgresWarehouseSink(db),
  };

  const providers: FactProviders = {
    location: await openLocationResolver(config, log),
    balances: createBalanceProviders(config),
    creatorStatus: config.CREATOR_STATUS_URL ? new HttpCreatorStatusProvider(config.CREATOR_STATUS_URL) : null,
    userAgent: new WootheeClassifier(),
  };

  const notifier = config.SENTRY_GOOGLE_CHAT_WEBHOOK_URL
    ? new GoogleChatNotifier(config.SENTRY_GOOGLE_CHAT_WEBHOOK_URL, log)
    : null;

  log.info(
    {
      balances: providers.balances.map((provider) => provider.name),
      creatorStatus: providers.creatorStatus !== null,
      location: providers.location !== null,
      notifier: notifier !== null,
    },
    'Application context ready',
  );

  return Object.freeze({
    config,
    log,
    sinks,
    providers,
    providerTimeoutMs: config.PROVIDER_TIMEOUT_MS,
    notifier,
    async close(): Promise<void> {
      try {
        await redis.quit();
        log.info('Redis disconnected');
      } finally {
        await sql.end();
        log.info('Database disconnected');
      }
    },
  });
}
