export { loadConfig, ConfigError } from './config/index.js';
export type { AppConfig } from './config/index.js';
export { createRedisClient, RedisStreamSink, ensureStream } from './redis/index.js';
export { createDbClient, ensureWarehouseTable, PostgresWarehouseSink, analyticsEvents } from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { MixpanelClient } from './tracking/index.js';
export { MaxmindLocationResolver } from './geo/index.js';
export { LedgerBalanceProvider, SatsBalanceProvider, HttpCreatorStatusProvider } from './providers/index.js';
export { WootheeClassifier } from './useragent/index.js';
export { GoogleChatNotifier } from './notifications/index.js';
export { computeSignature, verifySignature } from './webhook/index.js';
export { createAppContext } from './context.js';
export type { AppContext } from './context.js';
