export { createDbClient, ensureWarehouseTable } from './client.js';
export type { Database, SqlClient } from './client.js';
export { analyticsEvents } from './schema.js';
export { PostgresWarehouseSink } from './warehouse-sink.js';
