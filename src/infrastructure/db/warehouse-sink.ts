import type { WarehouseRow, WarehouseSink } from '../../domain/index.js';
import { SinkError } from '../../domain/index.js';
import type { Database } from './client.js';
import { analyticsEvents } from './schema.js';

/**
 * Writes one row per event into `analytics_events`.
 *
 * No conflict handling: the table has no natural key, so a repeated
 * delivery produces a second row.
 */
export class PostgresWarehouseSink implements WarehouseSink {
  constructor(private readonly db: Database) {}

  async insert(row: WarehouseRow): Promise<void> {
    try {
      await this.db.insert(analyticsEvents).values({
        event: row.event,
        params: row.params,
        timestamp: new Date(row.timestamp),
      });
    } catch (err: unknown) {
      throw new SinkError('warehouse', 'Warehouse insert failed', { cause: err });
    }
  }
}
