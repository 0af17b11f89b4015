import { describe, it, expect, vi, beforeEach } from 'vitest';

const { redis, sql } = vi.hoisted(() => ({
  redis: { quit: vi.fn() },
  sql: { end: vi.fn() },
}));

vi.mock('../../src/infrastructure/redis/index.js', () => ({
  createRedisClient: vi.fn().mockResolvedValue(redis),
  RedisStreamSink: { create: vi.fn().mockResolvedValue({ publish: vi.fn() }) },
}));

vi.mock('../../src/infrastructure/db/index.js', () => ({
  createDbClient: vi.fn().mockReturnValue({ sql, db: {} }),
  ensureWarehouseTable: vi.fn().mockResolvedValue(undefined),
  PostgresWarehouseSink: vi.fn(),
}));

vi.mock('@dfinity/agent', () => ({
  HttpAgent: { createSync: vi.fn().mockReturnValue({}) },
  Actor: { createActor: vi.fn().mockReturnValue({}) },
}));

import { createAppContext } from '../../src/infrastructure/context.js';
import { loadConfig } from '../../src/infrastructure/config/index.js';
import { fakeLogger } from '../helpers.js';

const config = loadConfig({ SERVER_ACCESS_TOKEN: 'test-secret', MIXPANEL_PROJECT_TOKEN: 'test-token' });

beforeEach(() => {
  redis.quit.mockReset().mockResolvedValue('OK');
  sql.end.mockReset().mockResolvedValue(undefined);
});

describe('createAppContext', () => {
  it('builds a frozen context without optional providers', async () => {
    const context = await createAppContext(config, fakeLogger());

    expect(Object.isFrozen(context)).toBe(true);
    expect(context.providerTimeoutMs).toBe(3000);
    expect(context.providers.location).toBeNull();
    expect(context.providers.creatorStatus).toBeNull();
    expect(context.providers.balances.map((provider) => provider.name)).toEqual(['btc']);
    expect(context.notifier).toBeNull();
  });

  it('closes Redis and then Postgres', async () => {
    const context = await createAppContext(config, fakeLogger());
    await context.close();

    expect(redis.quit).toHaveBeenCalledTimes(1);
    expect(sql.end).toHaveBeenCalledTimes(1);
  });

  it('still closes Postgres when the Redis quit fails', async () => {
    redis.quit.mockRejectedValue(new Error('connection reset'));
    const context = await createAppContext(config, fakeLogger());

    await expect(context.close()).rejects.toThrow('connection reset');
    expect(sql.end).toHaveBeenCalledTimes(1);
  });
});
