import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/infrastructure/config/index.js';

const REQUIRED = {
  SERVER_ACCESS_TOKEN: 'test-secret',
  MIXPANEL_PROJECT_TOKEN: 'test-token',
};

describe('loadConfig', () => {
  it('applies defaults around the required keys', () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config).toMatchObject({
      HOST: '0.0.0.0',
      PORT: 3000,
      LOG_LEVEL: 'info',
      MIXPANEL_API_HOST: 'api.mixpanel.com',
      REDIS_URL: 'redis://localhost:6379',
      EVENT_STREAM_KEY: 'analytics_events',
      EVENT_STREAM_GROUP: 'analytics_consumers',
      IC_HOST: 'https://ic0.app',
      BTC_LEDGER_CANISTER_ID: 'mxzaz-hqaaa-aaaar-qaada-cai',
      PROVIDER_TIMEOUT_MS: 3000,
    });
    expect(config.GEOIP_DB_PATH).toBeUndefined();
    expect(config.SENTRY_CLIENT_SECRET).toBeUndefined();
  });

  it('coerces numeric values', () => {
    const config = loadConfig({ ...REQUIRED, PORT: '8080', PROVIDER_TIMEOUT_MS: '250' });
    expect(config.PORT).toBe(8080);
    expect(config.PROVIDER_TIMEOUT_MS).toBe(250);
  });

  it('treats empty optional values as unset', () => {
    const config = loadConfig({ ...REQUIRED, SATS_BALANCE_URL: '', SENTRY_CLIENT_SECRET: '  ' });
    expect(config.SATS_BALANCE_URL).toBeUndefined();
    expect(config.SENTRY_CLIENT_SECRET).toBeUndefined();
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({ ...REQUIRED }))).toBe(true);
  });

  it('lists every offending key', () => {
    try {
      loadConfig({ PORT: 'abc', CREATOR_STATUS_URL: 'not a url' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const keys = (err as ConfigError).issues.map((issue) => issue.split(':')[0]);
      expect(keys).toEqual(
        expect.arrayContaining(['PORT', 'SERVER_ACCESS_TOKEN', 'MIXPANEL_PROJECT_TOKEN', 'CREATOR_STATUS_URL']),
      );
      expect((err as ConfigError).message.startsWith('Invalid configuration: ')).toBe(true);
    }
  });
});
