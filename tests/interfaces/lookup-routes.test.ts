import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { PipelineError } from '../../src/domain/index.js';
import { CANISTER_ID, PRINCIPAL, fakeBalance, fakeCreatorStatus, fakeLocation } from '../helpers.js';
import { AUTH, buildTestApp } from './http-helpers.js';

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function start(options: Parameters<typeof buildTestApp>[0] = {}) {
  const built = await buildTestApp(options);
  app = built.app;
  return built.app;
}

// ─── IP routes ───────────────────────────────────────────────

describe('GET /api/ip/:ip', () => {
  it('requires the bearer token', async () => {
    const res = await (await start()).inject({ method: 'GET', url: '/api/ip/203.0.113.7' });
    expect(res.statusCode).toBe(401);
  });

  it('answers country, region and city', async () => {
    const location = fakeLocation({ country: 'Japan', region: 'Tokyo', city: 'Shibuya', timezone: 'Asia/Tokyo' });
    const res = await (await start({ providers: { location } })).inject({
      method: 'GET',
      url: '/api/ip/203.0.113.7',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ country: 'Japan', region: 'Tokyo', city: 'Shibuya' });
    expect(location.lookup).toHaveBeenCalledWith('203.0.113.7');
  });

  it('answers 404 when the address is unknown', async () => {
    const res = await (await start({ providers: { location: fakeLocation(null) } })).inject({
      method: 'GET',
      url: '/api/ip/10.0.0.1',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'IpConfigError', message: 'No location found for 10.0.0.1' });
  });

  it('answers 400 for a malformed address', async () => {
    const location = fakeLocation();
    location.lookup.mockRejectedValue(new PipelineError('IpConfigError', 'Invalid IP: nope'));
    const res = await (await start({ providers: { location } })).inject({
      method: 'GET',
      url: '/api/ip/nope',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'IpConfigError', message: 'Invalid IP: nope' });
  });

  it('answers 400 when no resolver is configured', async () => {
    const res = await (await start({ providers: { location: null } })).inject({
      method: 'GET',
      url: '/api/ip/203.0.113.7',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'IpConfigError', message: 'Location resolver is not configured' });
  });
});

describe('GET /api/ip_v2/:ip', () => {
  it('includes the timezone', async () => {
    const location = fakeLocation({ country: 'Japan', region: 'Tokyo', city: 'Shibuya', timezone: 'Asia/Tokyo' });
    const res = await (await start({ providers: { location } })).inject({
      method: 'GET',
      url: '/api/ip_v2/203.0.113.7',
      headers: AUTH,
    });

    expect(res.json()).toEqual({ country: 'Japan', region: 'Tokyo', city: 'Shibuya', timezone: 'Asia/Tokyo' });
  });

  it('answers a null timezone when unknown', async () => {
    const res = await (await start()).inject({ method: 'GET', url: '/api/ip_v2/203.0.113.7', headers: AUTH });

    expect(res.json()).toEqual({ country: 'Germany', region: 'Berlin', city: 'Berlin', timezone: null });
  });
});

describe('GET /api/my_ip', () => {
  it('answers the forwarded client address as a JSON string', async () => {
    const res = await (await start()).inject({
      method: 'GET',
      url: '/api/my_ip',
      headers: { 'x-forwarded-for': '203.0.113.7' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('"203.0.113.7"');
    expect(res.headers['content-type']).toMatch(/^application\/json/);
  });
});

describe('GET /api/my_timezone', () => {
  it('answers the caller timezone', async () => {
    const location = fakeLocation({ country: 'Germany', region: 'Berlin', city: 'Berlin', timezone: 'Europe/Berlin' });
    const res = await (await start({ providers: { location } })).inject({
      method: 'GET',
      url: '/api/my_timezone',
      headers: { 'x-forwarded-for': '203.0.113.7' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('"Europe/Berlin"');
  });

  it('answers 404 when the timezone is unknown', async () => {
    const res = await (await start()).inject({ method: 'GET', url: '/api/my_timezone' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'IpConfigError', message: 'No timezone found for 127.0.0.1' });
  });
});

// ─── Fact lookups ────────────────────────────────────────────

describe('GET /api/btc_balance/:principal', () => {
  it('converts e8s to BTC', async () => {
    const btc = fakeBalance('btc', 'btc_balance_e8s', 150_000);
    const res = await (await start({ providers: { balances: [btc] } })).inject({
      method: 'GET',
      url: `/api/btc_balance/${PRINCIPAL}`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ balance: 0.0015 });
    expect(btc.lookup).toHaveBeenCalledWith(PRINCIPAL, expect.any(AbortSignal));
  });

  it('answers 400 for an invalid principal', async () => {
    const res = await (await start()).inject({
      method: 'GET',
      url: '/api/btc_balance/bad!principal',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'InvalidIdentity' });
  });

  it('answers 502 when the ledger fails', async () => {
    const btc = fakeBalance('btc', 'btc_balance_e8s');
    btc.lookup.mockRejectedValue(new Error('replica unavailable'));
    const res = await (await start({ providers: { balances: [btc] } })).inject({
      method: 'GET',
      url: `/api/btc_balance/${PRINCIPAL}`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      error: 'ProviderError',
      message: 'btc balance lookup failed: replica unavailable',
    });
  });
});

describe('GET /api/sats_balance/:principal', () => {
  it('answers 404 when the provider is not configured', async () => {
    const res = await (await start()).inject({
      method: 'GET',
      url: `/api/sats_balance/${PRINCIPAL}`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(404);
  });

  it('answers the balance', async () => {
    const sats = fakeBalance('sats', 'sats_balance', 77);
    const res = await (await start({ providers: { balances: [sats] } })).inject({
      method: 'GET',
      url: `/api/sats_balance/${PRINCIPAL}`,
      headers: AUTH,
    });

    expect(res.json()).toEqual({ balance: 77 });
  });
});

describe('GET /api/is_canister_creator/:principal/:canister_id', () => {
  it('answers a JSON boolean', async () => {
    const creator = fakeCreatorStatus(false);
    const res = await (await start({ providers: { creatorStatus: creator } })).inject({
      method: 'GET',
      url: `/api/is_canister_creator/${PRINCIPAL}/${CANISTER_ID}`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toBe(false);
    expect(creator.lookup).toHaveBeenCalledWith(PRINCIPAL, CANISTER_ID, expect.any(AbortSignal));
  });

  it('answers 400 for an invalid canister id', async () => {
    const res = await (await start({ providers: { creatorStatus: fakeCreatorStatus() } })).inject({
      method: 'GET',
      url: `/api/is_canister_creator/${PRINCIPAL}/bad!canister`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(400);
  });

  it('answers 404 when the provider is not configured', async () => {
    const res = await (await start()).inject({
      method: 'GET',
      url: `/api/is_canister_creator/${PRINCIPAL}/${CANISTER_ID}`,
      headers: AUTH,
    });

    expect(res.statusCode).toBe(404);
  });
});
