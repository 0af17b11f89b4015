import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  AlertNotifier,
  BalanceProvider,
  CreatorStatusProvider,
  EventRecord,
  FactProviders,
  Location,
  LocationResolver,
  StreamAttributes,
  UserAgentClass,
} from '../src/domain/index.js';

export const PRINCIPAL = '2vxsx-fae';
export const OTHER_PRINCIPAL = 'aaaaa-aa';
export const CANISTER_ID = 'mxzaz-hqaaa-aaaar-qaada-cai';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

export function fakeSinks() {
  return {
    tracking: {
      track: vi.fn<(event: string, properties: EventRecord) => Promise<void>>().mockResolvedValue(undefined),
      setProfile: vi
        .fn<(distinctId: string, properties: EventRecord, ip?: string) => Promise<void>>()
        .mockResolvedValue(undefined),
    },
    stream: {
      publish: vi.fn<(data: Buffer, attributes: StreamAttributes) => Promise<string>>().mockResolvedValue('1-0'),
    },
    warehouse: {
      insert: vi.fn().mockResolvedValue(undefined),
    },
  };
}

export function fakeLocation(location: Location | null = { country: 'Germany', region: 'Berlin', city: 'Berlin' }) {
  return {
    lookup: vi.fn<(ip: string) => Promise<Location | null>>().mockResolvedValue(location),
  } satisfies LocationResolver;
}

export function fakeBalance(name: string, field: string, value = 42) {
  return {
    name,
    field,
    lookup: vi.fn<(identity: string, signal: AbortSignal) => Promise<number>>().mockResolvedValue(value),
  } satisfies BalanceProvider;
}

export function fakeCreatorStatus(isCreator = true) {
  return {
    lookup: vi
      .fn<(identity: string, scope: string, signal: AbortSignal) => Promise<boolean>>()
      .mockResolvedValue(isCreator),
  } satisfies CreatorStatusProvider;
}

export function fakeUserAgent(result: UserAgentClass = { device: 'desktop', os: 'Mac OSX' }) {
  return {
    classify: vi.fn<(userAgent: string) => UserAgentClass>().mockReturnValue(result),
  };
}

export function fakeNotifier() {
  return {
    notify: vi.fn<(text: string) => Promise<void>>().mockResolvedValue(undefined),
  } satisfies AlertNotifier;
}

export function fakeProviders(overrides: Partial<FactProviders> = {}): FactProviders {
  return {
    location: fakeLocation(),
    balances: [fakeBalance('btc', 'btc_balance_e8s')],
    creatorStatus: null,
    userAgent: fakeUserAgent(),
    ...overrides,
  };
}
