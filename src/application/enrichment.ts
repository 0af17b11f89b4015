import type { Logger } from 'pino';
import type {
  BalanceProvider,
  EventRecord,
  FactProviders,
  TrackingSink,
} from '../domain/index.js';
import {
  PipelineError,
  parseIdentity,
  stringField,
  toProviderError,
  tryParseIdentity,
} from '../domain/index.js';
import { withTimeout } from './with-timeout.js';

export type EnrichmentStep = 'identity' | 'profile' | 'device' | 'balance' | 'creator_status' | 'geo';

/** What happened to one fact. Informational only, never fatal. */
export type EnrichmentOutcome =
  | { readonly step: EnrichmentStep; readonly fact: string; readonly status: 'applied'; readonly value: unknown }
  | { readonly step: EnrichmentStep; readonly fact: string; readonly status: 'skipped'; readonly reason: string };

/**
 * Result of enriching one record.
 *
 * `ok: false` is reserved for an invalid identity; every other failure
 * shows up as a `skipped` outcome on a successful result.
 */
export type EnrichmentResult =
  | {
    readonly ok: true;
    readonly record: EventRecord;
    readonly identity: string | null;
    readonly outcomes: readonly EnrichmentOutcome[];
  }
  | {
    readonly ok: false;
    readonly error: PipelineError;
    readonly outcomes: readonly EnrichmentOutcome[];
  };

export interface EnrichmentDeps {
  readonly tracking: TrackingSink;
  readonly providers: FactProviders;
  readonly providerTimeoutMs: number;
  readonly log: Logger;
}

type FactDeps = Omit<EnrichmentDeps, 'tracking'>;

const IDENTITY_FIELDS = ['principal', 'distinct_id'] as const;

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

class OutcomeLog {
  readonly outcomes: EnrichmentOutcome[] = [];

  applied(step: EnrichmentStep, fact: string, value: unknown): void {
    this.outcomes.push({ step, fact, status: 'applied', value });
  }

  skipped(step: EnrichmentStep, fact: string, reason: string): void {
    this.outcomes.push({ step, fact, status: 'skipped', reason });
  }
}

// ─── Step 1: identity ────────────────────────────────────────

function readIdentity(record: EventRecord): unknown {
  for (const field of IDENTITY_FIELDS) {
    const value = record[field];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

async function upsertProfile(
  record: EventRecord,
  identity: string,
  deps: EnrichmentDeps,
  outcomes: OutcomeLog,
): Promise<void> {
  try {
    await deps.tracking.setProfile(identity, { ...record }, stringField(record, 'ip_addr'));
    outcomes.applied('profile', 'profile', identity);
  } catch (err: unknown) {
    deps.log.warn({ err, identity }, 'Profile upsert failed');
    outcomes.skipped('profile', 'profile', reasonOf(err));
  }
}

// ─── Step 2: device ──────────────────────────────────────────

function classifyDevice(record: EventRecord, deps: FactDeps, outcomes: OutcomeLog): void {
  const userAgent = stringField(record, 'user_agent');
  if (userAgent === undefined) {
    outcomes.skipped('device', 'device', 'no user_agent');
    return;
  }

  try {
    const { device, os } = deps.providers.userAgent.classify(userAgent);
    record['device'] = device;
    outcomes.applied('device', 'device', device);
    if (os) {
      record['$os'] = os;
      outcomes.applied('device', '$os', os);
    }
  } catch (err: unknown) {
    deps.log.debug({ err }, 'User agent classification failed');
    outcomes.skipped('device', 'device', reasonOf(err));
  }
}

// ─── Step 3: balances ────────────────────────────────────────

async function enrichBalances(
  record: EventRecord,
  identity: string | null,
  deps: FactDeps,
  outcomes: OutcomeLog,
): Promise<void> {
  const providers = deps.providers.balances;
  if (identity === null) {
    for (const provider of providers) {
      outcomes.skipped('balance', provider.field, 'no identity');
    }
    return;
  }

  const principal = identity;
  const settled = await Promise.allSettled(
    providers.map((provider: BalanceProvider) =>
      withTimeout(`${provider.name} balance lookup`, deps.providerTimeoutMs, (signal) =>
        provider.lookup(principal, signal),
      ),
    ),
  );

  settled.forEach((result, index) => {
    const provider = providers[index];
    if (provider === undefined) return;

    if (result.status === 'fulfilled') {
      record[provider.field] = result.value;
      outcomes.applied('balance', provider.field, result.value);
    } else {
      const error = toProviderError(`${provider.name} balance lookup`, result.reason);
      deps.log.warn({ err: error, provider: provider.name, identity }, 'Balance enrichment skipped');
      outcomes.skipped('balance', provider.field, error.message);
    }
  });
}

// ─── Step 4: creator status ──────────────────────────────────

async function enrichCreatorStatus(
  record: EventRecord,
  identity: string | null,
  deps: FactDeps,
  outcomes: OutcomeLog,
): Promise<void> {
  const provider = deps.providers.creatorStatus;
  if (provider === null) {
    outcomes.skipped('creator_status', 'is_creator', 'provider not configured');
    return;
  }
  if (identity === null) {
    outcomes.skipped('creator_status', 'is_creator', 'no identity');
    return;
  }

  const scope = tryParseIdentity(record['canister_id']);
  if (scope === null) {
    outcomes.skipped('creator_status', 'is_creator', 'no valid canister_id');
    return;
  }

  const principal = identity;
  try {
    const isCreator = await withTimeout('creator status lookup', deps.providerTimeoutMs, (signal) =>
      provider.lookup(principal, scope, signal),
    );
    record['is_creator'] = isCreator;
    outcomes.applied('creator_status', 'is_creator', isCreator);
  } catch (err: unknown) {
    const error = toProviderError('creator status lookup', err);
    deps.log.warn({ err: error, identity, canister_id: scope }, 'Creator status enrichment skipped');
    outcomes.skipped('creator_status', 'is_creator', error.message);
  }
}

// ─── Step 5: geo ─────────────────────────────────────────────

async function enrichGeo(record: EventRecord, deps: FactDeps, outcomes: OutcomeLog): Promise<void> {
  const ip = stringField(record, 'ip_addr');
  const resolver = deps.providers.location;
  if (ip === undefined) {
    outcomes.skipped('geo', 'location', 'no ip_addr');
    return;
  }
  if (resolver === null) {
    outcomes.skipped('geo', 'location', 'resolver not configured');
    return;
  }

  try {
    const location = await withTimeout('location lookup', deps.providerTimeoutMs, () => resolver.lookup(ip));
    if (location === null) {
      outcomes.skipped('geo', 'location', 'not found');
      return;
    }
    record['city'] = location.city;
    record['region'] = location.region;
    record['country'] = location.country;
    if (location.timezone !== undefined) {
      record['timezone'] = location.timezone;
    }
    outcomes.applied('geo', 'location', location);
  } catch (err: unknown) {
    deps.log.debug({ err, ip }, 'Geo enrichment skipped');
    outcomes.skipped('geo', 'location', reasonOf(err));
  }
}

// ─── Engine ──────────────────────────────────────────────────

/**
 * Enriches one record in place.
 *
 * Steps run in a fixed order: identity, device, balances, creator status,
 * geo. Only an identity that is present but malformed aborts the record;
 * every other step records a `skipped` outcome and moves on.
 */
export async function enrichEvent(record: EventRecord, deps: EnrichmentDeps): Promise<EnrichmentResult> {
  const outcomes = new OutcomeLog();

  const rawIdentity = readIdentity(record);
  let identity: string | null = null;
  if (rawIdentity === undefined) {
    outcomes.skipped('identity', 'distinct_id', 'no identity');
  } else {
    try {
      identity = parseIdentity(rawIdentity);
    } catch (err: unknown) {
      if (err instanceof PipelineError) {
        return { ok: false, error: err, outcomes: outcomes.outcomes };
      }
      throw err;
    }
    record['distinct_id'] = identity;
    record['$user_id'] = identity;
    outcomes.applied('identity', 'distinct_id', identity);
    await upsertProfile(record, identity, deps, outcomes);
  }

  classifyDevice(record, deps, outcomes);
  await enrichBalances(record, identity, deps, outcomes);
  await enrichCreatorStatus(record, identity, deps, outcomes);
  await enrichGeo(record, deps, outcomes);

  return { ok: true, record, identity, outcomes: outcomes.outcomes };
}

/**
 * Geo step on its own, for paths that skip identity and the tracking sink.
 */
export async function enrichLocation(
  record: EventRecord,
  deps: FactDeps,
): Promise<readonly EnrichmentOutcome[]> {
  const outcomes = new OutcomeLog();
  await enrichGeo(record, deps, outcomes);
  return outcomes.outcomes;
}
