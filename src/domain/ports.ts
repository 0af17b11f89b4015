import type { EventRecord } from './event.js';

/**
 * Contracts for the external systems the pipeline talks to.
 *
 * Implementations are constructed once at startup and shared by every
 * request, so they must tolerate concurrent calls.
 */

// ─── Sinks ───────────────────────────────────────────────────

export type SinkName = 'tracking' | 'stream' | 'warehouse';

/** Primary analytics platform. Its outcome decides the request's result. */
export interface TrackingSink {
  track(event: string, properties: EventRecord): Promise<void>;
  /** Idempotent upsert of the user profile keyed by `distinctId`. */
  setProfile(distinctId: string, properties: EventRecord, ip?: string): Promise<void>;
}

export type StreamAttributes = Readonly<Record<string, string>>;

/** Append-only message bus. Returns the id assigned to the message. */
export interface StreamSink {
  publish(data: Buffer, attributes: StreamAttributes): Promise<string>;
}

export interface WarehouseRow {
  readonly event: string;
  /** JSON-serialized event record. */
  readonly params: string;
  /** Dispatch time, RFC 3339. */
  readonly timestamp: string;
}

export interface WarehouseSink {
  insert(row: WarehouseRow): Promise<void>;
}

export interface EventSinks {
  readonly tracking: TrackingSink;
  readonly stream: StreamSink;
  readonly warehouse: WarehouseSink;
}

// ─── Fact providers ──────────────────────────────────────────

export interface Location {
  readonly country: string;
  readonly region: string;
  readonly city: string;
  readonly timezone?: string;
}

/**
 * Resolves an IP address to a location.
 * Resolves `null` when the address is unknown; rejects with
 * `IpConfigError` when the lookup itself cannot be made.
 */
export interface LocationResolver {
  lookup(ip: string): Promise<Location | null>;
}

export interface BalanceProvider {
  /** Short name used by the direct lookup routes, e.g. `btc`. */
  readonly name: string;
  /** Event field the balance is written to. */
  readonly field: string;
  lookup(identity: string, signal: AbortSignal): Promise<number>;
}

export interface CreatorStatusProvider {
  lookup(identity: string, scope: string, signal: AbortSignal): Promise<boolean>;
}

export type DeviceCategory = 'mobile' | 'tablet' | 'desktop' | 'tv' | 'bot' | 'other';

export interface UserAgentClass {
  readonly device: DeviceCategory;
  readonly os?: string;
}

/** Pure classification; unknown input maps to `other`. */
export interface UserAgentClassifier {
  classify(userAgent: string): UserAgentClass;
}

export interface FactProviders {
  readonly location: LocationResolver | null;
  readonly balances: readonly BalanceProvider[];
  readonly creatorStatus: CreatorStatusProvider | null;
  readonly userAgent: UserAgentClassifier;
}

// ─── Notifications ───────────────────────────────────────────

/** Chat endpoint that receives relayed alert summaries. */
export interface AlertNotifier {
  notify(text: string): Promise<void>;
}
