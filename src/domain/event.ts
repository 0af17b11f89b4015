/**
 * Core domain types for the analytics event model.
 *
 * These types describe an event as it moves from the inbound request
 * through enrichment to the sinks. They carry no framework dependencies.
 */

/**
 * One analytics event: a free-form mapping of field names to JSON values.
 *
 * Reserved fields read by the pipeline: `event`, `principal`,
 * `distinct_id`, `ip_addr`, `user_agent`, `canister_id`.
 */
export type EventRecord = Record<string, unknown>;

/** Name used when a record carries no string `event` field. */
export const UNKNOWN_EVENT = 'unknown';

/** Value written to the stream sink's `source` attribute. */
export const EVENT_SOURCE = 'analytics_server';

/** Prefix applied to event names in the warehouse. */
export const WAREHOUSE_EVENT_PREFIX = 'mp_';

/** Shapes an inbound payload can take, in detection priority order. */
export type PayloadShape = 'bulk' | 'array' | 'single';

/**
 * Result of classifying an inbound payload.
 *
 * `bulk` keeps the shared fields apart from the row fragments so the
 * normalizer decides how they merge.
 */
export type ClassifiedPayload =
  | { readonly shape: 'bulk'; readonly common: EventRecord; readonly rows: readonly EventRecord[] }
  | { readonly shape: 'array'; readonly events: readonly EventRecord[] }
  | { readonly shape: 'single'; readonly event: EventRecord };

/** Reads the event name, falling back to {@link UNKNOWN_EVENT}. */
export function eventNameOf(record: EventRecord): string {
  const name = record['event'];
  return typeof name === 'string' ? name : UNKNOWN_EVENT;
}

/** Reads a string field, ignoring values of any other type. */
export function stringField(record: EventRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
