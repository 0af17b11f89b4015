import type { Logger } from 'pino';
import type {
  EventRecord,
  EventSinks,
  SinkName,
  StreamAttributes,
  WarehouseRow,
} from '../domain/index.js';
import {
  EVENT_SOURCE,
  PipelineError,
  SinkError,
  WAREHOUSE_EVENT_PREFIX,
} from '../domain/index.js';

export type DispatchResult =
  | { readonly sink: SinkName; readonly status: 'delivered' }
  | { readonly sink: SinkName; readonly status: 'failed'; readonly error: unknown };

export type DispatchOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: PipelineError };

export interface DispatchOptions {
  readonly log: Logger;
  /** Sinks to deliver to. Defaults to all three. */
  readonly targets?: readonly SinkName[];
  readonly now?: Date;
}

const ALL_SINKS: readonly SinkName[] = ['tracking', 'stream', 'warehouse'];

/** Byte envelope and attributes published to the stream sink. */
export function buildStreamMessage(
  record: EventRecord,
  eventName: string,
  at: Date,
): { data: Buffer; attributes: StreamAttributes } {
  const envelope = { timestamp: at.toISOString(), event_data: record };
  return {
    data: Buffer.from(JSON.stringify(envelope), 'utf8'),
    attributes: { event_type: eventName, source: EVENT_SOURCE },
  };
}

export function buildWarehouseRow(record: EventRecord, eventName: string, at: Date): WarehouseRow {
  return {
    event: `${WAREHOUSE_EVENT_PREFIX}${eventName}`,
    params: JSON.stringify(record),
    timestamp: at.toISOString(),
  };
}

async function deliver(sink: SinkName, send: () => Promise<unknown>): Promise<DispatchResult> {
  try {
    await send();
    return { sink, status: 'delivered' };
  } catch (err: unknown) {
    return { sink, status: 'failed', error: err };
  }
}

/**
 * Delivers one enriched record to every targeted sink concurrently.
 *
 * The record is frozen on entry; each sink gets its own serialization.
 * A sink failure never prevents the others from being attempted, and
 * this function never rejects.
 */
export async function dispatchEvent(
  record: EventRecord,
  eventName: string,
  sinks: EventSinks,
  options: DispatchOptions,
): Promise<DispatchResult[]> {
  const { log } = options;
  const targets = options.targets ?? ALL_SINKS;
  const at = options.now ?? new Date();
  Object.freeze(record);

  const senders: Record<SinkName, () => Promise<unknown>> = {
    tracking: () => sinks.tracking.track(eventName, { ...record }),
    stream: () => {
      const { data, attributes } = buildStreamMessage(record, eventName, at);
      return sinks.stream.publish(data, attributes);
    },
    warehouse: () => sinks.warehouse.insert(buildWarehouseRow(record, eventName, at)),
  };

  const results = await Promise.all(targets.map((sink) => deliver(sink, senders[sink])));

  for (const result of results) {
    if (result.status === 'failed') {
      log.warn({ err: result.error, sink: result.sink, event: eventName }, 'Sink delivery failed');
    } else {
      log.debug({ sink: result.sink, event: eventName }, 'Sink delivery succeeded');
    }
  }

  return results;
}

/**
 * Maps per-sink results to the result of the whole event.
 *
 * Only the authoritative sink decides; the others are side effects whose
 * failures were already logged by {@link dispatchEvent}.
 */
export function resolveDispatch(
  results: readonly DispatchResult[],
  authoritative: SinkName = 'tracking',
): DispatchOutcome {
  const primary = results.find((result) => result.sink === authoritative);
  if (primary === undefined || primary.status === 'delivered') {
    return { ok: true };
  }

  const cause = primary.error;
  const upstreamStatus = cause instanceof SinkError ? cause.status : undefined;
  const detail = cause instanceof Error ? cause.message : String(cause);
  return {
    ok: false,
    error: new PipelineError('SinkDeliveryFailed', `${authoritative} sink rejected the event: ${detail}`, {
      upstreamStatus,
      cause,
    }),
  };
}
