import type { Logger } from 'pino';
import type { EventRecord, EventSinks, FactProviders, SinkName } from '../domain/index.js';
import { PipelineError, eventNameOf } from '../domain/index.js';
import { normalizePayload } from './normalizer.js';
import { enrichEvent, enrichLocation } from './enrichment.js';
import { dispatchEvent, resolveDispatch } from './fanout.js';

/** Shared, read-only collaborators every request runs against. */
export interface PipelineContext {
  readonly sinks: EventSinks;
  readonly providers: FactProviders;
  readonly providerTimeoutMs: number;
  readonly log: Logger;
}

export type ProcessResult =
  | { readonly ok: true; readonly processed: number }
  | { readonly ok: false; readonly error: PipelineError };

/**
 * Full path for one record: enrichment, then fanout to every sink.
 * The tracking sink's outcome is the record's outcome.
 */
export async function processEvent(record: EventRecord, ctx: PipelineContext): Promise<ProcessResult> {
  const enriched = await enrichEvent(record, {
    tracking: ctx.sinks.tracking,
    providers: ctx.providers,
    providerTimeoutMs: ctx.providerTimeoutMs,
    log: ctx.log,
  });

  if (!enriched.ok) {
    ctx.log.info({ err: enriched.error }, 'Event rejected during enrichment');
    return { ok: false, error: enriched.error };
  }

  ctx.log.debug(
    { event: eventNameOf(record), outcomes: enriched.outcomes },
    'Event enriched',
  );

  const results = await dispatchEvent(enriched.record, eventNameOf(enriched.record), ctx.sinks, {
    log: ctx.log,
  });
  const outcome = resolveDispatch(results, 'tracking');
  return outcome.ok ? { ok: true, processed: 1 } : { ok: false, error: outcome.error };
}

/** Warehouse-only path: geo enrichment, then the warehouse sink alone. */
export async function processWarehouseEvent(record: EventRecord, ctx: PipelineContext): Promise<ProcessResult> {
  await enrichLocation(record, ctx);

  const target: SinkName = 'warehouse';
  const results = await dispatchEvent(record, eventNameOf(record), ctx.sinks, {
    log: ctx.log,
    targets: [target],
  });
  const outcome = resolveDispatch(results, target);
  return outcome.ok ? { ok: true, processed: 1 } : { ok: false, error: outcome.error };
}

type RecordProcessor = (record: EventRecord, ctx: PipelineContext) => Promise<ProcessResult>;

async function processAll(
  body: unknown,
  clientIp: string | undefined,
  ctx: PipelineContext,
  processor: RecordProcessor,
): Promise<ProcessResult> {
  const normalized = normalizePayload(body, clientIp);
  if (!normalized.ok) {
    return normalized;
  }

  // Records are independent: all of them run to completion before the
  // first failure (in payload order) is reported.
  const results = await Promise.all(normalized.records.map((record) => processor(record, ctx)));

  const failure = results.find((result) => !result.ok);
  if (failure !== undefined) {
    return failure;
  }

  ctx.log.debug({ shape: normalized.shape, count: results.length }, 'Payload processed');
  return { ok: true, processed: results.length };
}

/** Normalizes an inbound body and runs every record through the full path. */
export function processPayload(
  body: unknown,
  clientIp: string | undefined,
  ctx: PipelineContext,
): Promise<ProcessResult> {
  return processAll(body, clientIp, ctx, processEvent);
}

/** Normalizes an inbound body and writes every record to the warehouse only. */
export function processWarehousePayload(
  body: unknown,
  clientIp: string | undefined,
  ctx: PipelineContext,
): Promise<ProcessResult> {
  return processAll(body, clientIp, ctx, processWarehouseEvent);
}
