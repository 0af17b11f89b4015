import type { ClassifiedPayload, EventRecord, PayloadShape } from '../domain/index.js';
import { PipelineError, isPlainObject } from '../domain/index.js';
import { bulkRowsSchema, eventArraySchema } from './event-schema.js';

const ROWS_KEY = 'rows';
const COMMON_FIELDS_KEY = 'common_fields';
const IP_FIELD = 'ip_addr';

export type NormalizeResult =
  | { readonly ok: true; readonly shape: PayloadShape; readonly records: EventRecord[] }
  | { readonly ok: false; readonly error: PipelineError };

/**
 * Collects the shared fields of a bulk payload: every top-level key except
 * `rows`. A nested `common_fields` object is flattened into the result so
 * both producer styles merge the same way.
 */
function collectCommonFields(body: Record<string, unknown>): EventRecord {
  const common: EventRecord = {};
  const nested = body[COMMON_FIELDS_KEY];
  if (isPlainObject(nested)) {
    Object.assign(common, nested);
  }
  for (const [key, value] of Object.entries(body)) {
    if (key === ROWS_KEY || (key === COMMON_FIELDS_KEY && isPlainObject(value))) continue;
    common[key] = value;
  }
  return common;
}

function hasObjectRows(body: Record<string, unknown>): boolean {
  const rows = body[ROWS_KEY];
  return Array.isArray(rows) && rows.every(isPlainObject);
}

/**
 * Classifies an inbound body into one of the three payload shapes.
 *
 * Detection order is fixed: bulk, then array, then single. An object whose
 * `rows` is an array of objects is bulk, and every row must then carry an
 * `event_data` object. Any other `rows` value is an ordinary event field.
 *
 * @throws PipelineError `InvalidPayloadShape` when no shape matches.
 */
export function classifyPayload(body: unknown): ClassifiedPayload {
  if (isPlainObject(body) && hasObjectRows(body)) {
    const rows = bulkRowsSchema.safeParse(body[ROWS_KEY]);
    if (!rows.success) {
      throw new PipelineError(
        'InvalidPayloadShape',
        'Bulk payload rows must be an array of objects with an event_data object',
      );
    }
    return {
      shape: 'bulk',
      common: collectCommonFields(body),
      rows: rows.data.map((row) => row.event_data),
    };
  }

  if (Array.isArray(body)) {
    const events = eventArraySchema.safeParse(body);
    if (!events.success) {
      throw new PipelineError('InvalidPayloadShape', 'Every element of an event array must be an object');
    }
    return { shape: 'array', events: events.data };
  }

  if (isPlainObject(body)) {
    return { shape: 'single', event: body };
  }

  throw new PipelineError('InvalidPayloadShape', 'Event payload must be an array or object');
}

function withDefaultIp(record: EventRecord, defaultIp: string | undefined): EventRecord {
  if (record[IP_FIELD] === undefined && defaultIp) {
    record[IP_FIELD] = defaultIp;
  }
  return record;
}

function tryClassify(body: unknown): ClassifiedPayload | PipelineError {
  try {
    return classifyPayload(body);
  } catch (err: unknown) {
    if (err instanceof PipelineError) {
      return err;
    }
    throw err;
  }
}

/**
 * Turns an inbound body into independent event records.
 *
 * Bulk rows are merged over a fresh copy of the shared fields (row fields
 * win). Every record without `ip_addr` receives `defaultIp`. The input is
 * never mutated.
 */
export function normalizePayload(body: unknown, defaultIp: string | undefined): NormalizeResult {
  const classified = tryClassify(body);
  if (classified instanceof PipelineError) {
    return { ok: false, error: classified };
  }

  switch (classified.shape) {
    case 'bulk':
      return {
        ok: true,
        shape: 'bulk',
        records: classified.rows.map((row) =>
          withDefaultIp({ ...structuredClone(classified.common), ...row }, defaultIp),
        ),
      };
    case 'array':
      return {
        ok: true,
        shape: 'array',
        records: classified.events.map((event) => withDefaultIp({ ...event }, defaultIp)),
      };
    case 'single':
      return {
        ok: true,
        shape: 'single',
        records: [withDefaultIp({ ...classified.event }, defaultIp)],
      };
  }
}
