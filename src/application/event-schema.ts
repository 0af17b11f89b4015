import { z } from 'zod';

/**
 * Zod schemas for the inbound event payload shapes.
 *
 * These only check structure. Field-level meaning (identity format,
 * IP presence) is handled by the normalizer and the enrichment engine.
 */

/** A single event: any JSON object. Arrays and null are rejected. */
export const eventRecordSchema = z.record(z.string(), z.unknown());

/** One bulk row wraps the fields of one event under `event_data`. */
export const bulkRowSchema = z
  .object({
    event_data: eventRecordSchema,
  })
  .passthrough();

export const bulkRowsSchema = z.array(bulkRowSchema);

export const eventArraySchema = z.array(eventRecordSchema);
