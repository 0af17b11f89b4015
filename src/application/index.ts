export { eventRecordSchema, bulkRowSchema, bulkRowsSchema, eventArraySchema } from './event-schema.js';
export { classifyPayload, normalizePayload } from './normalizer.js';
export type { NormalizeResult } from './normalizer.js';
export { enrichEvent, enrichLocation } from './enrichment.js';
export type { EnrichmentDeps, EnrichmentOutcome, EnrichmentResult, EnrichmentStep } from './enrichment.js';
export { buildStreamMessage, buildWarehouseRow, dispatchEvent, resolveDispatch } from './fanout.js';
export type { DispatchOptions, DispatchOutcome, DispatchResult } from './fanout.js';
export { processEvent, processPayload, processWarehouseEvent, processWarehousePayload } from './pipeline.js';
export type { PipelineContext, ProcessResult } from './pipeline.js';
export { resolveClientIp } from './client-ip.js';
export { withTimeout } from './with-timeout.js';
export { alertEventSchema, alertWebhookSchema } from './alert-schema.js';
export type { AlertEvent, AlertWebhookPayload } from './alert-schema.js';
export { formatAlertSummary, relayAlert, severityEmoji } from './alert-relay.js';
