/**
 * Error taxonomy shared by the pipeline and the HTTP surface.
 *
 * Every failure a caller can observe carries one of these codes.
 * `ProviderError` and `Timeout` are recovered inside the enrichment
 * engine and only reach a caller through the direct lookup routes.
 */
export type PipelineErrorCode =
  | 'InvalidPayloadShape'
  | 'InvalidIdentity'
  | 'SinkDeliveryFailed'
  | 'IpConfigError'
  | 'Unauthorized'
  | 'ProviderError'
  | 'Timeout';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  /** Status reported by an upstream system, when there was one. */
  readonly upstreamStatus: number | undefined;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: { upstreamStatus?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.upstreamStatus = options.upstreamStatus;
  }
}

/**
 * Raised by a sink adapter when a delivery is rejected or cannot be made.
 * `status` is the upstream HTTP status when the sink speaks HTTP.
 */
export class SinkError extends Error {
  readonly sink: string;
  readonly status: number | undefined;

  constructor(sink: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SinkError';
    this.sink = sink;
    this.status = options.status;
  }
}

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  InvalidPayloadShape: 400,
  InvalidIdentity: 400,
  IpConfigError: 400,
  Unauthorized: 401,
  SinkDeliveryFailed: 502,
  ProviderError: 502,
  Timeout: 502,
};

function isHttpStatus(value: number): boolean {
  return Number.isInteger(value) && value >= 400 && value <= 599;
}

/** Maps a pipeline error to the HTTP status answered to the caller. */
export function httpStatusFor(error: PipelineError): number {
  if (
    error.code === 'SinkDeliveryFailed'
    && error.upstreamStatus !== undefined
    && isHttpStatus(error.upstreamStatus)
  ) {
    return error.upstreamStatus;
  }
  return STATUS_BY_CODE[error.code];
}

/** JSON body sent for a failed request. */
export function errorBody(error: PipelineError): { error: PipelineErrorCode; message: string } {
  return { error: error.code, message: error.message };
}

/** Normalizes anything thrown by a provider into a pipeline error. */
export function toProviderError(label: string, err: unknown): PipelineError {
  if (err instanceof PipelineError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new PipelineError('ProviderError', `${label} failed: ${detail}`, { cause: err });
}
