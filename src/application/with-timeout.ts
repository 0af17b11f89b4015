import { PipelineError } from '../domain/index.js';

/**
 * Runs one provider call under its own deadline.
 *
 * The call receives an AbortSignal that fires when the deadline passes.
 * Expiry rejects with a `Timeout` pipeline error even if the call ignores
 * the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new PipelineError('Timeout', `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
