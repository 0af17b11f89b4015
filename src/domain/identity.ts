import { Principal } from '@dfinity/principal';
import { PipelineError } from './errors.js';

/**
 * Validates the textual form of a principal and returns its canonical text.
 *
 * The canonical form is the lowercase, dash-grouped re-encoding; input that
 * does not round-trip (bad alphabet, bad checksum, wrong grouping) is rejected.
 */
export function parseIdentity(value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new PipelineError('InvalidIdentity', 'Identity must be a non-empty string');
  }
  try {
    return Principal.fromText(value).toText();
  } catch (err: unknown) {
    throw new PipelineError('InvalidIdentity', `Invalid principal "${value}"`, { cause: err });
  }
}

/** Non-throwing variant used where an invalid value is simply ignored. */
export function tryParseIdentity(value: unknown): string | null {
  try {
    return parseIdentity(value);
  } catch {
    return null;
  }
}
