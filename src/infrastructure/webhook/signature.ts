import { createHmac, timingSafeEqual } from 'node:crypto';

/** Lowercase hex HMAC-SHA256 of `body` under `secret`. */
export function computeSignature(secret: string, body: Buffer | string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Checks a hex HMAC-SHA256 signature in constant time.
 * A missing or differently sized signature never matches.
 */
export function verifySignature(secret: string, body: Buffer | string, signature: string | undefined): boolean {
  if (!signature) {
    return false;
  }

  const expected = Buffer.from(computeSignature(secret, body), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}
