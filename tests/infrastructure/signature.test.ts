import { describe, it, expect } from 'vitest';
import { computeSignature, verifySignature } from '../../src/infrastructure/webhook/index.js';

const SECRET = 'test-secret';
const BODY = Buffer.from('{"data":{"event":{"title":"boom"}}}', 'utf8');

describe('verifySignature', () => {
  it('accepts the signature of the exact body', () => {
    expect(verifySignature(SECRET, BODY, computeSignature(SECRET, BODY))).toBe(true);
  });

  it('accepts an uppercase signature', () => {
    expect(verifySignature(SECRET, BODY, computeSignature(SECRET, BODY).toUpperCase())).toBe(true);
  });

  it('rejects any single-byte mutation of the body', () => {
    const signature = computeSignature(SECRET, BODY);
    for (let i = 0; i < BODY.length; i++) {
      const mutated = Buffer.from(BODY);
      mutated[i] = (mutated[i] ?? 0) ^ 0x01;
      expect(verifySignature(SECRET, mutated, signature)).toBe(false);
    }
  });

  it('rejects a signature made with another secret', () => {
    expect(verifySignature(SECRET, BODY, computeSignature('other-secret', BODY))).toBe(false);
  });

  it('rejects a missing or truncated signature', () => {
    expect(verifySignature(SECRET, BODY, undefined)).toBe(false);
    expect(verifySignature(SECRET, BODY, '')).toBe(false);
    expect(verifySignature(SECRET, BODY, computeSignature(SECRET, BODY).slice(0, 10))).toBe(false);
  });

  it('produces lowercase hex SHA-256', () => {
    expect(computeSignature(SECRET, BODY)).toMatch(/^[0-9a-f]{64}$/);
  });
});
