import { describe, it, expect } from 'vitest';
import { PipelineError, parseIdentity, tryParseIdentity } from '../../src/domain/index.js';

describe('parseIdentity', () => {
  it('accepts canonical principals', () => {
    expect(parseIdentity('2vxsx-fae')).toBe('2vxsx-fae');
    expect(parseIdentity('aaaaa-aa')).toBe('aaaaa-aa');
    expect(parseIdentity('mxzaz-hqaaa-aaaar-qaada-cai')).toBe('mxzaz-hqaaa-aaaar-qaada-cai');
  });

  it('rejects text outside the principal alphabet', () => {
    expect(() => parseIdentity('bad!principal')).toThrow(PipelineError);
    expect(() => parseIdentity('bad!principal')).toThrow('Invalid principal "bad!principal"');
  });

  it('rejects a principal with a broken checksum', () => {
    expect(() => parseIdentity('2vxsx-fab')).toThrow(PipelineError);
  });

  it.each([[''], [42], [{}], [null]])('rejects non-string or empty value %j', (value) => {
    try {
      parseIdentity(value);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PipelineError);
      expect((err as PipelineError).code).toBe('InvalidIdentity');
      expect((err as PipelineError).message).toBe('Identity must be a non-empty string');
    }
  });
});

describe('tryParseIdentity', () => {
  it('returns null instead of throwing', () => {
    expect(tryParseIdentity('bad!principal')).toBeNull();
    expect(tryParseIdentity(undefined)).toBeNull();
    expect(tryParseIdentity('aaaaa-aa')).toBe('aaaaa-aa');
  });
});
