import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { WEBSOCKET_GUID, computeAcceptKey } from './accept-key.js';

describe('computeAcceptKey', () => {
  it('derives the RFC 6455 sample accept value', () => {
    expect(computeAcceptKey('dGhlIHNhbXBsZSBub25jZQ==')).toBe('s3pPLMBiTxaQ9kYGzzhZRbK+xOo=');
  });

  it('is the base64 SHA-1 of key and GUID for any key', () => {
    const key = 'x3JJHMbDL1EzLkh9GBhXDw==';
    const expected = createHash('sha1').update(key + WEBSOCKET_GUID).digest('base64');

    expect(computeAcceptKey(key)).toBe(expected);
    expect(computeAcceptKey(key)).toBe(computeAcceptKey(key));
  });

  it('uses the raw key without trimming', () => {
    expect(computeAcceptKey(' dGhlIHNhbXBsZSBub25jZQ==')).not.toBe('s3pPLMBiTxaQ9kYGzzhZRbK+xOo=');
  });
});
