import { describe, expect, it } from 'vitest';
import { formatExtension, parseExtensionsHeader } from '../handshake/extensions.js';
import { HttpHeaders } from '../handshake/headers.js';
import type { HandshakeRequest } from '../handshake/request.js';
import { PerMessageDeflateNegotiator } from './per-message-deflate.js';

function requestOffering(header: string): HandshakeRequest {
  return {
    uri: '/',
    path: '/',
    query: new URLSearchParams(),
    httpVersion: '1.1',
    headers: new HttpHeaders(),
    cookies: new Map(),
    extensions: parseExtensionsHeader(header)
  };
}

function negotiatedHeader(negotiator: PerMessageDeflateNegotiator, header: string): string | null {
  const negotiation = negotiator.tryNegotiate(requestOffering(header));
  return negotiation ? formatExtension(negotiation.response) : null;
}

describe('PerMessageDeflateNegotiator', () => {
  it('accepts a plain offer with default parameters', () => {
    const negotiation = new PerMessageDeflateNegotiator().tryNegotiate(requestOffering('permessage-deflate'));

    expect(negotiation?.response).toEqual({ name: 'permessage-deflate', options: [] });
    expect(negotiation?.context).toEqual({
      serverNoContextTakeover: false,
      clientNoContextTakeover: false,
      serverMaxWindowBits: 15,
      clientMaxWindowBits: 15,
      zlibDeflateOptions: { level: 1 },
      threshold: 128
    });
  });

  it('does not answer a bare client_max_window_bits unless configured', () => {
    expect(negotiatedHeader(new PerMessageDeflateNegotiator(), 'permessage-deflate; client_max_window_bits')).toBe(
      'permessage-deflate'
    );
    expect(
      negotiatedHeader(
        new PerMessageDeflateNegotiator({ clientMaxWindowBits: 10 }),
        'permessage-deflate; client_max_window_bits'
      )
    ).toBe('permessage-deflate;client_max_window_bits=10');
  });

  it('caps the client window at the offered value', () => {
    const negotiation = new PerMessageDeflateNegotiator({ clientMaxWindowBits: 12 }).tryNegotiate(
      requestOffering('permessage-deflate; client_max_window_bits=9')
    );

    expect(negotiation ? formatExtension(negotiation.response) : null).toBe(
      'permessage-deflate;client_max_window_bits=9'
    );
    expect(negotiation?.context.clientMaxWindowBits).toBe(9);
  });

  it('declines when a client window is required but not offered', () => {
    expect(negotiatedHeader(new PerMessageDeflateNegotiator({ clientMaxWindowBits: 10 }), 'permessage-deflate')).toBeNull();
  });

  it('echoes the client context takeover and server window requests', () => {
    const negotiation = new PerMessageDeflateNegotiator().tryNegotiate(
      requestOffering('permessage-deflate; server_max_window_bits=10; client_no_context_takeover')
    );

    expect(negotiation ? formatExtension(negotiation.response) : null).toBe(
      'permessage-deflate;client_no_context_takeover;server_max_window_bits=10'
    );
    expect(negotiation?.context.serverMaxWindowBits).toBe(10);
    expect(negotiation?.context.clientNoContextTakeover).toBe(true);
  });

  it('adds configured server_no_context_takeover', () => {
    expect(
      negotiatedHeader(new PerMessageDeflateNegotiator({ serverNoContextTakeover: true }), 'permessage-deflate')
    ).toBe('permessage-deflate;server_no_context_takeover');
  });

  it('falls back to a later offer when the first cannot be met', () => {
    expect(
      negotiatedHeader(
        new PerMessageDeflateNegotiator({ serverMaxWindowBits: 12 }),
        'permessage-deflate; server_max_window_bits=10, permessage-deflate'
      )
    ).toBe('permessage-deflate;server_max_window_bits=12');
  });

  it.each([
    'permessage-deflate; server_max_window_bits=7',
    'permessage-deflate; server_max_window_bits',
    'permessage-deflate; client_max_window_bits=16',
    'permessage-deflate; server_no_context_takeover=1',
    'permessage-deflate; x-unknown',
    'permessage-deflate; client_no_context_takeover; client_no_context_takeover'
  ])('declines the invalid offer %s', (header) => {
    expect(negotiatedHeader(new PerMessageDeflateNegotiator(), header)).toBeNull();
  });

  it('ignores other extensions', () => {
    expect(negotiatedHeader(new PerMessageDeflateNegotiator(), 'x-webkit-deflate-frame')).toBeNull();
  });

  it('clamps compression settings', () => {
    const negotiation = new PerMessageDeflateNegotiator({ zlibLevel: 12, threshold: -5 }).tryNegotiate(
      requestOffering('permessage-deflate')
    );

    expect(negotiation?.context.zlibDeflateOptions.level).toBe(9);
    expect(negotiation?.context.threshold).toBe(0);
  });
});
