import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: '0.0.0.0',
      port: 8080,
      adminPort: 9090,
      handshakeTimeoutMs: 5000,
      maxHeaderBytes: 16384,
      minExtensionEntries: 1,
      perMessageDeflate: {
        enabled: true,
        zlibLevel: 1,
        threshold: 128
      }
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      WSGATE_HOST: ' 127.0.0.1 ',
      PORT: '3000',
      ADMIN_PORT: 'off',
      WSGATE_HANDSHAKE_TIMEOUT_MS: '2500',
      WSGATE_MIN_EXTENSION_ENTRIES: '2',
      WSGATE_PERMESSAGE_DEFLATE: 'false',
      WSGATE_DEFLATE_LEVEL: '6'
    });

    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(3000);
    expect(config.adminPort).toBeNull();
    expect(config.handshakeTimeoutMs).toBe(2500);
    expect(config.minExtensionEntries).toBe(2);
    expect(config.perMessageDeflate).toEqual({ enabled: false, zlibLevel: 6, threshold: 128 });
  });

  it('treats admin port 0 as disabled', () => {
    expect(loadConfig({ ADMIN_PORT: '0' }).adminPort).toBeNull();
  });

  it('falls back and warns on invalid values', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = loadConfig({ PORT: 'abc', WSGATE_MIN_EXTENSION_ENTRIES: '3', WSGATE_DEFLATE_LEVEL: '1.5' });

    expect(config.port).toBe(8080);
    expect(config.minExtensionEntries).toBe(1);
    expect(config.perMessageDeflate.zlibLevel).toBe(1);
    expect(warnSpy).toHaveBeenCalledWith('[wsgate] config: invalid PORT=abc, fallback to 8080');
    expect(warnSpy).toHaveBeenCalledTimes(3);
  });
});
