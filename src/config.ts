import { DEFAULT_PER_MESSAGE_DEFLATE } from './extensions/per-message-deflate.js';
import { DEFAULT_MAX_HEADER_BYTES } from './handshake/line-reader.js';

export interface GatewayConfig {
  host: string;
  port: number;
  // null disables the admin HTTP server
  adminPort: number | null;
  handshakeTimeoutMs: number;
  maxHeaderBytes: number;
  minExtensionEntries: 1 | 2;
  perMessageDeflate: {
    enabled: boolean;
    zlibLevel: number;
    threshold: number;
  };
}

type Env = Record<string, string | undefined>;

function isDisabledEnvFlag(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return /^(0|false|no|off)$/i.test(value.trim());
}

function readInteger(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    console.warn(`[wsgate] config: invalid ${key}=${raw}, fallback to ${fallback}`);
    return fallback;
  }
  return value;
}

function readAdminPort(env: Env): number | null {
  const raw = env.ADMIN_PORT;
  if (isDisabledEnvFlag(raw)) {
    return null;
  }
  const port = readInteger(env, 'ADMIN_PORT', 9090, 0, 65_535);
  return port === 0 ? null : port;
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const host = env.WSGATE_HOST?.trim() || '0.0.0.0';
  return {
    host,
    port: readInteger(env, 'PORT', 8080, 1, 65_535),
    adminPort: readAdminPort(env),
    handshakeTimeoutMs: readInteger(env, 'WSGATE_HANDSHAKE_TIMEOUT_MS', 5_000, 100, 120_000),
    maxHeaderBytes: readInteger(env, 'WSGATE_MAX_HEADER_BYTES', DEFAULT_MAX_HEADER_BYTES, 1_024, 1024 * 1024),
    minExtensionEntries: readInteger(env, 'WSGATE_MIN_EXTENSION_ENTRIES', 1, 1, 2) === 2 ? 2 : 1,
    perMessageDeflate: {
      enabled: !isDisabledEnvFlag(env.WSGATE_PERMESSAGE_DEFLATE),
      zlibLevel: readInteger(env, 'WSGATE_DEFLATE_LEVEL', DEFAULT_PER_MESSAGE_DEFLATE.zlibLevel, 0, 9),
      threshold: readInteger(
        env,
        'WSGATE_DEFLATE_THRESHOLD',
        DEFAULT_PER_MESSAGE_DEFLATE.threshold,
        0,
        Number.MAX_SAFE_INTEGER
      )
    }
  };
}
