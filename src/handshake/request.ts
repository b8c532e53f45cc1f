import { HandshakeError } from './errors.js';
import type { WebSocketExtension } from './extensions.js';
import type { HttpHeaders } from './headers.js';

export type HttpVersion = '1.0' | '1.1';

export interface RequestLine {
  uri: string;
  path: string;
  query: URLSearchParams;
  httpVersion: HttpVersion;
}

export interface HandshakeRequest extends RequestLine {
  headers: HttpHeaders;
  cookies: ReadonlyMap<string, string>;
  extensions: WebSocketExtension[];
}

const SCHEME_RE = /^[a-z][a-z\d+.-]*:/i;
const PLACEHOLDER_BASE = 'http://localhost';

function parseRelativeTarget(target: string): Pick<RequestLine, 'path' | 'query'> {
  if (target.length === 0 || SCHEME_RE.test(target)) {
    throw new HandshakeError('MalformedRequest', `request target is not a relative URI: ${target}`);
  }
  let parsed: URL;
  try {
    parsed = new URL(target, PLACEHOLDER_BASE);
  } catch {
    throw new HandshakeError('MalformedRequest', `request target is not a relative URI: ${target}`);
  }
  return { path: parsed.pathname, query: parsed.searchParams };
}

export function parseRequestLine(line: string | undefined): RequestLine {
  if (!line || line.trim().length === 0 || !line.startsWith('GET')) {
    throw new HandshakeError('MalformedRequest', 'not a GET request');
  }

  const parts = line.split(' ');
  if (parts.length !== 3 || parts[0] !== 'GET') {
    throw new HandshakeError('MalformedRequest', `malformed request line: ${line}`);
  }

  const [, uri, version] = parts;
  return {
    uri,
    ...parseRelativeTarget(uri),
    httpVersion: version.endsWith('1.1') ? '1.1' : '1.0'
  };
}

// The value starts two characters past the colon.
export function parseHeaderLine(line: string): [string, string] | null {
  const separator = line.indexOf(':');
  if (separator === -1) {
    return null;
  }
  return [line.slice(0, separator), line.slice(separator + 2)];
}

export function isWebSocketRequest(headers: HttpHeaders): boolean {
  const key = headers.get('Sec-WebSocket-Key');
  return (
    headers.has('Host') &&
    headers.get('Upgrade')?.toLowerCase() === 'websocket' &&
    headers.has('Connection') &&
    key !== undefined &&
    key.trim().length > 0 &&
    headers.get('Sec-WebSocket-Version') === '13'
  );
}

export function parseCookieHeader(header: string): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    if (!name || cookies.has(name)) {
      continue;
    }
    const rawValue = part.slice(separator + 1).trim();
    let value = rawValue;
    try {
      value = decodeURIComponent(rawValue);
    } catch {
      // keep the raw value when it is not valid percent-encoding
    }
    cookies.set(name, value);
  }
  return cookies;
}
