import type { Duplex } from 'node:stream';
import { formatExtensionsHeader, type WebSocketExtension } from './extensions.js';

const CRLF = '\r\n';

export const REJECT_STATUS_LINE = 'HTTP/1.1 404 Bad Request';
export const ACCEPT_STATUS_LINE = 'HTTP/1.1 101 Switching Protocols';

export interface AcceptResponseParts {
  acceptKey: string;
  protocol?: string;
  extensions: readonly WebSocketExtension[];
}

export function formatRejectResponse(): string {
  return `${REJECT_STATUS_LINE}${CRLF}${CRLF}`;
}

export function formatAcceptResponse(parts: AcceptResponseParts): string {
  const lines = [
    ACCEPT_STATUS_LINE,
    'Upgrade: websocket',
    'Connection: Upgrade',
    `Sec-WebSocket-Accept: ${parts.acceptKey}`
  ];
  if (parts.protocol !== undefined) {
    lines.push(`Sec-WebSocket-Protocol: ${parts.protocol}`);
  }
  if (parts.extensions.length > 0) {
    lines.push(`Sec-WebSocket-Extensions: ${formatExtensionsHeader(parts.extensions)}`);
  }
  return `${lines.join(CRLF)}${CRLF}${CRLF}`;
}

export interface WriteResponseOptions {
  close: boolean;
}

export function writeResponse(stream: Duplex, text: string, options: WriteResponseOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, 'ascii', (error) => {
      if (error) {
        reject(error);
        return;
      }
      if (options.close) {
        stream.end();
      }
      resolve();
    });
  });
}
