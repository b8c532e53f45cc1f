import { createHash } from 'node:crypto';

export const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

export function computeAcceptKey(key: string): string {
  return createHash('sha1').update(`${key}${WEBSOCKET_GUID}`, 'utf8').digest('base64');
}
