import { describe, expect, it } from 'vitest';
import { MemorySocket } from '../testing/memory-socket.js';
import { formatAcceptResponse, formatRejectResponse, writeResponse } from './response.js';

describe('formatRejectResponse', () => {
  it('is the status line followed by an empty line', () => {
    expect(formatRejectResponse()).toBe('HTTP/1.1 404 Bad Request\r\n\r\n');
  });
});

describe('formatAcceptResponse', () => {
  it('writes the mandatory headers in order', () => {
    expect(formatAcceptResponse({ acceptKey: 's3pPLMBiTxaQ9kYGzzhZRbK+xOo=', extensions: [] })).toBe(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        'Sec-WebSocket-Accept: s3pPLMBiTxaQ9kYGzzhZRbK+xOo=\r\n' +
        '\r\n'
    );
  });

  it('echoes the protocol and lists extensions', () => {
    const response = formatAcceptResponse({
      acceptKey: 'key=',
      protocol: 'chat, superchat',
      extensions: [
        { name: 'a', options: [] },
        { name: 'b', options: [{ name: 'mode', value: 'fast', clientAvailable: false }] }
      ]
    });

    expect(response.split('\r\n')).toEqual([
      'HTTP/1.1 101 Switching Protocols',
      'Upgrade: websocket',
      'Connection: Upgrade',
      'Sec-WebSocket-Accept: key=',
      'Sec-WebSocket-Protocol: chat, superchat',
      'Sec-WebSocket-Extensions: a,b;mode=fast',
      '',
      ''
    ]);
  });
});

describe('writeResponse', () => {
  it('leaves the stream open unless asked to close', async () => {
    const socket = new MemorySocket();

    await writeResponse(socket, 'HTTP/1.1 101 Switching Protocols\r\n\r\n', { close: false });

    expect(socket.written).toBe('HTTP/1.1 101 Switching Protocols\r\n\r\n');
    expect(socket.writableEnded).toBe(false);
  });

  it('ends the stream after a closing write', async () => {
    const socket = new MemorySocket();

    await writeResponse(socket, formatRejectResponse(), { close: true });

    expect(socket.written).toBe('HTTP/1.1 404 Bad Request\r\n\r\n');
    expect(socket.writableEnded).toBe(true);
  });
});
