import type { Duplex } from 'node:stream';
import { HandshakeError } from './errors.js';

export const DEFAULT_MAX_HEADER_BYTES = 16 * 1024;

const LF = 0x0a;

export interface HeaderBlockReadOptions {
  maxHeaderBytes?: number;
}

function decodeLine(bytes: Buffer): string {
  const text = bytes.toString('latin1');
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

function normalizeMaxHeaderBytes(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_MAX_HEADER_BYTES;
  }
  return Math.floor(value);
}

// Bytes past the blank line go back to the stream with `unshift`.
export function readHeaderBlock(stream: Duplex, options: HeaderBlockReadOptions = {}): Promise<string[]> {
  const maxHeaderBytes = normalizeMaxHeaderBytes(options.maxHeaderBytes);

  return new Promise((resolve, reject) => {
    const lines: string[] = [];
    let pending = Buffer.alloc(0);
    let consumed = 0;
    let settled = false;

    const cleanup = (): void => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('close', onClose);
      stream.off('error', onError);
    };

    const finish = (rest: Buffer): void => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      stream.pause();
      if (rest.length > 0) {
        stream.unshift(rest);
      }
      resolve(lines);
    };

    const fail = (error: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      stream.pause();
      reject(error);
    };

    const onData = (chunk: Buffer | string): void => {
      pending = Buffer.concat([pending, typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk]);

      let newline = pending.indexOf(LF);
      while (newline !== -1) {
        consumed += newline + 1;
        if (consumed > maxHeaderBytes) {
          failTooLarge();
          return;
        }
        const line = decodeLine(pending.subarray(0, newline));
        pending = pending.subarray(newline + 1);
        lines.push(line);
        if (line.trim().length === 0) {
          finish(pending);
          return;
        }
        newline = pending.indexOf(LF);
      }

      if (consumed + pending.length > maxHeaderBytes) {
        failTooLarge();
      }
    };

    const failTooLarge = (): void => {
      fail(new HandshakeError('MalformedRequest', `request header block exceeds ${maxHeaderBytes} bytes`));
    };

    const onEnd = (): void => {
      if (pending.length > 0) {
        lines.push(decodeLine(pending));
      }
      finish(Buffer.alloc(0));
    };

    const onClose = (): void => {
      if (stream.readableEnded) {
        onEnd();
        return;
      }
      fail(new HandshakeError('MalformedRequest', 'connection closed before the header block ended'));
    };

    const onError = (error: Error): void => {
      fail(error);
    };

    stream.on('data', onData);
    stream.once('end', onEnd);
    stream.once('close', onClose);
    stream.once('error', onError);
  });
}
