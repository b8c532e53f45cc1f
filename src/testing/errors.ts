import { isHandshakeError } from '../handshake/errors.js';

function codeOf(error: unknown): string {
  if (isHandshakeError(error)) {
    return error.code;
  }
  return error instanceof Error ? error.name : 'unknown';
}

export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    return codeOf(error);
  }
  return 'none';
}

export async function rejectedCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    return codeOf(error);
  }
  return 'none';
}
