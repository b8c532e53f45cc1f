export type HandshakeErrorCode = 'MalformedRequest' | 'MalformedExtensionHeader' | 'DuplicateHeader';

export class HandshakeError extends Error {
  readonly code: HandshakeErrorCode;

  constructor(code: HandshakeErrorCode, message: string) {
    super(message);
    this.name = 'HandshakeError';
    this.code = code;
  }
}

export function isHandshakeError(value: unknown): value is HandshakeError {
  return value instanceof HandshakeError;
}

export function describeError(error: unknown): string {
  if (isHandshakeError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
