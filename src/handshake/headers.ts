import { HandshakeError } from './errors.js';

interface HeaderEntry {
  name: string;
  value: string;
}

// Case-insensitive keys; iteration keeps insertion order and the client's spelling.
export class HttpHeaders {
  private readonly entriesByKey = new Map<string, HeaderEntry>();

  get size(): number {
    return this.entriesByKey.size;
  }

  add(name: string, value: string): void {
    const key = name.toLowerCase();
    if (this.entriesByKey.has(key)) {
      throw new HandshakeError('DuplicateHeader', `duplicate header: ${name}`);
    }
    this.entriesByKey.set(key, { name, value });
  }

  has(name: string): boolean {
    return this.entriesByKey.has(name.toLowerCase());
  }

  get(name: string): string | undefined {
    return this.entriesByKey.get(name.toLowerCase())?.value;
  }

  *entries(): IterableIterator<[string, string]> {
    for (const entry of this.entriesByKey.values()) {
      yield [entry.name, entry.value];
    }
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = Object.create(null);
    for (const [name, value] of this.entries()) {
      record[name] = value;
    }
    return record;
  }
}
