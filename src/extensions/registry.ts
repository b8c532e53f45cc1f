import type { ExtensionNegotiation } from '../handshake/extensions.js';
import type { HandshakeRequest } from '../handshake/request.js';

// `tryNegotiate` returns null to decline.
export interface ExtensionNegotiator<TContext = unknown> {
  readonly name: string;
  tryNegotiate(request: HandshakeRequest): ExtensionNegotiation<TContext> | null;
}

export class RegistryConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryConfigError';
  }
}

export class ExtensionRegistry {
  private readonly byName: ReadonlyMap<string, ExtensionNegotiator>;

  constructor(negotiators: Iterable<ExtensionNegotiator> = []) {
    const byName = new Map<string, ExtensionNegotiator>();
    for (const negotiator of negotiators) {
      const key = negotiator.name.trim().toLowerCase();
      if (!key) {
        throw new RegistryConfigError('extension name must not be empty');
      }
      if (byName.has(key)) {
        throw new RegistryConfigError(`extension registered twice: ${negotiator.name}`);
      }
      byName.set(key, negotiator);
    }
    this.byName = byName;
  }

  get size(): number {
    return this.byName.size;
  }

  get names(): string[] {
    return [...this.byName.values()].map((negotiator) => negotiator.name);
  }

  find(name: string): ExtensionNegotiator | undefined {
    return this.byName.get(name.toLowerCase());
  }
}
