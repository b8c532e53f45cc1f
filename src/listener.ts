import net, { type AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import type { ExtensionRegistry } from './extensions/registry.js';
import { describeError, isHandshakeError } from './handshake/errors.js';
import { Handshaker, type HandshakerOptions, type NegotiationOutcome } from './handshake/handshaker.js';
import type { MetricsRegistry } from './metrics.js';

export interface HandshakeSocket extends Duplex {
  readonly remoteAddress?: string;
  setTimeout(timeout: number, callback?: () => void): unknown;
}

export type AcceptedOutcome = Extract<NegotiationOutcome, { status: 'accepted' }>;

type AcceptedListener = (socket: HandshakeSocket, outcome: AcceptedOutcome) => void;

export interface HandshakeListenerDeps {
  registry: ExtensionRegistry;
  metrics: MetricsRegistry;
  handshakeTimeoutMs: number;
  handshaker?: HandshakerOptions;
}

export class HandshakeListener {
  private readonly server: net.Server;
  private readonly acceptedListeners = new Set<AcceptedListener>();

  constructor(private readonly deps: HandshakeListenerDeps) {
    this.server = net.createServer((socket) => {
      void this.handleConnection(socket);
    });
    this.server.on('error', (error) => {
      console.warn(`[wsgate] listener: server error (${error.message})`);
    });
  }

  onAccepted(listener: AcceptedListener): () => void {
    this.acceptedListeners.add(listener);
    return () => {
      this.acceptedListeners.delete(listener);
    };
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('listener is not bound to a TCP address'));
          return;
        }
        resolve(address);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  // Never rejects: failed handshakes resolve to null after the socket is destroyed.
  async handleConnection(socket: HandshakeSocket): Promise<NegotiationOutcome | null> {
    const { metrics } = this.deps;
    const remote = socket.remoteAddress ?? 'unknown';
    const handshaker = new Handshaker(this.deps.registry, this.deps.handshaker);
    let timedOut = false;

    socket.on('error', (error: Error) => {
      console.log(`[wsgate] connection: ${remote} error (${error.message})`);
    });

    metrics.handshakeStarted();
    socket.setTimeout(this.deps.handshakeTimeoutMs, () => {
      timedOut = true;
      metrics.handshakeFailed('Timeout');
      console.log(`[wsgate] handshake: timeout waiting for ${remote}`);
      socket.destroy();
    });

    let outcome: NegotiationOutcome;
    try {
      outcome = await handshaker.negotiate(socket);
    } catch (error) {
      socket.setTimeout(0);
      if (!timedOut) {
        metrics.handshakeFailed(isHandshakeError(error) ? error.code : 'Internal');
        console.log(`[wsgate] handshake: failed for ${remote} (${describeError(error)})`);
        socket.destroy();
      }
      return null;
    }
    socket.setTimeout(0);

    if (outcome.status === 'rejected') {
      metrics.handshakeRejected();
      console.log(`[wsgate] handshake: rejected non-websocket request from ${remote}`);
      return outcome;
    }

    const extensionNames = outcome.extensions.map((extension) => extension.name);
    metrics.handshakeAccepted(extensionNames);
    console.log(
      `[wsgate] handshake: accepted ${outcome.request.uri} from ${remote}` +
        (extensionNames.length > 0 ? ` [${extensionNames.join(', ')}]` : '')
    );

    if (this.acceptedListeners.size === 0) {
      console.log('[wsgate] handshake: no framing layer attached, closing connection');
      socket.end();
      return outcome;
    }
    for (const listener of this.acceptedListeners) {
      try {
        listener(socket, outcome);
      } catch (error) {
        console.warn(`[wsgate] handshake: subscriber failed (${describeError(error)})`);
        socket.destroy();
        break;
      }
    }
    return outcome;
  }
}
