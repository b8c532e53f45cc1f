import type { Duplex } from 'node:stream';
import type { ExtensionRegistry } from '../extensions/registry.js';
import { computeAcceptKey } from './accept-key.js';
import { describeError } from './errors.js';
import { parseExtensionsHeader, type WebSocketExtension } from './extensions.js';
import { HttpHeaders } from './headers.js';
import { readHeaderBlock } from './line-reader.js';
import {
  isWebSocketRequest,
  parseCookieHeader,
  parseHeaderLine,
  parseRequestLine,
  type HandshakeRequest
} from './request.js';
import { formatAcceptResponse, formatRejectResponse, writeResponse } from './response.js';

export type HandshakeState =
  | 'idle'
  | 'request-read'
  | 'validated'
  | 'extensions-negotiated'
  | 'response-sent'
  | 'accepted'
  | 'rejected'
  | 'failed';

export type NegotiationOutcome =
  | {
      status: 'accepted';
      request: HandshakeRequest;
      // In the order the client requested the extensions.
      contexts: unknown[];
      extensions: WebSocketExtension[];
    }
  | { status: 'rejected' };

export interface HandshakerOptions {
  maxHeaderBytes?: number;
  minExtensionEntries?: number;
}

export class Handshaker {
  private readonly transitions: HandshakeState[] = ['idle'];

  constructor(
    private readonly registry: ExtensionRegistry,
    private readonly options: HandshakerOptions = {}
  ) {}

  get state(): HandshakeState {
    return this.transitions[this.transitions.length - 1];
  }

  get history(): readonly HandshakeState[] {
    return this.transitions;
  }

  async negotiate(stream: Duplex): Promise<NegotiationOutcome> {
    if (this.state !== 'idle') {
      throw new Error(`handshaker already used (state: ${this.state})`);
    }

    try {
      const request = await this.readRequest(stream);
      this.transition('request-read');

      const upgrade = isWebSocketRequest(request.headers);
      this.transition('validated');

      if (!upgrade) {
        await writeResponse(stream, formatRejectResponse(), { close: true });
        this.transition('response-sent');
        this.transition('rejected');
        return { status: 'rejected' };
      }

      const { contexts, extensions } = this.selectExtensions(request);
      this.transition('extensions-negotiated');

      const response = formatAcceptResponse({
        acceptKey: computeAcceptKey(request.headers.get('Sec-WebSocket-Key') ?? ''),
        protocol: request.headers.get('Sec-WebSocket-Protocol'),
        extensions
      });
      await writeResponse(stream, response, { close: false });
      this.transition('response-sent');
      this.transition('accepted');
      return { status: 'accepted', request, contexts, extensions };
    } catch (error) {
      this.transition('failed');
      throw error;
    }
  }

  private transition(next: HandshakeState): void {
    this.transitions.push(next);
  }

  private async readRequest(stream: Duplex): Promise<HandshakeRequest> {
    const [requestLine, ...headerLines] = await readHeaderBlock(stream, {
      maxHeaderBytes: this.options.maxHeaderBytes
    });
    const line = parseRequestLine(requestLine);

    const headers = new HttpHeaders();
    for (const headerLine of headerLines) {
      const header = parseHeaderLine(headerLine);
      if (header) {
        headers.add(header[0], header[1]);
      }
    }

    const cookieHeader = headers.get('Cookie');
    const extensionsHeader = headers.get('Sec-WebSocket-Extensions');
    return {
      ...line,
      headers,
      cookies: cookieHeader === undefined ? new Map() : parseCookieHeader(cookieHeader),
      extensions:
        extensionsHeader === undefined
          ? []
          : parseExtensionsHeader(extensionsHeader, { minEntries: this.options.minExtensionEntries })
    };
  }

  private selectExtensions(request: HandshakeRequest): { contexts: unknown[]; extensions: WebSocketExtension[] } {
    const contexts: unknown[] = [];
    const extensions: WebSocketExtension[] = [];
    const attempted = new Set<string>();

    for (const requested of request.extensions) {
      const negotiator = this.registry.find(requested.name);
      // Repeated offers of one extension are alternatives; the negotiator sees all of them at once.
      // Each negotiator is asked once per request, not once per requested entry.
      if (!negotiator || attempted.has(negotiator.name.toLowerCase())) {
        continue;
      }
      attempted.add(negotiator.name.toLowerCase());
      try {
        const negotiation = negotiator.tryNegotiate(request);
        if (negotiation) {
          contexts.push(negotiation.context);
          extensions.push(negotiation.response);
        }
      } catch (error) {
        console.warn(`[wsgate] handshake: extension ${negotiator.name} dropped (${describeError(error)})`);
      }
    }

    return { contexts, extensions };
  }
}
