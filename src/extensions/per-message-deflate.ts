import type { ExtensionNegotiation, ExtensionOption, WebSocketExtension } from '../handshake/extensions.js';
import type { HandshakeRequest } from '../handshake/request.js';
import type { ExtensionNegotiator } from './registry.js';

export const PER_MESSAGE_DEFLATE = 'permessage-deflate';

const MIN_WINDOW_BITS = 8;
const MAX_WINDOW_BITS = 15;

export interface PerMessageDeflateOptions {
  serverNoContextTakeover?: boolean;
  clientNoContextTakeover?: boolean;
  serverMaxWindowBits?: number;
  clientMaxWindowBits?: number;
  zlibLevel?: number;
  threshold?: number;
}

export interface PerMessageDeflateContext {
  serverNoContextTakeover: boolean;
  clientNoContextTakeover: boolean;
  serverMaxWindowBits: number;
  clientMaxWindowBits: number;
  zlibDeflateOptions: {
    level: number;
  };
  threshold: number;
}

interface DeflateOffer {
  serverNoContextTakeover: boolean;
  clientNoContextTakeover: boolean;
  serverMaxWindowBits?: number;
  // true when listed bare
  clientMaxWindowBits?: number | true;
}

export const DEFAULT_PER_MESSAGE_DEFLATE: Required<Pick<PerMessageDeflateOptions, 'zlibLevel' | 'threshold'>> = {
  zlibLevel: 1,
  threshold: 128
};

function clampInteger(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.floor(value)));
}

function parseWindowBits(value: string | undefined): number | null {
  if (value === undefined || !/^\d{1,2}$/.test(value)) {
    return null;
  }
  const bits = Number(value);
  return bits >= MIN_WINDOW_BITS && bits <= MAX_WINDOW_BITS ? bits : null;
}

function parseOffer(offer: WebSocketExtension): DeflateOffer | null {
  const parsed: DeflateOffer = { serverNoContextTakeover: false, clientNoContextTakeover: false };
  const seen = new Set<string>();

  for (const option of offer.options) {
    const name = option.name.toLowerCase();
    if (seen.has(name)) {
      return null;
    }
    seen.add(name);

    switch (name) {
      case 'server_no_context_takeover':
      case 'client_no_context_takeover':
        if (!option.clientAvailable) {
          return null;
        }
        if (name === 'server_no_context_takeover') {
          parsed.serverNoContextTakeover = true;
        } else {
          parsed.clientNoContextTakeover = true;
        }
        break;
      case 'server_max_window_bits': {
        const bits = parseWindowBits(option.value);
        if (bits === null) {
          return null;
        }
        parsed.serverMaxWindowBits = bits;
        break;
      }
      case 'client_max_window_bits': {
        if (option.clientAvailable) {
          parsed.clientMaxWindowBits = true;
          break;
        }
        const bits = parseWindowBits(option.value);
        if (bits === null) {
          return null;
        }
        parsed.clientMaxWindowBits = bits;
        break;
      }
      default:
        return null;
    }
  }

  return parsed;
}

function selected(name: string, value?: number): ExtensionOption {
  return value === undefined
    ? { name, clientAvailable: false }
    : { name, value: String(value), clientAvailable: false };
}

export class PerMessageDeflateNegotiator implements ExtensionNegotiator<PerMessageDeflateContext> {
  readonly name = PER_MESSAGE_DEFLATE;
  private readonly options: PerMessageDeflateOptions;

  constructor(options: PerMessageDeflateOptions = {}) {
    this.options = {
      ...options,
      serverMaxWindowBits:
        options.serverMaxWindowBits === undefined
          ? undefined
          : clampInteger(options.serverMaxWindowBits, MIN_WINDOW_BITS, MAX_WINDOW_BITS, MAX_WINDOW_BITS),
      clientMaxWindowBits:
        options.clientMaxWindowBits === undefined
          ? undefined
          : clampInteger(options.clientMaxWindowBits, MIN_WINDOW_BITS, MAX_WINDOW_BITS, MAX_WINDOW_BITS)
    };
  }

  tryNegotiate(request: HandshakeRequest): ExtensionNegotiation<PerMessageDeflateContext> | null {
    for (const extension of request.extensions) {
      if (extension.name.toLowerCase() !== PER_MESSAGE_DEFLATE) {
        continue;
      }
      const offer = parseOffer(extension);
      if (!offer) {
        continue;
      }
      const negotiation = this.accept(offer);
      if (negotiation) {
        return negotiation;
      }
    }
    return null;
  }

  private accept(offer: DeflateOffer): ExtensionNegotiation<PerMessageDeflateContext> | null {
    const configured = this.options;

    // The server cannot compress with a larger window than the client allows.
    if (
      configured.serverMaxWindowBits !== undefined &&
      offer.serverMaxWindowBits !== undefined &&
      configured.serverMaxWindowBits > offer.serverMaxWindowBits
    ) {
      return null;
    }
    if (configured.clientMaxWindowBits !== undefined && offer.clientMaxWindowBits === undefined) {
      return null;
    }

    const serverNoContextTakeover = configured.serverNoContextTakeover === true || offer.serverNoContextTakeover;
    const clientNoContextTakeover = configured.clientNoContextTakeover === true || offer.clientNoContextTakeover;
    const serverMaxWindowBits = configured.serverMaxWindowBits ?? offer.serverMaxWindowBits;

    let clientMaxWindowBits: number | undefined;
    if (typeof offer.clientMaxWindowBits === 'number') {
      clientMaxWindowBits = Math.min(configured.clientMaxWindowBits ?? MAX_WINDOW_BITS, offer.clientMaxWindowBits);
    } else if (offer.clientMaxWindowBits === true) {
      clientMaxWindowBits = configured.clientMaxWindowBits;
    }

    const options: ExtensionOption[] = [];
    if (serverNoContextTakeover) {
      options.push(selected('server_no_context_takeover'));
    }
    if (clientNoContextTakeover) {
      options.push(selected('client_no_context_takeover'));
    }
    if (serverMaxWindowBits !== undefined) {
      options.push(selected('server_max_window_bits', serverMaxWindowBits));
    }
    if (clientMaxWindowBits !== undefined) {
      options.push(selected('client_max_window_bits', clientMaxWindowBits));
    }

    return {
      response: { name: PER_MESSAGE_DEFLATE, options },
      context: {
        serverNoContextTakeover,
        clientNoContextTakeover,
        serverMaxWindowBits: serverMaxWindowBits ?? MAX_WINDOW_BITS,
        clientMaxWindowBits: clientMaxWindowBits ?? MAX_WINDOW_BITS,
        zlibDeflateOptions: {
          level: clampInteger(configured.zlibLevel, 0, 9, DEFAULT_PER_MESSAGE_DEFLATE.zlibLevel)
        },
        threshold: clampInteger(configured.threshold, 0, Number.MAX_SAFE_INTEGER, DEFAULT_PER_MESSAGE_DEFLATE.threshold)
      }
    };
  }
}
