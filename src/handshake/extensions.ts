import { HandshakeError } from './errors.js';

export interface ExtensionOption {
  name: string;
  value?: string;
  // Listed bare by the client, not a chosen value.
  clientAvailable: boolean;
}

export interface WebSocketExtension {
  name: string;
  options: ExtensionOption[];
}

export interface ExtensionNegotiation<TContext = unknown> {
  response: WebSocketExtension;
  context: TContext;
}

export interface ExtensionHeaderParseOptions {
  minEntries?: number;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function parseOption(token: string, header: string): ExtensionOption {
  const parts = token.split('=');
  const name = parts[0].trim();
  if (name.length === 0 || parts.length > 2) {
    throw new HandshakeError('MalformedExtensionHeader', `cannot parse extension options [${header}]`);
  }
  if (parts.length === 1) {
    return { name, clientAvailable: true };
  }
  return { name, value: unquote(parts[1].trim()), clientAvailable: false };
}

export function parseExtensionsHeader(header: string, options: ExtensionHeaderParseOptions = {}): WebSocketExtension[] {
  const minEntries = Math.max(1, Math.floor(options.minEntries ?? 1));
  const entries = header.split(',');
  if (entries.length < minEntries) {
    throw new HandshakeError('MalformedExtensionHeader', `cannot parse extension [${header}]`);
  }

  return entries.map((entry) => {
    const [rawName, ...rawOptions] = entry.split(';');
    const name = rawName.trim();
    if (name.length === 0) {
      throw new HandshakeError('MalformedExtensionHeader', `cannot parse extension [${header}]`);
    }
    return {
      name,
      options: rawOptions.map((token) => parseOption(token, header))
    };
  });
}

function formatOption(option: ExtensionOption): string {
  return option.value === undefined ? option.name : `${option.name}=${option.value}`;
}

export function formatExtension(extension: WebSocketExtension): string {
  const selected = extension.options.filter((option) => !option.clientAvailable).map(formatOption);
  return [extension.name, ...selected].join(';');
}

export function formatExtensionsHeader(extensions: readonly WebSocketExtension[]): string {
  return extensions.map(formatExtension).join(',');
}
