export { loadConfig, type GatewayConfig } from './config.js';
export {
  DEFAULT_PER_MESSAGE_DEFLATE,
  PER_MESSAGE_DEFLATE,
  PerMessageDeflateNegotiator,
  type PerMessageDeflateContext,
  type PerMessageDeflateOptions
} from './extensions/per-message-deflate.js';
export { ExtensionRegistry, RegistryConfigError, type ExtensionNegotiator } from './extensions/registry.js';
export { WEBSOCKET_GUID, computeAcceptKey } from './handshake/accept-key.js';
export { HandshakeError, describeError, isHandshakeError, type HandshakeErrorCode } from './handshake/errors.js';
export {
  formatExtension,
  formatExtensionsHeader,
  parseExtensionsHeader,
  type ExtensionNegotiation,
  type ExtensionOption,
  type WebSocketExtension
} from './handshake/extensions.js';
export {
  Handshaker,
  type HandshakeState,
  type HandshakerOptions,
  type NegotiationOutcome
} from './handshake/handshaker.js';
export { HttpHeaders } from './handshake/headers.js';
export { DEFAULT_MAX_HEADER_BYTES, readHeaderBlock } from './handshake/line-reader.js';
export {
  isWebSocketRequest,
  parseCookieHeader,
  parseHeaderLine,
  parseRequestLine,
  type HandshakeRequest,
  type HttpVersion,
  type RequestLine
} from './handshake/request.js';
export {
  ACCEPT_STATUS_LINE,
  REJECT_STATUS_LINE,
  formatAcceptResponse,
  formatRejectResponse,
  writeResponse
} from './handshake/response.js';
export { HandshakeListener, type AcceptedOutcome, type HandshakeSocket } from './listener.js';
export { MetricsRegistry, type HandshakeCounters, type HandshakeFailureReason } from './metrics.js';
export { createAdminApp, registerAdminRoutes } from './routes/admin.js';
