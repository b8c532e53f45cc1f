import 'dotenv/config';
import http from 'node:http';
import { loadConfig } from './config.js';
import { PerMessageDeflateNegotiator } from './extensions/per-message-deflate.js';
import { ExtensionRegistry, type ExtensionNegotiator } from './extensions/registry.js';
import { HandshakeListener } from './listener.js';
import { MetricsRegistry } from './metrics.js';
import { createAdminApp } from './routes/admin.js';

const config = loadConfig();
const metrics = new MetricsRegistry();

const negotiators: ExtensionNegotiator[] = [];
if (config.perMessageDeflate.enabled) {
  negotiators.push(
    new PerMessageDeflateNegotiator({
      zlibLevel: config.perMessageDeflate.zlibLevel,
      threshold: config.perMessageDeflate.threshold
    })
  );
}
const registry = new ExtensionRegistry(negotiators);

const listener = new HandshakeListener({
  registry,
  metrics,
  handshakeTimeoutMs: config.handshakeTimeoutMs,
  handshaker: {
    maxHeaderBytes: config.maxHeaderBytes,
    minExtensionEntries: config.minExtensionEntries
  }
});

const adminServer = config.adminPort === null ? null : http.createServer(createAdminApp({ metrics, registry }));

function shutdown(): void {
  console.log('[wsgate] shutting down');
  adminServer?.close();
  listener.close().then(
    () => {
      metrics.dispose();
      process.exit(0);
    },
    (error: Error) => {
      console.warn(`[wsgate] listener: close failed (${error.message})`);
      process.exit(1);
    }
  );
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

listener.listen(config.port, config.host).then(
  (address) => {
    console.log(`[wsgate] listening on ${address.address}:${address.port}`);
    console.log(`[wsgate] extensions: ${registry.names.join(', ') || 'none'}`);
  },
  (error: Error) => {
    console.warn(`[wsgate] listener: failed to bind ${config.host}:${config.port} (${error.message})`);
    process.exit(1);
  }
);

if (adminServer && config.adminPort !== null) {
  const adminPort = config.adminPort;
  adminServer.listen(adminPort, config.host, () => {
    console.log(`[wsgate] admin: http://${config.host}:${adminPort}/healthz`);
  });
}
