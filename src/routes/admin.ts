import express, { type Application, type Request, type Response } from 'express';
import type { ExtensionRegistry } from '../extensions/registry.js';
import type { MetricsRegistry } from '../metrics.js';

interface AdminRouteDeps {
  metrics: MetricsRegistry;
  registry: ExtensionRegistry;
}

export function registerAdminRoutes(app: Application, deps: AdminRouteDeps): void {
  app.get('/healthz', (_req: Request, res: Response) => {
    res.setHeader('Cache-Control', 'no-store');
    res.json({
      ok: true,
      extensions: deps.registry.names,
      ...deps.metrics.getHealthSnapshot()
    });
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.setHeader('Cache-Control', 'no-store');
    res.send(deps.metrics.renderPrometheus());
  });
}

export function createAdminApp(deps: AdminRouteDeps): Application {
  const app = express();
  app.disable('x-powered-by');
  registerAdminRoutes(app, deps);
  return app;
}
