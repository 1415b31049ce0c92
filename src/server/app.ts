/**
 * Express application over a registry. Kept apart from server.ts so the route
 * table can be mounted without opening a port.
 */
import express, { type Express, type RequestHandler } from 'express';
import cookieParser from 'cookie-parser';
import { SERVER_CONFIG } from './config.js';
import type { Registry } from './ledger/registry.js';
import { loggerMiddleware } from './middleware/logger.js';
import { rateLimiter } from './middleware/rate-limit.js';
import { bigintReplacer, ledgerRoute, type LedgerRoute } from './handlers/http.js';
import { platformRoutes, type PlatformRouteOptions } from './handlers/platform.js';
import { projectRoutes } from './handlers/projects.js';

export interface AppOptions extends PlatformRouteOptions {
  limiter?: RequestHandler;
}

export function ledgerRoutes(registry: Registry, options: AppOptions = {}): LedgerRoute[] {
  return [...projectRoutes(registry), ...platformRoutes(registry, options)];
}

/** Mutating routes sit behind the limiter; reads do not */
export function routeHandlers(route: LedgerRoute, limiter: RequestHandler): RequestHandler[] {
  return route.mutates ? [limiter, ledgerRoute(route)] : [ledgerRoute(route)];
}

export function createApp(registry: Registry, options: AppOptions = {}): Express {
  const app = express();
  app.set('json replacer', bigintReplacer);
  app.use(express.json({ limit: SERVER_CONFIG.jsonBodyLimit }));
  app.use(cookieParser());
  app.use(loggerMiddleware);

  const limiter = options.limiter ?? rateLimiter;
  for (const route of ledgerRoutes(registry, options)) {
    const handlers = routeHandlers(route, limiter);
    switch (route.method) {
      case 'get':
        app.get(route.path, ...handlers);
        break;
      case 'post':
        app.post(route.path, ...handlers);
        break;
      case 'delete':
        app.delete(route.path, ...handlers);
        break;
    }
  }

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'NotFound', message: 'Unknown endpoint' });
  });

  return app;
}
