import cors from '@fastify/cors';
import type { FastifyCorsOptions } from '@fastify/cors';
import helmet from '@fastify/helmet';
import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance, FastifyServerOptions } from 'fastify';
import { randomUUID } from 'crypto';
import type { IncomingMessage } from 'http';
import type { Registry } from 'prom-client';

import type { CartService } from './carts/cart-service';
import type { AppConfig } from './config';
import { registerErrorHandlers } from './http/error-handler';
import type { AppLogger } from './lib/logger';
import type { RedisClient } from './lib/redis';
import { createHttpMetrics } from './metrics/http';
import { createMetricsRegistry } from './metrics/registry';
import { LatencyRecorder } from './monitoring/latency-recorder';
import { registerMonitoringPlugin } from './monitoring/plugin';
import { RequestTimer } from './monitoring/request-timer';
import { RouteCache, RouteMatcher } from './monitoring/route-cache';
import { StaticRouteRegistry } from './monitoring/static-route-registry';
import { AutoResourceRegistry } from './resources/auto-resource-registry';
import type { ResourceMappings } from './resources/resource-mappings';
import { registerResourceRoutes } from './resources/routes';
import { registerCartRoutes } from './routes/carts';
import { registerHealthRoutes } from './routes/health';

export type BuildServerOptions = {
  config: AppConfig;
  redis: Pick<RedisClient, 'ping' | 'quit'>;
  cartService: CartService;
  resourceMappings: ResourceMappings;
  logger: AppLogger;
  metricsRegistry?: Registry;
};

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config, redis, cartService, resourceMappings, logger } = options;

  const metricsRegistry = options.metricsRegistry ?? createMetricsRegistry(config);
  const httpMetrics = createHttpMetrics(metricsRegistry);

  const serverOptions: FastifyServerOptions = {
    logger: logger as unknown as FastifyBaseLogger,
    genReqId: (req: IncomingMessage) => {
      const headerId = Array.isArray(req.headers['x-request-id'])
        ? req.headers['x-request-id'][0]
        : req.headers['x-request-id'];
      return headerId ?? randomUUID();
    },
  };

  const app = Fastify(serverOptions);

  const staticRoutes = new StaticRouteRegistry().attach(app);
  const routeCache = new RouteCache([
    staticRoutes,
    new AutoResourceRegistry(resourceMappings, config.resources.basePath),
  ]);

  registerMonitoringPlugin(app, {
    matcher: new RouteMatcher(routeCache, { errorPath: config.monitoring.errorPath }),
    recorder: new LatencyRecorder(httpMetrics, config.service.name),
    timer: new RequestTimer(),
  });

  await app.register(helmet, {
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await app.register(cors, {
    origin: createCorsOriginValidator(config),
    credentials: true,
  });

  await registerHealthRoutes(app, { config, redis, metricsRegistry });
  await registerCartRoutes(app, { cartService });
  await registerResourceRoutes(app, {
    mappings: resourceMappings,
    basePath: config.resources.basePath,
  });

  registerErrorHandlers(app);

  app.addHook('onClose', async () => {
    await redis.quit();
  });

  return app;
}

function createCorsOriginValidator(config: AppConfig) {
  const allowedOrigins = config.cors.origins;
  if (allowedOrigins.length === 0) {
    return false;
  }

  return ((origin, cb) => {
    if (!origin) {
      cb(null, true);
      return;
    }

    if (allowedOrigins.includes(origin)) {
      cb(null, true);
      return;
    }

    cb(new Error('Origin not allowed'), false);
  }) as FastifyCorsOptions['origin'];
}
