import type { FastifyInstance, RouteOptions } from 'fastify';

import { RoutePattern } from './route-pattern';
import type { RouteRegistrySource } from './route-registry-source';

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Generic dispatch route of the resource layer; its patterns come from ResourceMappings. */
    resourceDispatch?: boolean;
    /** Set to false to keep a route out of latency attribution. */
    monitoring?: boolean;
  }
}

export type DeclaredRoute = Pick<RouteOptions, 'method' | 'url' | 'config'>;

/**
 * Routes declared explicitly on the Fastify instance. Must be attached before
 * the first route is registered; Fastify announces each one through `onRoute`.
 */
export class StaticRouteRegistry implements RouteRegistrySource {
  readonly name = 'static';

  private readonly routes = new Map<string, Set<string>>();

  attach(app: FastifyInstance): this {
    app.addHook('onRoute', (route) => {
      this.record(route);
    });

    return this;
  }

  record(route: DeclaredRoute) {
    if (route.config?.resourceDispatch || route.config?.monitoring === false) {
      return;
    }

    const methods = Array.isArray(route.method) ? route.method : [route.method];
    const known = this.routes.get(route.url) ?? new Set<string>();
    for (const method of methods) {
      known.add(method.toUpperCase());
    }
    this.routes.set(route.url, known);
  }

  async listRoutePatterns(): Promise<readonly RoutePattern[]> {
    return [...this.routes].map(([url, methods]) => RoutePattern.fromRouteUrl(methods, url));
  }
}
