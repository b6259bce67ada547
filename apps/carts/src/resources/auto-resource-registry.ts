import { RoutePattern } from '../monitoring/route-pattern';
import type { RouteRegistrySource } from '../monitoring/route-registry-source';
import type { ResourceMappings } from './resource-mappings';

export const COLLECTION_METHODS = ['GET', 'POST'] as const;
export const ITEM_METHODS = ['GET', 'PUT', 'PATCH', 'DELETE'] as const;

/**
 * Routes generated for exposed repositories. They are served by the generic
 * dispatch routes, so Fastify never announces them individually.
 */
export class AutoResourceRegistry implements RouteRegistrySource {
  readonly name = 'resources';

  constructor(
    private readonly mappings: ResourceMappings,
    private readonly basePath: string,
  ) {}

  async listRoutePatterns(): Promise<readonly RoutePattern[]> {
    this.mappings.initialize();

    return this.mappings.list().flatMap((resource) => {
      const collection = `${this.basePath}/${resource.path}`;
      return [
        RoutePattern.fromRouteUrl(COLLECTION_METHODS, collection),
        RoutePattern.fromRouteUrl(ITEM_METHODS, `${collection}/:id`),
      ];
    });
  }
}
