import type { RoutePattern } from './route-pattern';

/** Anything able to list the route patterns a request may have matched. */
export interface RouteRegistrySource {
  readonly name: string;
  listRoutePatterns(): Promise<readonly RoutePattern[]>;
}
