import type { RoutePattern } from './route-pattern';
import type { RouteRegistrySource } from './route-registry-source';

/**
 * Every route pattern the service answers, gathered once from all registry
 * sources and never rebuilt.
 *
 * The first caller starts the build and every caller arriving meanwhile
 * awaits the same promise, so the sources are queried once however many
 * requests race on an empty cache. Entries are published only after every
 * source answered. A failed build is not remembered: the pending promise is
 * dropped and the next caller starts over.
 */
export class RouteCache {
  private entries: readonly RoutePattern[] | null = null;
  private pending: Promise<readonly RoutePattern[]> | null = null;

  constructor(private readonly sources: readonly RouteRegistrySource[]) {}

  get isBuilt(): boolean {
    return this.entries !== null;
  }

  getEntries(): Promise<readonly RoutePattern[]> {
    if (this.entries) {
      return Promise.resolve(this.entries);
    }

    if (!this.pending) {
      this.pending = this.build().finally(() => {
        this.pending = null;
      });
    }

    return this.pending;
  }

  private async build(): Promise<readonly RoutePattern[]> {
    const byPattern = new Map<string, RoutePattern>();

    for (const source of this.sources) {
      const patterns = await source.listRoutePatterns();
      for (const pattern of patterns) {
        const existing = byPattern.get(pattern.pattern);
        byPattern.set(pattern.pattern, existing ? existing.merge(pattern) : pattern);
      }
    }

    const entries = Object.freeze([...byPattern.values()]);
    this.entries = entries;
    return entries;
  }
}

export type RouteMatcherOptions = {
  /** Requests on this path are never attributed to a route. */
  errorPath: string;
};

export function stripQueryString(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}

export class RouteMatcher {
  constructor(
    private readonly cache: RouteCache,
    private readonly options: RouteMatcherOptions,
  ) {}

  /**
   * Pattern of the first cached route matching the request, or `''`.
   * Overlapping patterns resolve in cache order; there is no specificity
   * ranking.
   */
  async resolve(method: string, url: string): Promise<string> {
    const path = stripQueryString(url);
    if (path === this.options.errorPath) {
      return '';
    }

    const entries = await this.cache.getEntries();
    const match = entries.find((entry) => entry.matches(method, path));
    return match?.pattern ?? '';
  }
}
