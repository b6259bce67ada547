import { describe, expect, it, vi } from 'vitest';

import { RouteCache, RouteMatcher, stripQueryString } from '../route-cache';
import { RoutePattern } from '../route-pattern';
import type { RouteRegistrySource } from '../route-registry-source';

function sourceOf(name: string, patterns: RoutePattern[]) {
  const listRoutePatterns = vi.fn(async () => {
    await new Promise((resolve) => setTimeout(resolve, 5));
    return patterns;
  });
  const source: RouteRegistrySource = { name, listRoutePatterns };
  return { source, listRoutePatterns };
}

const cartsById = RoutePattern.fromRouteUrl(['GET'], '/carts/:id');
const cartItems = RoutePattern.fromRouteUrl(['GET', 'POST'], '/carts/:id/items');
const errorRoute = RoutePattern.fromRouteUrl(['GET'], '/error');

describe('RouteCache', () => {
  it('queries every source once under concurrent first access', async () => {
    const first = sourceOf('static', [cartsById]);
    const second = sourceOf('resources', [cartItems]);
    const cache = new RouteCache([first.source, second.source]);
    const matcher = new RouteMatcher(cache, { errorPath: '/error' });

    const results = await Promise.all(
      Array.from({ length: 25 }, () => matcher.resolve('GET', '/carts/42')),
    );

    expect(first.listRoutePatterns).toHaveBeenCalledTimes(1);
    expect(second.listRoutePatterns).toHaveBeenCalledTimes(1);
    expect(new Set(results)).toEqual(new Set(['/carts/{id}']));
    expect(cache.isBuilt).toBe(true);
  });

  it('hands out the same frozen entries once built', async () => {
    const { source, listRoutePatterns } = sourceOf('static', [cartsById]);
    const cache = new RouteCache([source]);

    const built = await cache.getEntries();
    const again = await cache.getEntries();

    expect(again).toBe(built);
    expect(Object.isFrozen(built)).toBe(true);
    expect(listRoutePatterns).toHaveBeenCalledTimes(1);
  });

  it('does not publish anything before every source answered', async () => {
    let release: (patterns: RoutePattern[]) => void = () => {};
    const slow: RouteRegistrySource = {
      name: 'resources',
      listRoutePatterns: () =>
        new Promise<RoutePattern[]>((resolve) => {
          release = resolve;
        }),
    };
    const cache = new RouteCache([sourceOf('static', [cartsById]).source, slow]);

    const pending = cache.getEntries();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(cache.isBuilt).toBe(false);

    release([cartItems]);
    const entries = await pending;

    expect(entries.map((entry) => entry.pattern)).toEqual(['/carts/{id}', '/carts/{id}/items']);
    expect(cache.isBuilt).toBe(true);
  });

  it('collapses patterns declared by both sources into one entry', async () => {
    const fromStatic = RoutePattern.fromRouteUrl(['GET'], '/carts/:id');
    const fromResources = RoutePattern.fromRouteUrl(['GET', 'DELETE'], '/carts/:id');
    const cache = new RouteCache([
      sourceOf('static', [fromStatic]).source,
      sourceOf('resources', [fromResources, cartItems]).source,
    ]);

    const entries = await cache.getEntries();

    expect(entries.map((entry) => entry.pattern)).toEqual(['/carts/{id}', '/carts/{id}/items']);
    expect(entries[0]?.matches('DELETE', '/carts/7')).toBe(true);
  });

  it('forgets a failed build and retries on the next call', async () => {
    const listRoutePatterns = vi
      .fn<[], Promise<readonly RoutePattern[]>>()
      .mockRejectedValueOnce(new Error('registry unavailable'))
      .mockResolvedValueOnce([cartsById]);
    const cache = new RouteCache([{ name: 'resources', listRoutePatterns }]);

    await expect(cache.getEntries()).rejects.toThrow('registry unavailable');
    expect(cache.isBuilt).toBe(false);

    const entries = await cache.getEntries();

    expect(entries.map((entry) => entry.pattern)).toEqual(['/carts/{id}']);
    expect(listRoutePatterns).toHaveBeenCalledTimes(2);
  });

  it('rejects every caller waiting on a failed build', async () => {
    const listRoutePatterns = vi.fn(async (): Promise<readonly RoutePattern[]> => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      throw new Error('registry unavailable');
    });
    const cache = new RouteCache([{ name: 'resources', listRoutePatterns }]);

    const outcomes = await Promise.allSettled([cache.getEntries(), cache.getEntries()]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['rejected', 'rejected']);
    expect(listRoutePatterns).toHaveBeenCalledTimes(1);
  });
});

describe('RouteMatcher', () => {
  function matcherFor(patterns: RoutePattern[]) {
    const { source, listRoutePatterns } = sourceOf('static', patterns);
    return {
      matcher: new RouteMatcher(new RouteCache([source]), { errorPath: '/error' }),
      listRoutePatterns,
    };
  }

  it('returns the pattern, not the raw path', async () => {
    const { matcher } = matcherFor([cartsById, cartItems]);

    await expect(matcher.resolve('GET', '/carts/42/items')).resolves.toBe('/carts/{id}/items');
  });

  it('ignores the query string', async () => {
    const { matcher } = matcherFor([cartsById]);

    await expect(matcher.resolve('GET', '/carts/42?expand=items')).resolves.toBe('/carts/{id}');
  });

  it('returns an empty string when nothing matches', async () => {
    const { matcher } = matcherFor([cartsById]);

    await expect(matcher.resolve('GET', '/orders/42')).resolves.toBe('');
    await expect(matcher.resolve('PUT', '/carts/42')).resolves.toBe('');
  });

  it('never attributes the error path, even when a pattern matches it', async () => {
    const { matcher, listRoutePatterns } = matcherFor([errorRoute, cartsById]);

    await expect(matcher.resolve('GET', '/error')).resolves.toBe('');
    await expect(matcher.resolve('GET', '/error?status=500')).resolves.toBe('');
    expect(listRoutePatterns).not.toHaveBeenCalled();
  });

  it('lets the first matching entry win', async () => {
    const broad = RoutePattern.fromRouteUrl(['GET'], '/:resource/:id');
    const { matcher } = matcherFor([broad, cartsById]);

    await expect(matcher.resolve('GET', '/carts/42')).resolves.toBe('/{resource}/{id}');
  });

  it('resolves the same request to the same pattern every time', async () => {
    const { matcher } = matcherFor([cartsById, cartItems]);

    const first = await matcher.resolve('GET', '/carts/42');
    const repeated = await Promise.all([1, 2, 3].map(() => matcher.resolve('GET', '/carts/42')));

    expect(repeated).toEqual([first, first, first]);
  });
});

describe('stripQueryString', () => {
  it('keeps the path only', () => {
    expect(stripQueryString('/carts/1?sessionId=abc')).toBe('/carts/1');
    expect(stripQueryString('/carts/1')).toBe('/carts/1');
  });
});
