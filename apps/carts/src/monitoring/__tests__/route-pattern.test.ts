import { describe, expect, it } from 'vitest';

import { compileRouteUrl, RoutePattern } from '../route-pattern';

describe('RoutePattern', () => {
  it('labels parameter segments in template form', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/carts/:customerId/items/:itemId');

    expect(pattern.pattern).toBe('/carts/{customerId}/items/{itemId}');
  });

  it('matches one concrete segment per parameter', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/carts/:id');

    expect(pattern.matches('GET', '/carts/42')).toBe(true);
    expect(pattern.matches('GET', '/carts')).toBe(false);
    expect(pattern.matches('GET', '/carts/')).toBe(false);
    expect(pattern.matches('GET', '/carts/42/items')).toBe(false);
  });

  it('only matches its own methods, ignoring case', () => {
    const pattern = RoutePattern.fromRouteUrl(['get', 'DELETE'], '/carts/:id');

    expect([...pattern.methods]).toEqual(['GET', 'DELETE']);
    expect(pattern.matches('get', '/carts/42')).toBe(true);
    expect(pattern.matches('DELETE', '/carts/42')).toBe(true);
    expect(pattern.matches('POST', '/carts/42')).toBe(false);
  });

  it('treats literal characters literally', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/v1.0/carts');

    expect(pattern.matches('GET', '/v1.0/carts')).toBe(true);
    expect(pattern.matches('GET', '/v1x0/carts')).toBe(false);
  });

  it('supports several parameters inside one segment', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/files/:name.:ext');

    expect(pattern.pattern).toBe('/files/{name}.{ext}');
    expect(pattern.matches('GET', '/files/report.pdf')).toBe(true);
    expect(pattern.matches('GET', '/files/report')).toBe(false);
  });

  it('maps a trailing wildcard to the rest of the path', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/static/*');

    expect(pattern.pattern).toBe('/static/{*}');
    expect(pattern.matches('GET', '/static/css/app.css')).toBe(true);
    expect(pattern.matches('GET', '/assets/app.css')).toBe(false);
  });

  it('keeps parameter constraints out of the label but in the match', () => {
    const pattern = RoutePattern.fromRouteUrl(['GET'], '/items/:id(^\\d+)');

    expect(pattern.pattern).toBe('/items/{id}');
    expect(pattern.matches('GET', '/items/42')).toBe(true);
    expect(pattern.matches('GET', '/items/abc')).toBe(false);
    expect(pattern.matches('GET', '/items/42abc')).toBe(false);
  });

  it('compiles anchored and nested constraints as one group', () => {
    const compiled = compileRouteUrl('/orders/:year(^\\d{4}$)-:code(^(ab|cd)$)');

    expect(compiled.template).toBe('/orders/{year}-{code}');
    expect(compiled.expression.source).toBe('^\\/orders\\/(?:\\d{4})-(?:(ab|cd))$');
    expect(compiled.expression.test('/orders/2024-cd')).toBe(true);
    expect(compiled.expression.test('/orders/2024-ef')).toBe(false);
  });

  it('rejects an unbalanced constraint', () => {
    expect(() => compileRouteUrl('/items/:id(^\\d+')).toThrow(
      'Unbalanced parameter constraint in route segment :id(^\\d+',
    );
  });

  it('merges method sets of the same template', () => {
    const get = RoutePattern.fromRouteUrl(['GET'], '/carts/:id');
    const remove = RoutePattern.fromRouteUrl(['DELETE'], '/carts/:id');

    const merged = get.merge(remove);

    expect(merged.pattern).toBe('/carts/{id}');
    expect(merged.matches('GET', '/carts/1')).toBe(true);
    expect(merged.matches('DELETE', '/carts/1')).toBe(true);
    expect(get.matches('DELETE', '/carts/1')).toBe(false);
  });

  it('refuses to merge different templates', () => {
    const carts = RoutePattern.fromRouteUrl(['GET'], '/carts/:id');
    const items = RoutePattern.fromRouteUrl(['GET'], '/items/:id');

    expect(() => carts.merge(items)).toThrow('Cannot merge route pattern /items/{id} into /carts/{id}');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(RoutePattern.fromRouteUrl(['GET'], '/carts'))).toBe(true);
  });
});
