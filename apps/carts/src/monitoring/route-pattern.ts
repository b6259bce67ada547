const PARAM_NAME = /^:([A-Za-z0-9_]+)/;
const ANY_SEGMENT = '[^/]+';

type CompiledSegment = {
  template: string;
  source: string;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Reads the `(...)` constraint opening at `start`, honouring nesting and escapes. */
function readConstraint(segment: string, start: number): { expression: string; end: number } {
  let depth = 0;

  for (let index = start; index < segment.length; index += 1) {
    const char = segment[index];
    if (char === '\\') {
      index += 1;
    } else if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      depth -= 1;
      if (depth === 0) {
        return { expression: segment.slice(start + 1, index), end: index + 1 };
      }
    }
  }

  throw new Error(`Unbalanced parameter constraint in route segment ${segment}`);
}

/** `^\d+$` becomes `(?:\d+)`: the segment expression is anchored as a whole. */
function constraintSource(expression: string): string {
  let body = expression.startsWith('^') ? expression.slice(1) : expression;
  if (body.endsWith('$') && !body.endsWith('\\$')) {
    body = body.slice(0, -1);
  }

  return `(?:${body})`;
}

function compileSegment(segment: string): CompiledSegment {
  if (segment === '*') {
    return { template: '{*}', source: '.*' };
  }

  let template = '';
  let source = '';
  let literal = '';
  let cursor = 0;

  while (cursor < segment.length) {
    const param = PARAM_NAME.exec(segment.slice(cursor));
    if (!param) {
      literal += segment[cursor];
      cursor += 1;
      continue;
    }

    cursor += param[0].length;
    let paramSource = ANY_SEGMENT;
    if (segment[cursor] === '(') {
      const constraint = readConstraint(segment, cursor);
      paramSource = constraintSource(constraint.expression);
      cursor = constraint.end;
    }

    template += `${literal}{${param[1]}}`;
    source += `${escapeRegExp(literal)}${paramSource}`;
    literal = '';
  }

  return { template: template + literal, source: source + escapeRegExp(literal) };
}

/**
 * Turns a Fastify route url (`/carts/:customerId/items/:itemId`) into its
 * label template (`/carts/{customerId}/items/{itemId}`) and an anchored
 * expression matching concrete paths.
 */
export function compileRouteUrl(url: string): { template: string; expression: RegExp } {
  const segments = url.split('/').map(compileSegment);

  return {
    template: segments.map((segment) => segment.template).join('/'),
    expression: new RegExp(`^${segments.map((segment) => segment.source).join('/')}$`),
  };
}

export class RoutePattern {
  readonly methods: ReadonlySet<string>;

  private constructor(
    readonly pattern: string,
    methods: Iterable<string>,
    private readonly expression: RegExp,
  ) {
    this.methods = new Set([...methods].map((method) => method.toUpperCase()));
    Object.freeze(this);
  }

  static fromRouteUrl(methods: Iterable<string>, url: string): RoutePattern {
    const { template, expression } = compileRouteUrl(url);
    return new RoutePattern(template, methods, expression);
  }

  matches(method: string, path: string): boolean {
    return this.methods.has(method.toUpperCase()) && this.expression.test(path);
  }

  /** Same template declared twice: keep one entry answering for both method sets. */
  merge(other: RoutePattern): RoutePattern {
    if (other.pattern !== this.pattern) {
      throw new Error(`Cannot merge route pattern ${other.pattern} into ${this.pattern}`);
    }

    return new RoutePattern(this.pattern, [...this.methods, ...other.methods], this.expression);
  }
}
