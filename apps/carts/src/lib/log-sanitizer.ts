const SENSITIVE_KEY_PATTERN = /(password|secret|token|authorization|cookie|api[-_]?key|dsn|credential)/i;

const REDACTED = '[REDACTED]';

export function sanitizeLogValue<T>(value: T): T {
  return redact(value, new WeakSet<object>()) as T;
}

function redact(value: unknown, seen: WeakSet<object>): unknown {
  if (!value || typeof value !== 'object') {
    return value;
  }

  if (value instanceof Date || value instanceof Error) {
    return value;
  }

  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redact(item, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(value)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : redact(raw, seen);
  }

  return output;
}
