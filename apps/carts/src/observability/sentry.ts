import * as Sentry from '@sentry/node';

import type { AppConfig } from '../config';

type InitSentryOptions = {
  release?: string | null;
};

export function initSentry(config: AppConfig, options: InitSentryOptions = {}) {
  if (!config.sentry.enabled) {
    return;
  }

  if (isSentryEnabled()) {
    return;
  }

  const release = options.release ?? process.env.SENTRY_RELEASE ?? null;

  Sentry.init({
    dsn: config.sentry.dsn ?? undefined,
    environment: config.env,
    release: release ?? undefined,
    tracesSampleRate: config.sentry.tracesSampleRate,
  });

  Sentry.configureScope((scope) => {
    scope.setTag('service', config.service.name);
    scope.setTag('node_env', config.env);
    if (release) {
      scope.setTag('release', release);
    }
  });
}

/**
 * Reports a fault of the instrumentation itself. Such faults never reach the
 * client, so this is the only place they surface besides the logs.
 */
export function captureInstrumentationError(error: unknown, context: Record<string, unknown>) {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.captureException(error, {
    tags: { component: 'http-monitoring' },
    extra: context,
  });
}

function isSentryEnabled() {
  return Boolean(Sentry.getCurrentHub().getClient());
}
