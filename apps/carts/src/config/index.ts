import { envsafe, bool, num, port, str } from 'envsafe';

const ENVIRONMENTS = ['development', 'test', 'production'] as const;

export type AppConfig = {
  env: (typeof ENVIRONMENTS)[number];
  server: {
    port: number;
    host: string;
  };
  service: {
    name: string;
  };
  logging: {
    level: string;
  };
  redis: {
    url: string;
  };
  metrics: {
    enabled: boolean;
  };
  monitoring: {
    errorPath: string;
  };
  resources: {
    basePath: string;
  };
  cors: {
    origins: string[];
  };
  sentry: {
    dsn: string | null;
    tracesSampleRate: number;
    enabled: boolean;
  };
};

let cachedConfig: AppConfig | null = null;

const environmentVariables = {
  NODE_ENV: str({
    choices: [...ENVIRONMENTS],
    default: 'production',
    devDefault: 'development',
  }),
  HOST: str({ default: '0.0.0.0' }),
  PORT: port({ devDefault: 3000, default: 8080 }),
  SERVICE_NAME: str({ default: 'carts' }),
  LOG_LEVEL: str({ devDefault: 'debug', default: 'info' }),
  REDIS_URL: str({ devDefault: 'redis://127.0.0.1:6379/0', default: 'redis://127.0.0.1:6379/0' }),
  METRICS_ENABLED: bool({ devDefault: true, default: true }),
  MONITORING_ERROR_PATH: str({ default: '/error' }),
  RESOURCES_BASE_PATH: str({ allowEmpty: true, default: '' }),
  CORS_ALLOWED_ORIGINS: str({ allowEmpty: true, default: '' }),
  SENTRY_DSN: str({ allowEmpty: true, default: '' }),
  SENTRY_TRACES_SAMPLE_RATE: num({ default: 0.1, devDefault: 0.1 }),
};

function parseCorsOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function parseEnvironment(raw: string): AppConfig['env'] {
  const match = ENVIRONMENTS.find((candidate) => candidate === raw);
  return match ?? 'production';
}

export function normalizeBasePath(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  if (trimmed.length === 0) {
    return '';
  }

  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = envsafe(environmentVariables, { env });

  return {
    env: parseEnvironment(raw.NODE_ENV),
    server: {
      port: Number(raw.PORT),
      host: raw.HOST,
    },
    service: {
      name: raw.SERVICE_NAME,
    },
    logging: {
      level: raw.LOG_LEVEL,
    },
    redis: {
      url: raw.REDIS_URL,
    },
    metrics: {
      enabled: raw.METRICS_ENABLED,
    },
    monitoring: {
      errorPath: raw.MONITORING_ERROR_PATH,
    },
    resources: {
      basePath: normalizeBasePath(raw.RESOURCES_BASE_PATH),
    },
    cors: {
      origins: parseCorsOrigins(raw.CORS_ALLOWED_ORIGINS),
    },
    sentry: {
      dsn: raw.SENTRY_DSN.length > 0 ? raw.SENTRY_DSN : null,
      tracesSampleRate: Number(raw.SENTRY_TRACES_SAMPLE_RATE),
      enabled: raw.SENTRY_DSN.length > 0,
    },
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }

  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
