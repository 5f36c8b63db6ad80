import { EnvConfigSchema, type AppConfig } from '../schemas/config.js';
import { ConfigError } from '../utils/errors.js';

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvConfigSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    scanner: {
      perPortTimeoutMs: values.SCAN_PER_PORT_TIMEOUT_MS,
      totalBudgetMs: values.SCAN_TOTAL_BUDGET_MS,
      maxTotalBudgetMs: values.SCAN_MAX_TOTAL_BUDGET_MS,
      maxConcurrency: values.SCAN_MAX_CONCURRENCY,
      maxPorts: values.SCAN_MAX_PORTS,
      livenessPort: values.SCAN_LIVENESS_PORT,
    },
    resolver: {
      maxHostLength: values.RESOLVE_MAX_HOST_LENGTH,
      resolveTimeoutMs: values.RESOLVE_TIMEOUT_MS,
    },
    httpCheck: {
      timeout: values.HTTP_CHECK_TIMEOUT_MS,
      proxyUrl: values.HTTP_CHECK_PROXY_URL,
      userAgent: values.HTTP_CHECK_USER_AGENT,
    },
    api: {
      host: values.API_HOST,
      port: values.API_PORT,
    },
    logging: {
      level: values.LOG_LEVEL,
      logFile: values.LOG_FILE,
    },
  };
}
