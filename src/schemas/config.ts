import { z } from 'zod';

// Largest delay setTimeout honors; anything above fires after 1 ms
export const MAX_TIMER_MS = 2147483647;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const duration = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

const durationMs = z.number().int().positive().max(MAX_TIMER_MS);

const portNumber = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

// Raw environment, keyed by variable name
export const EnvConfigSchema = z.object({
  SCAN_PER_PORT_TIMEOUT_MS: duration(1000),
  SCAN_TOTAL_BUDGET_MS: duration(5000),
  SCAN_MAX_TOTAL_BUDGET_MS: duration(30000),
  SCAN_MAX_CONCURRENCY: positiveInt(100),
  SCAN_MAX_PORTS: z.coerce.number().int().min(1).max(65535).default(1024),
  SCAN_LIVENESS_PORT: portNumber(80),
  RESOLVE_MAX_HOST_LENGTH: positiveInt(255),
  RESOLVE_TIMEOUT_MS: duration(3000),
  HTTP_CHECK_TIMEOUT_MS: duration(5000),
  HTTP_CHECK_PROXY_URL: z.string().url().optional(),
  HTTP_CHECK_USER_AGENT: z.string().min(1).default('SocketSentry/1.0'),
  API_HOST: z.string().min(1).default('127.0.0.1'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FILE: z.string().min(1).optional(),
});

export const ScannerConfigSchema = z.object({
  perPortTimeoutMs: durationMs,
  totalBudgetMs: durationMs,
  maxTotalBudgetMs: durationMs,
  maxConcurrency: z.number().int().positive(),
  maxPorts: z.number().int().min(1).max(65535),
  livenessPort: z.number().int().min(1).max(65535),
});

export const ResolverConfigSchema = z.object({
  maxHostLength: z.number().int().positive(),
  resolveTimeoutMs: durationMs,
});

export const HttpCheckConfigSchema = z.object({
  timeout: durationMs,
  proxyUrl: z.string().url().optional(),
  userAgent: z.string().min(1),
});

export const ApiConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  logFile: z.string().min(1).optional(),
});

export const AppConfigSchema = z.object({
  scanner: ScannerConfigSchema,
  resolver: ResolverConfigSchema,
  httpCheck: HttpCheckConfigSchema,
  api: ApiConfigSchema,
  logging: LoggingConfigSchema,
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type HttpCheckConfig = z.infer<typeof HttpCheckConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
