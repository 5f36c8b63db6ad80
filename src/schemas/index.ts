// Config schemas
export {
  MAX_TIMER_MS,
  LogLevelSchema,
  EnvConfigSchema,
  ScannerConfigSchema,
  ResolverConfigSchema,
  HttpCheckConfigSchema,
  ApiConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
  type LogLevel,
  type EnvConfig,
  type ScannerConfig,
  type ResolverConfig,
  type HttpCheckConfig,
  type ApiConfig,
  type LoggingConfig,
  type AppConfig,
} from './config.js';

// Scanner schemas
export {
  ScanProfileSchema,
  ScanRequestSchema,
  type ScanRequestBody,
} from './scanner.js';

// API schemas
export {
  ResolveQuerySchema,
  HttpCheckQuerySchema,
  BotCommandBodySchema,
  type ResolveQuery,
  type HttpCheckQuery,
  type BotCommandBody,
} from './api.js';
