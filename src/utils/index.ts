export { createLogger, type LoggerOptions } from './logger.js';
export {
  DiagnosticsError,
  ConfigError,
  isDiagnosticsError,
  type DiagnosticsErrorKind,
  type DiagnosticsErrorReason,
  type InvalidInputReason,
  type UnresolvableHostReason,
  type DiagnosticsFailure,
} from './errors.js';
