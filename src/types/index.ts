// Target types
export type {
  AddressFamily,
  Target,
  LookupAddress,
  LookupFunction,
  TargetResolverOptions,
} from './target.js';

// Scanner types
export type {
  PortState,
  ScanProfile,
  FilteredReason,
  PortErrorKind,
  OpenPortResult,
  ClosedPortResult,
  FilteredPortResult,
  ErrorPortResult,
  PortResult,
  ScanSummary,
  ScanReport,
  SocketFactory,
  ScanProgressCallback,
  ScanOptions,
  TcpScannerOptions,
  ScanRequest,
  DiagnoseOptions,
  DiagnosticsResult,
} from './scanner.js';

// HTTP check types
export type {
  HttpCheckErrorKind,
  HttpCheckSuccessResult,
  HttpCheckErrorResult,
  HttpCheckResult,
  HttpCheckerOptions,
} from './http-check.js';

// Chat command types
export type { BotCommand, BotCommandName } from './bot.js';

// API types
export type { ApiOptions, ApiErrorBody } from './api.js';
