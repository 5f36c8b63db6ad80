import type { Socket, TcpNetConnectOpts } from 'net';
import type { Logger } from 'winston';
import type { Target } from './target.js';
import type { DiagnosticsFailure } from '../utils/errors.js';

// Port scanner types

export type PortState = 'open' | 'closed' | 'filtered' | 'error';

export type ScanProfile = 'quick' | 'web' | 'standard' | 'full';

export type FilteredReason = 'timeout' | 'budget-exceeded' | 'cancelled';

export type PortErrorKind =
  | 'host-unreachable'
  | 'network-unreachable'
  | 'address-family'
  | 'resource-exhausted'
  | 'permission-denied'
  | 'unknown';

export interface OpenPortResult {
  readonly port: number;
  readonly state: 'open';
  readonly latencyMs: number;
  readonly errorKind: null;
}

export interface ClosedPortResult {
  readonly port: number;
  readonly state: 'closed';
  readonly latencyMs: null;
  readonly errorKind: null;
}

export interface FilteredPortResult {
  readonly port: number;
  readonly state: 'filtered';
  readonly latencyMs: null;
  readonly errorKind: FilteredReason;
}

export interface ErrorPortResult {
  readonly port: number;
  readonly state: 'error';
  readonly latencyMs: null;
  readonly errorKind: PortErrorKind;
}

export type PortResult = OpenPortResult | ClosedPortResult | FilteredPortResult | ErrorPortResult;

export interface ScanSummary {
  open: number;
  closed: number;
  filtered: number;
  error: number;
}

export interface ScanReport {
  target: Target;
  results: PortResult[];
  liveness: PortResult | null;
  overallReachable: boolean;
  summary: ScanSummary;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export type SocketFactory = (options: TcpNetConnectOpts) => Socket;

export type ScanProgressCallback = (result: PortResult, completed: number, total: number) => void;

export interface ScanOptions {
  perPortTimeoutMs: number;
  totalBudgetMs: number;
  signal?: AbortSignal | undefined;
  onProgress?: ScanProgressCallback | undefined;
}

export interface TcpScannerOptions {
  maxConcurrent?: number | undefined;
  livenessPort?: number | undefined;
  socketFactory?: SocketFactory | undefined;
  logger?: Logger | undefined;
}

export interface ScanRequest {
  hostInput: string;
  ports?: number[] | undefined;
  perPortTimeoutMs?: number | undefined;
  totalBudgetMs?: number | undefined;
}

export interface DiagnoseOptions {
  signal?: AbortSignal | undefined;
  onProgress?: ScanProgressCallback | undefined;
}

export type DiagnosticsResult =
  | { success: true; report: ScanReport }
  | { success: false; error: DiagnosticsFailure };
