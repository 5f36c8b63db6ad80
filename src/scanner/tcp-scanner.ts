import net, { type Socket } from 'net';
import { performance } from 'perf_hooks';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import { normalizePorts } from './port-spec.js';
import { MAX_TIMER_MS } from '../schemas/config.js';
import { DiagnosticsError } from '../utils/errors.js';
import type { Target } from '../types/target.js';
import type {
  ClosedPortResult,
  ErrorPortResult,
  FilteredPortResult,
  FilteredReason,
  OpenPortResult,
  PortErrorKind,
  PortResult,
  ScanOptions,
  ScanReport,
  ScanSummary,
  SocketFactory,
  TcpScannerOptions,
} from '../types/scanner.js';

type StopReason = Extract<FilteredReason, 'budget-exceeded' | 'cancelled'>;

interface AttemptContext {
  signal: AbortSignal;
  stopReason: () => StopReason;
}

// Errors that mean the host answered the SYN with a reset
const REFUSED_CODES = new Set(['ECONNREFUSED', 'ECONNRESET']);

const ERROR_KINDS = new Map<string, PortErrorKind>([
  ['EHOSTUNREACH', 'host-unreachable'],
  ['EHOSTDOWN', 'host-unreachable'],
  ['ENETUNREACH', 'network-unreachable'],
  ['ENETDOWN', 'network-unreachable'],
  ['EAFNOSUPPORT', 'address-family'],
  ['EADDRNOTAVAIL', 'address-family'],
  ['EMFILE', 'resource-exhausted'],
  ['ENFILE', 'resource-exhausted'],
  ['ENOBUFS', 'resource-exhausted'],
  ['ENOMEM', 'resource-exhausted'],
  ['EACCES', 'permission-denied'],
  ['EPERM', 'permission-denied'],
]);

const defaultSocketFactory: SocketFactory = (options) => net.createConnection(options);

function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function openResult(port: number, latencyMs: number): OpenPortResult {
  return Object.freeze({ port, state: 'open', latencyMs, errorKind: null });
}

function closedResult(port: number): ClosedPortResult {
  return Object.freeze({ port, state: 'closed', latencyMs: null, errorKind: null });
}

function filteredResult(port: number, reason: FilteredReason): FilteredPortResult {
  return Object.freeze({ port, state: 'filtered', latencyMs: null, errorKind: reason });
}

function errorResult(port: number, kind: PortErrorKind): ErrorPortResult {
  return Object.freeze({ port, state: 'error', latencyMs: null, errorKind: kind });
}

function checkTimerDuration(ms: number): void {
  if (!Number.isInteger(ms) || ms <= 0 || ms > MAX_TIMER_MS) {
    throw DiagnosticsError.invalidInput('invalid-timeout', String(ms));
  }
}

export function classifyConnectError(port: number, error: unknown): PortResult {
  const code = errorCode(error);

  if (code && REFUSED_CODES.has(code)) {
    return closedResult(port);
  }
  if (code === 'ETIMEDOUT') {
    return filteredResult(port, 'timeout');
  }

  const kind = code ? ERROR_KINDS.get(code) : undefined;
  return errorResult(port, kind ?? 'unknown');
}

export function summarize(results: readonly PortResult[]): ScanSummary {
  const summary: ScanSummary = { open: 0, closed: 0, filtered: 0, error: 0 };
  for (const result of results) {
    summary[result.state]++;
  }
  return summary;
}

/**
 * TCP connect scanner. Every distinct port gets exactly one attempt; attempts
 * run concurrently up to `maxConcurrent` and the whole call is bounded by
 * `totalBudgetMs`.
 */
export class TcpScanner {
  private readonly maxConcurrent: number;
  private readonly livenessPort: number;
  private readonly socketFactory: SocketFactory;
  private readonly logger: Logger;

  constructor(options: TcpScannerOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 100;
    this.livenessPort = options.livenessPort ?? 80;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.logger = options.logger ?? createLogger({ name: 'SCANNER' });
  }

  async scan(target: Target, ports: readonly number[], options: ScanOptions): Promise<ScanReport> {
    const requested = normalizePorts(ports);
    checkTimerDuration(options.perPortTimeoutMs);
    checkTimerDuration(options.totalBudgetMs);

    const livenessMode = requested.length === 0;
    const probePorts = livenessMode ? [this.livenessPort] : requested;

    const startedAt = new Date();
    const startTime = performance.now();

    const controller = new AbortController();
    let stopReason: StopReason = 'cancelled';

    const stop = (reason: StopReason): void => {
      if (controller.signal.aborted) return;
      stopReason = reason;
      controller.abort();
    };

    const onCallerAbort = (): void => stop('cancelled');

    if (options.signal?.aborted) {
      stop('cancelled');
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const budgetTimer = setTimeout(() => stop('budget-exceeded'), options.totalBudgetMs);

    const context: AttemptContext = {
      signal: controller.signal,
      stopReason: () => stopReason,
    };

    const settled = new Map<number, PortResult>();
    let cursor = 0;

    // Workers share the cursor; it is the concurrency gate
    const runWorker = async (): Promise<void> => {
      while (cursor < probePorts.length && !controller.signal.aborted) {
        const port = probePorts[cursor++];
        if (port === undefined) return;

        const result = await this.attempt(target, port, options.perPortTimeoutMs, context);
        settled.set(port, result);
        this.logger.debug('Port probed', { port, state: result.state, errorKind: result.errorKind });
        this.reportProgress(options, result, settled.size, probePorts.length);
      }
    };

    this.logger.debug(`Scanning ${probePorts.length} port(s) on ${target.resolvedAddress}`, {
      livenessMode,
      perPortTimeoutMs: options.perPortTimeoutMs,
      totalBudgetMs: options.totalBudgetMs,
    });

    try {
      const workerCount = Math.min(this.maxConcurrent, probePorts.length);
      await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
    } finally {
      clearTimeout(budgetTimer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    // Ports that never got an attempt before the scan was stopped
    const results = probePorts.map((port) => settled.get(port) ?? filteredResult(port, stopReason));

    const liveness = livenessMode ? results[0] ?? null : null;
    const reportResults = livenessMode ? [] : results;
    const overallReachable = liveness
      ? liveness.state === 'open'
      : reportResults.some((result) => result.state === 'open');
    const summary = summarize(reportResults);
    const durationMs = Math.round(performance.now() - startTime);

    if (controller.signal.aborted) {
      this.logger.warn(`Scan of ${target.resolvedAddress} stopped early`, { reason: stopReason });
    }
    this.logger.info(`Scan of ${target.resolvedAddress} complete`, {
      ports: reportResults.length,
      ...summary,
      overallReachable,
      durationMs,
    });

    return {
      target,
      results: reportResults,
      liveness,
      overallReachable,
      summary,
      startedAt,
      finishedAt: new Date(),
      durationMs,
    };
  }

  // Single attempt: pending until exactly one terminal result
  private attempt(
    target: Target,
    port: number,
    timeoutMs: number,
    context: AttemptContext
  ): Promise<PortResult> {
    if (context.signal.aborted) {
      return Promise.resolve(filteredResult(port, context.stopReason()));
    }

    return new Promise((resolve) => {
      const startTime = performance.now();
      let socket: Socket | null = null;
      let done = false;

      const finish = (result: PortResult): void => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        context.signal.removeEventListener('abort', onAbort);
        socket?.destroy();
        resolve(result);
      };

      const onAbort = (): void => finish(filteredResult(port, context.stopReason()));
      const timer = setTimeout(() => finish(filteredResult(port, 'timeout')), timeoutMs);
      context.signal.addEventListener('abort', onAbort, { once: true });

      try {
        socket = this.socketFactory({
          host: target.resolvedAddress,
          port,
          family: target.addressFamily === 'IPv6' ? 6 : 4,
        });
      } catch (error) {
        finish(classifyConnectError(port, error));
        return;
      }

      socket.once('connect', () => {
        const latencyMs = Math.round((performance.now() - startTime) * 100) / 100;
        finish(openResult(port, latencyMs));
      });

      socket.on('error', (error) => {
        finish(classifyConnectError(port, error));
      });
    });
  }

  private reportProgress(options: ScanOptions, result: PortResult, completed: number, total: number): void {
    if (!options.onProgress) return;

    try {
      options.onProgress(result, completed, total);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn('Progress callback failed', { port: result.port, error: errorMessage });
    }
  }
}
