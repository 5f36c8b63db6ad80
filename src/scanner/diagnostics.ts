import type { Logger } from 'winston';
import { TargetResolver } from '../resolver/target-resolver.js';
import { TcpScanner } from './tcp-scanner.js';
import { normalizePorts } from './port-spec.js';
import { createLogger } from '../utils/logger.js';
import { DiagnosticsError, isDiagnosticsError } from '../utils/errors.js';
import { MAX_TIMER_MS, type ScannerConfig } from '../schemas/config.js';
import type { Target } from '../types/target.js';
import type { DiagnoseOptions, DiagnosticsResult, ScanRequest } from '../types/scanner.js';

interface ScanPlan {
  ports: number[];
  perPortTimeoutMs: number;
  totalBudgetMs: number;
}

export interface NetworkDiagnosticsOptions {
  config: ScannerConfig;
  resolver?: TargetResolver | undefined;
  scanner?: TcpScanner | undefined;
  logger?: Logger | undefined;
}

/**
 * Entry point for transports: validates a request, resolves the host and
 * runs the scan. Only InvalidInput and UnresolvableHost end a request
 * before scanning; anything else the scanner records per port.
 */
export class NetworkDiagnostics {
  private readonly config: ScannerConfig;
  private readonly resolver: TargetResolver;
  private readonly scanner: TcpScanner;
  private readonly logger: Logger;

  constructor(options: NetworkDiagnosticsOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ name: 'DIAGNOSTICS' });
    this.resolver = options.resolver ?? new TargetResolver();
    this.scanner = options.scanner ?? new TcpScanner({
      maxConcurrent: options.config.maxConcurrency,
      livenessPort: options.config.livenessPort,
      logger: this.logger,
    });
  }

  async resolve(hostInput: string, signal?: AbortSignal): Promise<Target> {
    return this.resolver.resolve(hostInput, signal);
  }

  async diagnose(request: ScanRequest, options: DiagnoseOptions = {}): Promise<DiagnosticsResult> {
    try {
      const plan = this.plan(request);
      const target = await this.resolver.resolve(request.hostInput, options.signal);

      const report = await this.scanner.scan(target, plan.ports, {
        perPortTimeoutMs: plan.perPortTimeoutMs,
        totalBudgetMs: plan.totalBudgetMs,
        signal: options.signal,
        onProgress: options.onProgress,
      });

      return { success: true, report };
    } catch (error) {
      if (isDiagnosticsError(error)) {
        this.logger.info('Request rejected before scanning', {
          kind: error.kind,
          reason: error.reason,
        });
        return { success: false, error: error.toFailure() };
      }
      throw error;
    }
  }

  private plan(request: ScanRequest): ScanPlan {
    return {
      ports: normalizePorts(request.ports ?? [], this.config.maxPorts),
      perPortTimeoutMs: this.checkDuration(request.perPortTimeoutMs ?? this.config.perPortTimeoutMs),
      totalBudgetMs: this.checkDuration(request.totalBudgetMs ?? this.config.totalBudgetMs),
    };
  }

  private checkDuration(ms: number): number {
    const limit = Math.min(this.config.maxTotalBudgetMs, MAX_TIMER_MS);
    if (!Number.isInteger(ms) || ms <= 0 || ms > limit) {
      throw DiagnosticsError.invalidInput('invalid-timeout', String(ms));
    }
    return ms;
  }
}
