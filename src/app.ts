import type { Logger } from 'winston';
import { TargetResolver } from './resolver/target-resolver.js';
import { TcpScanner } from './scanner/tcp-scanner.js';
import { NetworkDiagnostics } from './scanner/diagnostics.js';
import { HttpChecker } from './http/http-checker.js';
import { CommandHandler } from './bot/handler.js';
import { DiagnosticsAPI } from './api/server.js';
import { createLogger } from './utils/logger.js';
import type { AppConfig } from './schemas/config.js';
import type { LookupFunction } from './types/target.js';
import type { SocketFactory } from './types/scanner.js';

export interface AppOverrides {
  lookup?: LookupFunction | undefined;
  socketFactory?: SocketFactory | undefined;
  silent?: boolean | undefined;
}

export interface SocketSentryApp {
  logger: Logger;
  diagnostics: NetworkDiagnostics;
  httpChecker: HttpChecker;
  commandHandler: CommandHandler;
  api: DiagnosticsAPI;
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): SocketSentryApp {
  const logger = (name: string): Logger =>
    createLogger({
      name,
      level: config.logging.level,
      logFile: config.logging.logFile,
      silent: overrides.silent ?? false,
    });

  const diagnostics = new NetworkDiagnostics({
    config: config.scanner,
    logger: logger('DIAGNOSTICS'),
    resolver: new TargetResolver({
      maxHostLength: config.resolver.maxHostLength,
      resolveTimeoutMs: config.resolver.resolveTimeoutMs,
      lookup: overrides.lookup,
    }),
    scanner: new TcpScanner({
      maxConcurrent: config.scanner.maxConcurrency,
      livenessPort: config.scanner.livenessPort,
      socketFactory: overrides.socketFactory,
      logger: logger('SCANNER'),
    }),
  });

  const httpChecker = new HttpChecker({
    timeout: config.httpCheck.timeout,
    proxyUrl: config.httpCheck.proxyUrl,
    userAgent: config.httpCheck.userAgent,
    logger: logger('HTTP-CHECK'),
  });

  const commandHandler = new CommandHandler({
    diagnostics,
    httpChecker,
    logger: logger('BOT'),
  });

  const api = new DiagnosticsAPI(
    { diagnostics, httpChecker, commandHandler },
    { host: config.api.host, port: config.api.port, logger: logger('API') }
  );

  return {
    logger: logger('SOCKET-SENTRY'),
    diagnostics,
    httpChecker,
    commandHandler,
    api,
  };
}
