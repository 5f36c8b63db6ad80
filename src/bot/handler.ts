import type { Logger } from 'winston';
import { parseCommand } from './commands.js';
import {
  renderDiagnosticsError,
  renderHelp,
  renderHttpCheck,
  renderNotACommand,
  renderScanReport,
  renderUnexpectedError,
  renderUnknownCommand,
  renderUsage,
  renderWelcome,
} from './render.js';
import { parsePortSpec } from '../scanner/port-spec.js';
import { createLogger } from '../utils/logger.js';
import { isDiagnosticsError } from '../utils/errors.js';
import type { NetworkDiagnostics } from '../scanner/diagnostics.js';
import type { HttpChecker } from '../http/http-checker.js';
import type { BotCommand } from '../types/bot.js';
import type { ScanRequest } from '../types/scanner.js';

const DEFAULT_PORT_SPEC = 'quick';

export interface CommandHandlerOptions {
  diagnostics: NetworkDiagnostics;
  httpChecker: HttpChecker;
  logger?: Logger | undefined;
}

/**
 * Turns chat text into a reply. This is the only place where scan results
 * become prose.
 */
export class CommandHandler {
  private readonly diagnostics: NetworkDiagnostics;
  private readonly httpChecker: HttpChecker;
  private readonly logger: Logger;

  constructor(options: CommandHandlerOptions) {
    this.diagnostics = options.diagnostics;
    this.httpChecker = options.httpChecker;
    this.logger = options.logger ?? createLogger({ name: 'BOT' });
  }

  async handle(text: string, signal?: AbortSignal): Promise<string> {
    const command = parseCommand(text);

    if (!command) {
      return renderNotACommand();
    }

    this.logger.info(`Handling /${command.name}`);

    try {
      return await this.execute(command, signal);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Command /${command.name} failed`, { error: errorMessage });
      return renderUnexpectedError();
    }
  }

  private async execute(command: BotCommand, signal: AbortSignal | undefined): Promise<string> {
    switch (command.name) {
      case 'start':
        return renderWelcome();
      case 'help':
        return renderHelp();
      case 'usage':
        return renderUsage(command.command);
      case 'unknown':
        return renderUnknownCommand(command.command);
      case 'check':
        return this.scan({ hostInput: command.host }, signal);
      case 'portscan': {
        let ports: number[];
        try {
          ports = parsePortSpec(command.portSpec ?? DEFAULT_PORT_SPEC);
        } catch (error) {
          if (isDiagnosticsError(error)) {
            return renderDiagnosticsError(error.toFailure());
          }
          throw error;
        }
        return this.scan({ hostInput: command.host, ports }, signal);
      }
      case 'http':
        return renderHttpCheck(await this.httpChecker.check(command.url));
    }
  }

  private async scan(request: ScanRequest, signal: AbortSignal | undefined): Promise<string> {
    const result = await this.diagnostics.diagnose(request, { signal });
    return result.success ? renderScanReport(result.report) : renderDiagnosticsError(result.error);
  }
}
