import type { PortResult, ScanReport } from '../types/scanner.js';
import type { Target } from '../types/target.js';
import type { HttpCheckErrorResult, HttpCheckResult } from '../types/http-check.js';
import type { BotCommand } from '../types/bot.js';
import type { DiagnosticsFailure } from '../utils/errors.js';

// Longer result lists only show the open ports
const MAX_LISTED_PORTS = 20;

type UsageCommand = Extract<BotCommand, { name: 'usage' }>['command'];

const USAGE: Record<UsageCommand, string> = {
  check: 'Usage: /check <host>\nExample: /check example.com',
  portscan: 'Usage: /portscan <host> [ports|profile]\nExample: /portscan 8.8.8.8 53,443 or /portscan example.com web',
  http: 'Usage: /http <url>\nExample: /http example.com',
};

export function renderWelcome(): string {
  return [
    'Hi! I am SocketSentry, your network diagnostics helper.',
    'Send /help for the list of commands.',
  ].join('\n');
}

export function renderHelp(): string {
  return [
    'Available commands:',
    '/start - Start talking to the bot',
    '/help - Show this message',
    '/check <host> - Check whether a host answers on its liveness port',
    '/portscan <host> [ports|profile] - Scan TCP ports (e.g. 22,80,8000-8010 or quick, web, standard, full)',
    '/http <url> - Check the HTTP status of a site',
  ].join('\n');
}

export function renderUsage(command: UsageCommand): string {
  return USAGE[command];
}

export function renderUnknownCommand(command: string): string {
  return `Unknown command /${command}. Send /help for the list of commands.`;
}

export function renderNotACommand(): string {
  return 'Send /help for the list of commands.';
}

export function renderUnexpectedError(): string {
  return '❌ Something went wrong while running the command. Please try again later.';
}

export function renderTargetLabel(target: Target): string {
  return target.hostname ? `${target.hostname} (${target.resolvedAddress})` : target.resolvedAddress;
}

export function renderPortResult(result: PortResult): string {
  switch (result.state) {
    case 'open':
      return `✅ ${result.port} open (${result.latencyMs} ms)`;
    case 'closed':
      return `❌ ${result.port} closed`;
    case 'filtered':
      return `⏳ ${result.port} filtered (${result.errorKind})`;
    case 'error':
      return `⚠️ ${result.port} error (${result.errorKind})`;
  }
}

export function renderScanReport(report: ScanReport): string {
  const label = renderTargetLabel(report.target);
  const reachable = `Reachable: ${report.overallReachable ? 'yes' : 'no'}`;
  const duration = `Finished in ${report.durationMs} ms`;

  if (report.liveness) {
    return [
      `🔍 Liveness check of ${label}`,
      renderPortResult(report.liveness),
      reachable,
      duration,
    ].join('\n');
  }

  const lines = [`🔍 Port scan of ${label}`];

  if (report.results.length <= MAX_LISTED_PORTS) {
    lines.push(...report.results.map(renderPortResult));
  } else {
    const openResults = report.results.filter((result) => result.state === 'open');
    lines.push(...openResults.map(renderPortResult));
    lines.push(`${report.results.length - openResults.length} other port(s) not open`);
  }

  const { open, closed, filtered, error } = report.summary;
  lines.push(reachable);
  lines.push(`open ${open}, closed ${closed}, filtered ${filtered}, error ${error}`);
  lines.push(duration);

  return lines.join('\n');
}

export function renderDiagnosticsError(failure: DiagnosticsFailure): string {
  switch (failure.reason) {
    case 'empty':
    case 'too-long':
    case 'malformed-ip':
    case 'malformed-hostname':
      return `⚠️ "${failure.input}" is not a valid host name or IP address.`;
    case 'malformed-ports':
    case 'port-out-of-range':
      return `⚠️ Invalid port list "${failure.input}". Use ports 1-65535, e.g. 22,80,8000-8010.`;
    case 'too-many-ports':
      return `⚠️ Too many ports requested (${failure.input}).`;
    case 'invalid-timeout':
      return `⚠️ Invalid timeout: ${failure.input} ms.`;
    case 'not-found':
      return `❌ Host not found: ${failure.input}`;
    case 'lookup-timeout':
      return `❌ Host lookup timed out: ${failure.input}`;
    case 'lookup-cancelled':
      return `❌ Host lookup cancelled: ${failure.input}`;
  }
}

function renderHttpFailure(result: HttpCheckErrorResult): string {
  switch (result.errorKind) {
    case 'invalid-url':
      return `⚠️ "${result.url}" is not a valid URL.`;
    case 'timeout':
      return `❌ ${result.url} did not respond in time.`;
    case 'connection-failed':
      return `❌ Could not connect to ${result.url}.`;
  }
}

export function renderHttpCheck(result: HttpCheckResult): string {
  if (!result.success) {
    return renderHttpFailure(result);
  }

  const lines = result.ok
    ? [`✅ Site is up. Status: ${result.status} OK`]
    : [`⚠️ Site responded. Status: ${result.status}`];

  if (result.title) {
    lines.push(`Title: ${result.title}`);
  }
  lines.push(`Response time: ${result.responseTimeMs} ms`);

  return lines.join('\n');
}
