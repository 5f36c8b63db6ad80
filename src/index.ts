export { TargetResolver, isValidHostname } from './resolver/target-resolver.js';
export { TcpScanner, classifyConnectError, summarize } from './scanner/tcp-scanner.js';
export { NetworkDiagnostics, type NetworkDiagnosticsOptions } from './scanner/diagnostics.js';
export {
  parsePortSpec,
  normalizePorts,
  dedupePorts,
  isValidPort,
  MIN_PORT,
  MAX_PORT,
} from './scanner/port-spec.js';
export { PORT_PROFILES, getPortsForProfile, getAvailableProfiles, isValidProfile } from './scanner/port-profiles.js';
export { HttpChecker, normalizeUrl, extractTitle } from './http/http-checker.js';
export { CommandHandler, type CommandHandlerOptions } from './bot/handler.js';
export { parseCommand } from './bot/commands.js';
export {
  renderScanReport,
  renderPortResult,
  renderDiagnosticsError,
  renderHttpCheck,
  renderHelp,
} from './bot/render.js';
export { DiagnosticsAPI, type ApiServices } from './api/server.js';
export { createApp, type AppOverrides, type SocketSentryApp } from './app.js';
export { loadConfig, type Env } from './config/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export * from './types/index.js';
