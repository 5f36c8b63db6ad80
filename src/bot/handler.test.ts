import net from 'net';
import { describe, it, expect, vi } from 'vitest';
import { CommandHandler } from './handler.js';
import { renderHelp, renderWelcome } from './render.js';
import { NetworkDiagnostics } from '../scanner/diagnostics.js';
import { TcpScanner } from '../scanner/tcp-scanner.js';
import { TargetResolver } from '../resolver/target-resolver.js';
import { HttpChecker } from '../http/http-checker.js';
import { createLogger } from '../utils/logger.js';
import type { SocketFactory } from '../types/scanner.js';

const logger = createLogger({ name: 'TEST', silent: true });

function createHandler(openPorts: number[]) {
  const probed: number[] = [];
  const socketFactory: SocketFactory = (options) => {
    const socket = new net.Socket();
    probed.push(options.port);
    setTimeout(() => {
      if (socket.destroyed) return;
      if (openPorts.includes(options.port)) {
        socket.emit('connect');
      } else {
        socket.emit('error', Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
      }
    }, 1);
    return socket;
  };

  const diagnostics = new NetworkDiagnostics({
    config: {
      perPortTimeoutMs: 200,
      totalBudgetMs: 1000,
      maxTotalBudgetMs: 5000,
      maxConcurrency: 10,
      maxPorts: 1024,
      livenessPort: 80,
    },
    logger,
    resolver: new TargetResolver({ lookup: async () => ({ address: '192.0.2.7', family: 4 }) }),
    scanner: new TcpScanner({ logger, socketFactory }),
  });
  const httpChecker = new HttpChecker({ logger });
  const handler = new CommandHandler({ diagnostics, httpChecker, logger });

  return { handler, httpChecker, diagnostics, probed };
}

describe('bot/CommandHandler', () => {
  it('answers plain text with a pointer to /help', async () => {
    const { handler } = createHandler([]);

    expect(await handler.handle('what can you do?')).toBe('Send /help for the list of commands.');
  });

  it('answers /start and /help', async () => {
    const { handler } = createHandler([]);

    expect(await handler.handle('/start')).toBe(renderWelcome());
    expect(await handler.handle('/help')).toBe(renderHelp());
  });

  it('explains usage when the host is missing', async () => {
    const { handler, probed } = createHandler([]);

    expect(await handler.handle('/check')).toBe('Usage: /check <host>\nExample: /check example.com');
    expect(probed).toHaveLength(0);
  });

  it('runs a liveness check for /check', async () => {
    const { handler, probed } = createHandler([80]);

    const reply = await handler.handle('/check example.test');

    expect(probed).toEqual([80]);
    expect(reply.split('\n').slice(0, 3)).toEqual([
      '🔍 Liveness check of example.test (192.0.2.7)',
      expect.stringMatching(/^✅ 80 open \([\d.]+ ms\)$/),
      'Reachable: yes',
    ]);
  });

  it('scans the requested ports for /portscan', async () => {
    const { handler, probed } = createHandler([22]);

    const reply = await handler.handle('/portscan 10.0.0.5 22,23');

    expect(probed.sort((a, b) => a - b)).toEqual([22, 23]);
    const lines = reply.split('\n');
    expect(lines[0]).toBe('🔍 Port scan of 10.0.0.5');
    expect(lines[1]).toMatch(/^✅ 22 open \([\d.]+ ms\)$/);
    expect(lines.slice(2, 5)).toEqual(['❌ 23 closed', 'Reachable: yes', 'open 1, closed 1, filtered 0, error 0']);
  });

  it('uses the quick profile when no ports are given', async () => {
    const { handler, probed } = createHandler([]);

    await handler.handle('/portscan 10.0.0.5');

    expect(probed.sort((a, b) => a - b)).toEqual([21, 22, 25, 53, 80, 443, 3389, 8080]);
  });

  it('reports a bad port list without scanning', async () => {
    const { handler, probed } = createHandler([]);

    const reply = await handler.handle('/portscan 10.0.0.5 80-x');

    expect(reply).toBe('⚠️ Invalid port list "80-x". Use ports 1-65535, e.g. 22,80,8000-8010.');
    expect(probed).toHaveLength(0);
  });

  it('reports a bad host', async () => {
    const { handler } = createHandler([]);

    expect(await handler.handle('/check 300.1.1.1')).toBe('⚠️ "300.1.1.1" is not a valid host name or IP address.');
  });

  it('renders the HTTP check for /http', async () => {
    const { handler, httpChecker } = createHandler([]);
    const check = vi.spyOn(httpChecker, 'check').mockResolvedValue({
      success: true,
      url: 'http://example.test/',
      status: 200,
      ok: true,
      title: null,
      responseTimeMs: 15,
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    const reply = await handler.handle('/http example.test');

    expect(check).toHaveBeenCalledWith('example.test');
    expect(reply).toBe('✅ Site is up. Status: 200 OK\nResponse time: 15 ms');
  });

  it('turns unexpected failures into a generic reply', async () => {
    const { handler, diagnostics } = createHandler([]);
    vi.spyOn(diagnostics, 'diagnose').mockRejectedValue(new Error('socket table corrupted'));

    const reply = await handler.handle('/check example.test');

    expect(reply).toBe('❌ Something went wrong while running the command. Please try again later.');
  });

  it('names unknown commands', async () => {
    const { handler } = createHandler([]);

    expect(await handler.handle('/ping 1.1.1.1')).toBe('Unknown command /ping. Send /help for the list of commands.');
  });
});
