import http from 'http';
import net from 'net';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { HttpChecker, extractTitle, normalizeUrl } from './http-checker.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'TEST', silent: true });

let server: http.Server;
let baseUrl: string;

beforeAll(async () => {
  server = http.createServer((req, res) => {
    if (req.url === '/page') {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end('<html><head><title>\n  Status   Page \n</title></head><body>ok</body></html>');
    } else if (req.url === '/plain') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('<title>not html</title>');
    } else if (req.url === '/hang') {
      // Never answers
    } else {
      res.writeHead(404, { 'Content-Type': 'text/html' });
      res.end('<title>Not Found</title>');
    }
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('http/HttpChecker', () => {
  it('reports status and title of a page', async () => {
    const checker = new HttpChecker({ logger });

    const result = await checker.check(`${baseUrl}/page`);

    expect(result).toMatchObject({
      success: true,
      url: `${baseUrl}/page`,
      status: 200,
      ok: true,
      title: 'Status Page',
    });
  });

  it('ignores titles in non-HTML bodies', async () => {
    const checker = new HttpChecker({ logger });

    const result = await checker.check(`${baseUrl}/plain`);

    expect(result).toMatchObject({ success: true, status: 200, title: null });
  });

  it('treats error statuses as answers', async () => {
    const checker = new HttpChecker({ logger });

    const result = await checker.check(`${baseUrl}/missing`);

    expect(result).toMatchObject({ success: true, status: 404, ok: false, title: 'Not Found' });
  });

  it('reports a timeout for a server that never answers', async () => {
    const checker = new HttpChecker({ logger, timeout: 100 });

    const result = await checker.check(`${baseUrl}/hang`);

    expect(result).toMatchObject({ success: false, url: `${baseUrl}/hang`, errorKind: 'timeout' });
  });

  it('reports a refused connection', async () => {
    const idle = net.createServer();
    await new Promise<void>((resolve) => idle.listen(0, '127.0.0.1', resolve));
    const address = idle.address();
    await new Promise<void>((resolve) => idle.close(() => resolve()));
    if (!address || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    const checker = new HttpChecker({ logger });

    const result = await checker.check(`http://127.0.0.1:${address.port}/`);

    expect(result).toMatchObject({ success: false, errorKind: 'connection-failed' });
  });

  it('rejects input that is not an http URL without a request', async () => {
    const checker = new HttpChecker({ logger });

    const result = await checker.check('ftp://files.example.test');

    expect(result).toMatchObject({ success: false, url: 'ftp://files.example.test', errorKind: 'invalid-url' });
  });
});

describe('http/normalizeUrl', () => {
  it('adds a scheme when none is given', () => {
    expect(normalizeUrl('example.com')).toBe('http://example.com/');
    expect(normalizeUrl('  example.com/path?q=1 ')).toBe('http://example.com/path?q=1');
  });

  it('keeps http and https URLs', () => {
    expect(normalizeUrl('https://example.com/a')).toBe('https://example.com/a');
    expect(normalizeUrl('HTTP://Example.com')).toBe('http://example.com/');
  });

  it('rejects other schemes and empty input', () => {
    expect(normalizeUrl('ftp://example.com')).toBeNull();
    expect(normalizeUrl('')).toBeNull();
    expect(normalizeUrl('http://')).toBeNull();
  });
});

describe('http/extractTitle', () => {
  it('collapses whitespace and trims long titles', () => {
    expect(extractTitle('<title> a\n b </title>', 'text/html')).toBe('a b');
    expect(extractTitle(`<title>${'x'.repeat(300)}</title>`, 'text/html')?.length).toBe(200);
  });

  it('returns null without an HTML title', () => {
    expect(extractTitle('<p>no title</p>', 'text/html')).toBeNull();
    expect(extractTitle('<title>x</title>', 'application/json')).toBeNull();
    expect(extractTitle(undefined, 'text/html')).toBeNull();
  });
});
