import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { performance } from 'perf_hooks';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import type { HttpCheckErrorKind, HttpCheckResult, HttpCheckerOptions } from '../types/http-check.js';

const HTTP_SCHEME = /^https?:\/\//i;
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const MAX_TITLE_LENGTH = 200;

/**
 * Prefixes `http://` when no scheme is given. Returns null for anything that
 * is not an http(s) URL with a host.
 */
export function normalizeUrl(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  if (ANY_SCHEME.test(trimmed) && !HTTP_SCHEME.test(trimmed)) return null;

  const candidate = HTTP_SCHEME.test(trimmed) ? trimmed : `http://${trimmed}`;

  try {
    const url = new URL(candidate);
    return url.hostname ? url.toString() : null;
  } catch {
    return null;
  }
}

export function extractTitle(body: unknown, contentType: string): string | null {
  if (typeof body !== 'string' || !contentType.toLowerCase().includes('html')) {
    return null;
  }

  const $ = cheerio.load(body);
  const title = $('title').first().text().replace(/\s+/g, ' ').trim();

  return title ? title.substring(0, MAX_TITLE_LENGTH) : null;
}

/**
 * Fetches a site and reports its HTTP status. Non-2xx answers are results,
 * not failures; only connection problems end up as an error result.
 */
export class HttpChecker {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: HttpCheckerOptions = {}) {
    const agent = options.proxyUrl ? new SocksProxyAgent(options.proxyUrl) : null;

    this.client = axios.create({
      timeout: options.timeout ?? 5000,
      maxRedirects: options.maxRedirects ?? 5,
      responseType: 'text',
      // Every status is an answer
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent ?? 'SocketSentry/1.0',
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      ...(agent ? { httpAgent: agent, httpsAgent: agent, proxy: false as const } : {}),
    });
    this.logger = options.logger ?? createLogger({ name: 'HTTP-CHECK' });
  }

  async check(input: string): Promise<HttpCheckResult> {
    const url = normalizeUrl(input);

    if (!url) {
      return this.failure(input, 'invalid-url');
    }

    const startTime = performance.now();

    try {
      const response = await this.client.get<string>(url);
      const contentType = response.headers['content-type'];

      this.logger.debug(`GET ${url} -> ${response.status}`);

      return {
        success: true,
        url,
        status: response.status,
        ok: response.status === 200,
        title: extractTitle(response.data, typeof contentType === 'string' ? contentType : ''),
        responseTimeMs: Math.round(performance.now() - startTime),
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      const errorKind = this.classifyError(error);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.debug(`GET ${url} failed`, { errorKind, error: errorMessage });
      return this.failure(url, errorKind);
    }
  }

  private classifyError(error: unknown): HttpCheckErrorKind {
    if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
      return 'timeout';
    }
    return 'connection-failed';
  }

  private failure(url: string, errorKind: HttpCheckErrorKind): HttpCheckResult {
    return {
      success: false,
      url,
      errorKind,
      timestamp: new Date().toISOString(),
    };
  }
}
