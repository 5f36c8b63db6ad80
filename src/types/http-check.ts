import type { Logger } from 'winston';

// HTTP check types

export type HttpCheckErrorKind = 'invalid-url' | 'timeout' | 'connection-failed';

export interface HttpCheckSuccessResult {
  success: true;
  url: string;
  status: number;
  ok: boolean;
  title: string | null;
  responseTimeMs: number;
  timestamp: string;
}

export interface HttpCheckErrorResult {
  success: false;
  url: string;
  errorKind: HttpCheckErrorKind;
  timestamp: string;
}

export type HttpCheckResult = HttpCheckSuccessResult | HttpCheckErrorResult;

export interface HttpCheckerOptions {
  timeout?: number | undefined;
  proxyUrl?: string | undefined;
  userAgent?: string | undefined;
  maxRedirects?: number | undefined;
  logger?: Logger | undefined;
}
