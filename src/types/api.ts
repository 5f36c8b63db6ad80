import type { Logger } from 'winston';

// API types

export interface ApiOptions {
  port?: number | undefined;
  host?: string | undefined;
  logger?: Logger | undefined;
}

export interface ApiErrorBody {
  error: string;
  reason?: string | undefined;
  details?: string[] | undefined;
}
