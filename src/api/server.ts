import express, {
  type Application,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { Logger } from 'winston';
import type { ZodError } from 'zod';
import { ScanRequestSchema } from '../schemas/scanner.js';
import { BotCommandBodySchema, HttpCheckQuerySchema, ResolveQuerySchema } from '../schemas/api.js';
import { createLogger } from '../utils/logger.js';
import { isDiagnosticsError, type DiagnosticsFailure } from '../utils/errors.js';
import type { NetworkDiagnostics } from '../scanner/diagnostics.js';
import type { HttpChecker } from '../http/http-checker.js';
import type { CommandHandler } from '../bot/handler.js';
import type { ApiErrorBody, ApiOptions } from '../types/api.js';

export interface ApiServices {
  diagnostics: NetworkDiagnostics;
  httpChecker: HttpChecker;
  commandHandler: CommandHandler;
}

function validationError(error: ZodError): ApiErrorBody {
  return {
    error: 'Invalid request',
    details: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
  };
}

function failureStatus(failure: DiagnosticsFailure): number {
  return failure.kind === 'InvalidInput' ? 400 : 404;
}

// Aborts when the client goes away before the response is written
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export class DiagnosticsAPI {
  private readonly app: Application;
  private readonly port: number;
  private readonly host: string;
  private readonly services: ApiServices;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(services: ApiServices, options: ApiOptions = {}) {
    this.app = express();
    this.port = options.port ?? 3000;
    this.host = options.host ?? '127.0.0.1';
    this.services = services;
    this.logger = options.logger ?? createLogger({ name: 'API' });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '16kb' }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.info(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response): void => {
      res.json({ status: 'ok' });
    });

    this.app.get('/api/resolve', async (req: Request, res: Response): Promise<void> => {
      const query = ResolveQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json(validationError(query.error));
        return;
      }

      try {
        const target = await this.services.diagnostics.resolve(query.data.host);
        res.json(target);
      } catch (error) {
        if (isDiagnosticsError(error)) {
          this.sendFailure(res, error.toFailure());
          return;
        }
        this.sendInternalError(res, error);
      }
    });

    this.app.post('/api/scan', async (req: Request, res: Response): Promise<void> => {
      const body = ScanRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json(validationError(body.error));
        return;
      }

      const controller = abortOnDisconnect(res);

      try {
        const result = await this.services.diagnostics.diagnose(body.data, { signal: controller.signal });
        if (result.success) {
          res.json(result.report);
        } else {
          this.sendFailure(res, result.error);
        }
      } catch (error) {
        this.sendInternalError(res, error);
      }
    });

    this.app.get('/api/http-check', async (req: Request, res: Response): Promise<void> => {
      const query = HttpCheckQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json(validationError(query.error));
        return;
      }

      try {
        res.json(await this.services.httpChecker.check(query.data.url));
      } catch (error) {
        this.sendInternalError(res, error);
      }
    });

    this.app.post('/api/bot/command', async (req: Request, res: Response): Promise<void> => {
      const body = BotCommandBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json(validationError(body.error));
        return;
      }

      const controller = abortOnDisconnect(res);

      try {
        const reply = await this.services.commandHandler.handle(body.data.text, controller.signal);
        res.json({ reply });
      } catch (error) {
        this.sendInternalError(res, error);
      }
    });
  }

  private setupErrorHandler(): void {
    // Body parser failures end up here
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
      if (error instanceof SyntaxError) {
        const body: ApiErrorBody = { error: 'Malformed JSON body' };
        res.status(400).json(body);
        return;
      }
      this.sendInternalError(res, error);
    });
  }

  private sendFailure(res: Response, failure: DiagnosticsFailure): void {
    const body: ApiErrorBody = { error: failure.kind, reason: failure.reason };
    res.status(failureStatus(failure)).json(body);
  }

  private sendInternalError(res: Response, error: unknown): void {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error('Request failed', { error: errorMessage });
    if (!res.headersSent) {
      const body: ApiErrorBody = { error: 'Internal error' };
      res.status(500).json(body);
    }
  }

  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = this.getAddress();
        this.logger.info(`SocketSentry API listening on http://${this.host}:${address?.port ?? this.port}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info('SocketSentry API stopped');
  }
}
