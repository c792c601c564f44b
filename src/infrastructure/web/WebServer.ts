import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import type { IntentService } from '../../application/services/IntentService.js';
import type { Logger } from '../../utils/logger.js';
import { createIntentRouter, methodNotAllowed } from '../../presentation/routes/intentRoutes.js';

export interface WebServerOptions {
  port: number;
  storeBackend: string;
}

/** 4xx status set by the body parser (413 too large, 415 unsupported charset) */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private intentService: IntentService,
    private logger: Logger,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app
      .route('/health')
      .get((req: Request, res: Response) => {
        res.json({ status: 'ok', store: this.options.storeBackend });
      })
      .all(methodNotAllowed);

    this.app.use(createIntentRouter(this.intentService, this.logger));
  }

  private setupErrorHandlers(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Endpoint not found' });
    });

    // Body parser rejects malformed JSON with a 400 before any route runs
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'No JSON data provided' });
        return;
      }
      const status = clientErrorStatus(error);
      if (status !== null) {
        this.logger.warn({ err: error, path: req.path, status }, 'Rejected request body');
        res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
        return;
      }
      this.logger.error({ err: error, path: req.path }, 'Unhandled request error');
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer = this.app.listen(this.options.port, () => {
        this.logger.info({ port: this.options.port }, 'HTTP server listening');
        resolve();
      });

      this.httpServer.on('error', (error) => {
        this.logger.error({ err: error }, 'HTTP server error');
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        this.httpServer = null;
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed');
        resolve();
      });
    });
  }
}
