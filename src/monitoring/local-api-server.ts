/**
 * Status API of the local monitor
 */

import express, { Request, Response, NextFunction } from 'express';
import { createServer, Server } from 'http';
import { LocalMonitor } from './local-monitor';
import { Logger } from '../types';
import { sendSuccess, sendError, bodyParseFailure } from '../utils/api-response';
import { errorMessage } from '../error-handling';

export interface LocalAPIServerConfig {
  port: number;
  host: string;
}

export class LocalAPIServer {
  private app: express.Application;
  private server: Server | null = null;
  private startTime = new Date();

  constructor(private monitor: LocalMonitor, private logger: Logger, private config: LocalAPIServerConfig) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      this.server = server;

      server.once('error', (error: Error) => {
        this.logger.error('Local API server error:', error);
        reject(error);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`Local API server listening on ${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    await new Promise<void>(resolve => {
      server.close(() => {
        this.logger.info('Local API server stopped');
        resolve();
      });
    });
  }

  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', this.handleHealth.bind(this));
    this.app.get('/api/status', this.handleStatus.bind(this));
    this.app.post('/api/speedtest', this.handleSpeedTest.bind(this));

    this.app.use('/api/*', (_req: Request, res: Response) => {
      sendError(res, 404, 'API endpoint not found');
    });

    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      const failure = bodyParseFailure(err);
      if (failure) {
        this.logger.warn(`Rejected body of ${req.method} ${req.path}: ${err.message}`);
        sendError(res, failure.status, failure.message);
        return;
      }

      this.logger.error('API Error:', err);
      sendError(res, 500, 'Internal server error');
    });
  }

  private handleHealth(_req: Request, res: Response): void {
    sendSuccess(res, {
      ...this.monitor.getHealth(),
      role: 'local',
      uptime: Math.floor((Date.now() - this.startTime.getTime()) / 1000)
    });
  }

  private handleStatus(_req: Request, res: Response): void {
    sendSuccess(res, this.monitor.getStatus());
  }

  private async handleSpeedTest(_req: Request, res: Response): Promise<void> {
    try {
      const result = await this.monitor.runSpeedTest('manual');
      if (!result) {
        sendError(res, 502, 'Speed test could not be completed');
        return;
      }
      sendSuccess(res, result);
    } catch (error) {
      this.logger.error('Manual speed test failed:', error);
      sendError(res, 500, errorMessage(error));
    }
  }
}
