/**
 * HTTP receiver and status API of the remote tracker
 * Accepts reports from the local monitor, serves status and incident history,
 * the speed-test payload, and pushes live updates over WebSocket
 */

import express, { Request, Response, NextFunction } from 'express';
import { Server as WebSocketServer, WebSocket } from 'ws';
import { createServer, Server } from 'http';
import { Logger } from '../types';
import { MalformedMessageError, errorMessage } from '../error-handling';
import { sendSuccess, sendError, bodyParseFailure } from '../utils/api-response';
import { isRecord } from '../utils/validation';
import { RemoteTracker, RemoteUpdate } from './remote-tracker';

export interface RemoteAPIServerConfig {
  port: number;
  host: string;
  speedtestPayloadBytes: number;
  uploadLimit?: string;
}

const DEFAULT_INCIDENT_LIMIT = 50;
const MAX_INCIDENT_LIMIT = 500;

export class RemoteAPIServer {
  private app: express.Application;
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private startTime = new Date();
  private payload: Buffer;
  private onUpdate = (update: RemoteUpdate): void => this.broadcastUpdate(update);

  constructor(private tracker: RemoteTracker, private logger: Logger, private config: RemoteAPIServerConfig) {
    this.app = express();
    this.payload = Buffer.alloc(config.speedtestPayloadBytes);
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

      // Setup WebSocket server for live updates
      this.wss = new WebSocketServer({ server });
      this.setupWebSocketHandlers(this.wss);
      this.tracker.on('update', this.onUpdate);

      server.once('error', (error: Error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`Remote API server started on ${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    this.tracker.off('update', this.onUpdate);

    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    await new Promise<void>(resolve => {
      server.close(() => {
        this.logger.info('Remote API server stopped');
        resolve();
      });
    });
  }

  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  /**
   * Broadcast update to all connected clients
   */
  broadcastUpdate(update: RemoteUpdate): void {
    if (!this.wss) {
      return;
    }

    const message = JSON.stringify({ ...update, timestamp: new Date() });
    this.wss.clients.forEach(client => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '1mb' }));

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip}`);
      next();
    });
  }

  private setupRoutes(): void {
    // Receiver endpoints
    this.app.post('/heartbeat', this.handleHeartbeat.bind(this));
    this.app.post('/outage', this.handleOutageReport.bind(this));
    this.app.post('/speedtest-result', this.handleSpeedTestResult.bind(this));

    // Status endpoints
    this.app.get('/health', this.handleHealthCheck.bind(this));
    this.app.get('/status', this.handleStatus.bind(this));
    this.app.get('/incidents', this.handleIncidents.bind(this));

    // Speed test endpoints
    this.app.get('/speedtest', this.handleSpeedTestDownload.bind(this));
    this.app.post(
      '/speedtest/upload',
      express.raw({ type: () => true, limit: this.config.uploadLimit ?? '50mb' }),
      this.handleSpeedTestUpload.bind(this)
    );

    this.app.use((_req: Request, res: Response) => {
      sendError(res, 404, 'Endpoint not found');
    });

    // Error handling middleware
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      const failure = bodyParseFailure(err);
      if (failure) {
        this.tracker.recordMalformedPayload(req.path, `${failure.message}: ${err.message}`);
        sendError(res, failure.status, failure.message);
        return;
      }

      this.logger.error('API Error:', err);
      sendError(res, 500, 'Internal server error');
    });
  }

  private handleHeartbeat(req: Request, res: Response): void {
    this.receive(res, () => this.tracker.receiveHeartbeat(req.body).disposition);
  }

  private handleOutageReport(req: Request, res: Response): void {
    this.receive(res, () => this.tracker.receiveOutageReport(req.body).disposition);
  }

  private handleSpeedTestResult(req: Request, res: Response): void {
    this.receive(res, () => this.tracker.receiveSpeedTestResult(req.body));
  }

  /**
   * Malformed payloads are answered with 400 and the field errors
   */
  private receive(res: Response, apply: () => string): void {
    try {
      sendSuccess(res, { disposition: apply() });
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        sendError(res, 400, error.message, error.fieldErrors);
        return;
      }
      this.logger.error('Failed to process inbound message:', error);
      sendError(res, 500, errorMessage(error));
    }
  }

  private handleHealthCheck(_req: Request, res: Response): void {
    const health = this.tracker.getHealth();
    sendSuccess(res, {
      ...health,
      role: 'remote',
      uptime: Math.floor((Date.now() - this.startTime.getTime()) / 1000)
    });
  }

  private handleStatus(_req: Request, res: Response): void {
    sendSuccess(res, this.tracker.getStatus());
  }

  private async handleIncidents(req: Request, res: Response): Promise<void> {
    const requested = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : DEFAULT_INCIDENT_LIMIT;
    if (isNaN(requested) || requested < 1) {
      sendError(res, 400, 'limit must be a positive integer');
      return;
    }

    try {
      const incidents = await this.tracker.getRecentIncidents(Math.min(requested, MAX_INCIDENT_LIMIT));
      sendSuccess(res, incidents);
    } catch (error) {
      this.logger.error('Failed to load incidents:', error);
      sendError(res, 500, 'Failed to load incidents');
    }
  }

  private handleSpeedTestDownload(_req: Request, res: Response): void {
    res.set({
      'Content-Type': 'application/octet-stream',
      'Content-Length': String(this.payload.length),
      'Cache-Control': 'no-store'
    });
    res.end(this.payload);
  }

  private handleSpeedTestUpload(req: Request, res: Response): void {
    const received = Buffer.isBuffer(req.body) ? req.body.length : 0;
    sendSuccess(res, { bytes_received: received });
  }

  private setupWebSocketHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');

      ws.on('message', (message) => {
        this.handleWebSocketMessage(ws, message.toString());
      });

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({
        type: 'connected',
        timestamp: new Date()
      }));
    });
  }

  private handleWebSocketMessage(ws: WebSocket, raw: string): void {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.debug(`Invalid WebSocket message: ${errorMessage(error)}`);
      ws.send(JSON.stringify({ type: 'error', message: 'Invalid message format' }));
      return;
    }

    if (isRecord(data) && data.type === 'status') {
      ws.send(JSON.stringify({ type: 'status', data: this.tracker.getStatus(), timestamp: new Date() }));
      return;
    }

    ws.send(JSON.stringify({ type: 'error', message: 'Unknown message type' }));
  }
}
