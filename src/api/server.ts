import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { Logger } from 'winston';
import { toPortable } from '../scanner/host-result.js';
import { createSilentLogger } from '../utils/logger.js';
import { getDashboardHTML, type DashboardHost } from './templates.js';
import type { MonitorSession } from '../monitor/session.js';
import type { HostMonitorState } from '../types/monitor.js';

export interface StatusServerOptions {
  session: MonitorSession;
  port?: number | undefined;
  host?: string | undefined;
  /** Dashboard auto-refresh period */
  refreshSeconds?: number | undefined;
  logger?: Logger | undefined;
}

/** Read-only HTTP view of a running monitor session */
export class StatusServer {
  private readonly app: Application;
  private readonly session: MonitorSession;
  private readonly port: number;
  private readonly host: string;
  private readonly refreshSeconds: number;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: StatusServerOptions) {
    this.app = express();
    this.session = options.session;
    this.port = options.port ?? 8080;
    this.host = options.host ?? '127.0.0.1';
    this.refreshSeconds = options.refreshSeconds ?? 10;
    this.logger = options.logger ?? createSilentLogger('status-api');

    this.setupMiddleware();
    this.setupRoutes();
  }

  get application(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());

    this.app.use((req: Request, _res: Response, next) => {
      this.logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private latestHealthy(state: HostMonitorState): boolean | null {
    return state.history.at(-1)?.healthy ?? null;
  }

  private dashboardHosts(): DashboardHost[] {
    return this.session.states().map((state) => ({
      state,
      healthy: this.latestHealthy(state),
      uptimePercent: this.session.uptime(state.key)?.uptimePercent ?? 0,
    }));
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response): void => {
      res.type('html').send(getDashboardHTML(this.session.summary(), this.dashboardHosts(), this.refreshSeconds));
    });

    this.app.get('/api/status', (_req: Request, res: Response): void => {
      const summary = this.session.summary();
      res.json({
        startedAt: summary.startedAt,
        iterations: summary.iterations,
        successfulIterations: summary.successfulIterations,
        uptimePercent: summary.uptimePercent,
        hosts: summary.hosts,
      });
    });

    this.app.get('/api/hosts', (_req: Request, res: Response): void => {
      res.json(
        this.session.states().map((state) => ({
          key: state.key,
          host: state.target.host,
          ports: state.target.ports,
          healthy: this.latestHealthy(state),
          successfulCount: state.successfulCount,
          totalCount: state.totalCount,
          uptimePercent: this.session.uptime(state.key)?.uptimePercent ?? 0,
          latest: state.latest ? toPortable(state.latest) : null,
        }))
      );
    });

    this.app.get('/api/hosts/:key', (req: Request, res: Response): void => {
      const key = req.params['key'] ?? '';
      const state = this.session.get(key);

      if (!state) {
        res.status(404).json({ error: `Unknown host key: ${key}` });
        return;
      }

      res.json({
        key: state.key,
        host: state.target.host,
        ports: state.target.ports,
        successfulCount: state.successfulCount,
        totalCount: state.totalCount,
        uptimePercent: this.session.uptime(state.key)?.uptimePercent ?? 0,
        history: state.history.map((entry) => ({
          iteration: entry.iteration,
          timestamp: new Date(entry.timestamp).toISOString(),
          healthy: entry.healthy,
          result: toPortable(entry.result),
        })),
      });
    });
  }

  /** Starts listening and resolves with the bound port */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info(`Status API listening on http://${this.host}:${port}`);
        resolve(port);
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
    });
  }
}
