/**
 * Probe and metrics HTTP endpoints
 * @module @rbac-sync/controller/http/health-server
 */

import http from 'node:http';
import express, { type Express } from 'express';
import type { Logger } from '@rbac-sync/shared';
import type { BindAddress } from '../config.js';
import type { MetricsService } from '../services/metrics-service.js';

export interface ProbeOptions {
  /** Readiness check; liveness is unconditional */
  isReady: () => boolean;
}

/**
 * The part of an express response the plain-text handlers write to
 */
export interface TextResponder {
  status(code: number): TextResponder;
  type(contentType: string): TextResponder;
  send(body: string): unknown;
}

export type TextHandler = (req: unknown, res: TextResponder) => void;

export function healthzHandler(): TextHandler {
  return (_req, res) => {
    res.status(200).type('text/plain').send('ok');
  };
}

export function readyzHandler(isReady: () => boolean): TextHandler {
  return (_req, res) => {
    if (isReady()) {
      res.status(200).type('text/plain').send('ok');
    } else {
      res.status(503).type('text/plain').send('not ready');
    }
  };
}

export function metricsHandler(metrics: Pick<MetricsService, 'render'>): TextHandler {
  return (_req, res) => {
    res.status(200).type('text/plain; version=0.0.4').send(metrics.render());
  };
}

/**
 * `/healthz` always answers 200; `/readyz` answers 200 once ready and 503 before
 */
export function createProbeApp(options: ProbeOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.get('/healthz', healthzHandler());
  app.get('/readyz', readyzHandler(options.isReady));
  return app;
}

/**
 * `/metrics` in the Prometheus text format
 */
export function createMetricsApp(metrics: MetricsService): Express {
  const app = express();
  app.disable('x-powered-by');
  app.get('/metrics', metricsHandler(metrics));
  return app;
}

/**
 * Listen on a bind address; resolves once the socket is bound
 */
export function listen<S extends http.Server>(
  server: S,
  address: BindAddress,
  logger: Logger,
  name: string,
): Promise<S> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      logger.error(`${name} server failed to start`, error, { host: address.host, port: address.port });
      reject(error);
    };
    server.once('error', onError);
    server.listen(address.port, address.host, () => {
      server.off('error', onError);
      logger.info(`${name} server started`, { host: address.host, port: address.port });
      resolve(server);
    });
  });
}

/**
 * Close a server and wait for open connections to finish
 */
export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
