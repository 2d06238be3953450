/**
 * HTTPS listener for the admission webhook
 * @module @rbac-sync/controller/webhook/webhook-server
 */

import fs from 'node:fs';
import https from 'node:https';
import path from 'node:path';
import type { Express } from 'express';
import * as selfsigned from 'selfsigned';
import type { Logger } from '@rbac-sync/shared';
import type { ControllerConfig } from '../config.js';
import { listen } from '../http/health-server.js';

export interface TlsMaterial {
  cert: string | Buffer;
  key: string | Buffer;
}

/**
 * Read the serving certificate from the configured directory. Without one, a
 * self-signed certificate for localhost is generated so the webhook can be run
 * outside a cluster; the API server will not trust it.
 */
export function loadWebhookTls(
  config: Pick<ControllerConfig, 'webhookCertPath' | 'webhookCertName' | 'webhookKeyName'>,
  logger: Logger,
): TlsMaterial {
  const certFile = path.join(config.webhookCertPath, config.webhookCertName);
  const keyFile = path.join(config.webhookCertPath, config.webhookKeyName);

  if (fs.existsSync(certFile) && fs.existsSync(keyFile)) {
    logger.info('Using webhook serving certificate', { certFile, keyFile });
    return { cert: fs.readFileSync(certFile), key: fs.readFileSync(keyFile) };
  }

  logger.warn('No webhook serving certificate found. Generating a self-signed certificate.', { certFile, keyFile });
  const pems = selfsigned.generate([{ name: 'commonName', value: 'localhost' }], {
    algorithm: 'sha256',
    keySize: 2048,
    days: 30,
    extensions: [
      { name: 'basicConstraints', cA: false },
      { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
      { name: 'extKeyUsage', serverAuth: true },
      {
        name: 'subjectAltName',
        altNames: [
          { type: 2, value: 'localhost' },
          { type: 7, ip: '127.0.0.1' },
        ],
      },
    ],
  });
  return { cert: pems.cert, key: pems.private };
}

/**
 * Serve the admission app over HTTPS on all interfaces
 */
export function startWebhookServer(
  app: Express,
  config: Pick<ControllerConfig, 'webhookPort' | 'webhookCertPath' | 'webhookCertName' | 'webhookKeyName'>,
  logger: Logger,
): Promise<https.Server> {
  const tls = loadWebhookTls(config, logger);
  const server = https.createServer({ cert: tls.cert, key: tls.key }, app);
  return listen(server, { host: '0.0.0.0', port: config.webhookPort }, logger, 'Webhook');
}
