/**
 * Controller configuration
 * @module @rbac-sync/controller/config
 *
 * Values resolve in the order defaults, environment, command-line flags.
 */

import {
  DEFAULT_FALLBACK_NAMESPACE,
  ValidationError,
  isLogLevel,
  validateNamespaceName,
  type LogLevel,
  type ValidationErrorDetail,
} from '@rbac-sync/shared';

/**
 * Host and port a listener binds to
 */
export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Resolved controller configuration
 */
export interface ControllerConfig {
  /** Metrics listener, null when disabled */
  metricsAddress: BindAddress | null;
  /** Health probe listener, null when disabled */
  healthProbeAddress: BindAddress | null;
  enableWebhook: boolean;
  webhookPort: number;
  /** Directory holding the webhook serving certificate */
  webhookCertPath: string;
  webhookCertName: string;
  webhookKeyName: string;
  maxConcurrentReconciles: number;
  /** Delay before retrying a pass that failed to write an object */
  retryDelayMs: number;
  /** Namespace filled in by the defaulting webhook */
  defaultNamespace: string;
  logLevel: LogLevel;
  /** Explicit kubeconfig file; in-cluster or $KUBECONFIG otherwise */
  kubeconfig?: string;
}

/**
 * Raw command-line flags, as commander hands them over
 */
export interface ConfigFlags {
  metricsBindAddress?: string;
  healthProbeBindAddress?: string;
  /** false when --no-webhook was given */
  webhook?: boolean;
  webhookPort?: string;
  webhookCertPath?: string;
  webhookCertName?: string;
  webhookCertKey?: string;
  maxConcurrentReconciles?: string;
  retryDelayMs?: string;
  defaultNamespace?: string;
  logLevel?: string;
  kubeconfig?: string;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_METRICS_BIND_ADDRESS = ':8080';
export const DEFAULT_HEALTH_PROBE_BIND_ADDRESS = ':8081';
export const DEFAULT_WEBHOOK_PORT = 9443;
export const DEFAULT_WEBHOOK_CERT_PATH = '/tmp/k8s-webhook-server/serving-certs';
export const DEFAULT_MAX_CONCURRENT_RECONCILES = 4;
export const DEFAULT_RETRY_DELAY_MS = 500;

/**
 * Parse `host:port`, `:port` or `0`. Returns null for `0` (listener disabled).
 */
export function parseBindAddress(value: string): BindAddress | null {
  if (value === '0') {
    return null;
  }
  const separator = value.lastIndexOf(':');
  if (separator < 0) {
    throw ValidationError.invalidFormat('bindAddress', 'host:port, :port or 0');
  }
  const host = value.slice(0, separator).replace(/^\[(.*)\]$/, '$1') || '0.0.0.0';
  const port = Number(value.slice(separator + 1));
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw ValidationError.invalidFormat('bindAddress', 'a port between 0 and 65535');
  }
  return { host, port };
}

function pick(flag: string | undefined, envValue: string | undefined, fallback: string): string {
  return flag ?? envValue ?? fallback;
}

/**
 * Build the configuration, collecting every invalid value into one ValidationError
 */
export function loadConfig(flags: ConfigFlags = {}, env: Environment = process.env): ControllerConfig {
  const errors: ValidationErrorDetail[] = [];

  const address = (field: string, raw: string): BindAddress | null => {
    try {
      return parseBindAddress(raw);
    } catch {
      errors.push({ field, message: `"${raw}" is not host:port, :port or 0`, code: 'INVALID_FORMAT' });
      return null;
    }
  };

  const integer = (field: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
      errors.push({ field, message: `"${raw}" must be an integer between ${min} and ${max}`, code: 'OUT_OF_RANGE' });
      return min;
    }
    return value;
  };

  const metricsAddress = address(
    'metricsBindAddress',
    pick(flags.metricsBindAddress, env.METRICS_BIND_ADDRESS, DEFAULT_METRICS_BIND_ADDRESS),
  );
  const healthProbeAddress = address(
    'healthProbeBindAddress',
    pick(flags.healthProbeBindAddress, env.HEALTH_PROBE_BIND_ADDRESS, DEFAULT_HEALTH_PROBE_BIND_ADDRESS),
  );

  const webhookPort = integer(
    'webhookPort',
    pick(flags.webhookPort, env.WEBHOOK_PORT, String(DEFAULT_WEBHOOK_PORT)),
    1,
    65535,
  );
  const maxConcurrentReconciles = integer(
    'maxConcurrentReconciles',
    pick(flags.maxConcurrentReconciles, env.MAX_CONCURRENT_RECONCILES, String(DEFAULT_MAX_CONCURRENT_RECONCILES)),
    1,
  );
  const retryDelayMs = integer(
    'retryDelayMs',
    pick(flags.retryDelayMs, env.RETRY_DELAY_MS, String(DEFAULT_RETRY_DELAY_MS)),
    0,
  );

  const defaultNamespace = pick(flags.defaultNamespace, env.DEFAULT_NAMESPACE, DEFAULT_FALLBACK_NAMESPACE);
  const namespaceError = validateNamespaceName(defaultNamespace, 'defaultNamespace');
  if (namespaceError) {
    errors.push(namespaceError);
  }

  const rawLevel = pick(flags.logLevel, env.LOG_LEVEL, 'info');
  let logLevel: LogLevel = 'info';
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    errors.push({
      field: 'logLevel',
      message: `"${rawLevel}" is not one of debug, info, warn, error, fatal`,
      code: 'INVALID_VALUE',
    });
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }

  const config: ControllerConfig = {
    metricsAddress,
    healthProbeAddress,
    enableWebhook: flags.webhook !== false && env.ENABLE_WEBHOOK !== 'false',
    webhookPort,
    webhookCertPath: pick(flags.webhookCertPath, env.WEBHOOK_CERT_PATH, DEFAULT_WEBHOOK_CERT_PATH),
    webhookCertName: pick(flags.webhookCertName, env.WEBHOOK_CERT_NAME, 'tls.crt'),
    webhookKeyName: pick(flags.webhookCertKey, env.WEBHOOK_CERT_KEY, 'tls.key'),
    maxConcurrentReconciles,
    retryDelayMs,
    defaultNamespace,
    logLevel,
  };
  if (flags.kubeconfig) {
    config.kubeconfig = flags.kubeconfig;
  }
  return config;
}
