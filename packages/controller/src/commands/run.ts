/**
 * `rbac-sync run`
 *
 * Starts the controller in the foreground until SIGTERM or SIGINT.
 * @module @rbac-sync/controller/commands/run
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isValidationError } from '@rbac-sync/shared';
import { loadConfig, type ConfigFlags, type ControllerConfig } from '../config.js';
import { createController } from '../main.js';
import { error, info } from '../output.js';

function configOrExit(flags: ConfigFlags): ControllerConfig {
  try {
    return loadConfig(flags);
  } catch (err) {
    if (isValidationError(err)) {
      error(
        'Invalid configuration',
        err.details.map((detail) => `${detail.field}: ${detail.message}`),
      );
      process.exit(1);
    }
    throw err;
  }
}

async function runHandler(flags: ConfigFlags): Promise<void> {
  const config = configOrExit(flags);

  info('Starting rbac-sync controller…');
  const controller = createController(config);

  const shutdown = async (signal: string) => {
    console.log(chalk.yellow(`\nReceived ${signal}, shutting down gracefully…`));
    try {
      await controller.stop();
      process.exit(0);
    } catch (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
  });

  try {
    await controller.start();
  } catch (err) {
    console.error(chalk.red('Failed to start controller:'), err);
    await controller.stop().catch((stopErr: unknown) => console.error('Error during shutdown:', stopErr));
    process.exit(1);
  }
}

/**
 * Creates the `run` command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run the RBACRule controller against the current cluster')
    .option('--kubeconfig <path>', 'Kubeconfig file (default: $KUBECONFIG, ~/.kube/config, then in-cluster)')
    .option('--metrics-bind-address <address>', 'Metrics listener, as host:port, :port, or 0 to disable (default: :8080)')
    .option('--health-probe-bind-address <address>', 'Probe listener, as host:port, :port, or 0 to disable (default: :8081)')
    .option('--no-webhook', 'Do not serve the admission webhook')
    .option('--webhook-port <port>', 'HTTPS port of the admission webhook (default: 9443)')
    .option('--webhook-cert-path <dir>', 'Directory holding the webhook serving certificate')
    .option('--webhook-cert-name <file>', 'Certificate file name (default: tls.crt)')
    .option('--webhook-cert-key <file>', 'Key file name (default: tls.key)')
    .option('--max-concurrent-reconciles <n>', 'Rules reconciled in parallel (default: 4)')
    .option('--retry-delay-ms <ms>', 'Delay before retrying a namespace conflict (default: 500)')
    .option('--default-namespace <name>', 'Namespace filled into bindings that select none (default: default)')
    .option('--log-level <level>', 'debug, info, warn, error or fatal (default: info)')
    .action(runHandler);
}
