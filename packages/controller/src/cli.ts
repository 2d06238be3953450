#!/usr/bin/env tsx
/**
 * rbac-sync CLI
 *
 * Runs the RBACRule controller or checks manifests offline.
 * @module @rbac-sync/controller/cli
 */

import { Command } from 'commander';
import { isOutputFormat, setOutputFormat } from './output.js';
import { createRunCommand, createValidateCommand } from './commands/index.js';

const VERSION = '0.1.0';

const DESCRIPTION = `
rbac-sync

Keeps ServiceAccounts, RoleBindings and ClusterRoleBindings in line with
RBACRule resources.

Examples:
  $ rbac-sync run --kubeconfig ~/.kube/config --no-webhook
  $ rbac-sync validate config/samples/*.yaml
`;

function createProgram(): Command {
  const program = new Command();

  program
    .name('rbac-sync')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, plain', 'plain')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ output?: string; color?: boolean }>();
      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }
      if (opts.color === false) {
        process.env.FORCE_COLOR = '0';
      }
    });

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createValidateCommand());

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof Error) {
      console.error('Error:', err.message);
    }
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
