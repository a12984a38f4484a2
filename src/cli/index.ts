#!/usr/bin/env node
/**
 * sftp-cli
 *
 * Command-line front end of the SFTP session client. Every command opens one
 * session, runs, and disconnects.
 *
 * Usage: sftp-cli [options] <command> [arguments]
 *
 * Connection settings come from SFTP_* environment variables (a .env file in
 * the working directory is read too) and can be overridden by flags.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerFileCommands } from './commands/files.js';
import { registerFolderCommands } from './commands/folders.js';
import { defaultContext } from './lib/CommandRunner.js';
import type { CommandContext } from './lib/CommandRunner.js';
import { LogLevel, initializeLogging, setGlobalLevel, shutdownLogging } from '../logging/index.js';
import type { GlobalOptions } from './types/index.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(context: CommandContext = defaultContext): Command {
  const program = new Command();

  program
    .name('sftp-cli')
    .description('Transfer and manage files on an SFTP server')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-H, --host <host>', 'Server host (SFTP_HOST)')
    .option('-P, --port <port>', 'Server port (SFTP_PORT)')
    .option('-u, --user <username>', 'User name (SFTP_USER)')
    .option('-p, --password <password>', 'Password (SFTP_PASSWORD)')
    .option('-k, --key <file>', 'Private key file (SFTP_PRIVATE_KEY_FILE)')
    .option('--passphrase <passphrase>', 'Private key passphrase (SFTP_PASSPHRASE)')
    .option('--timeout <ms>', 'Connect timeout in milliseconds (SFTP_TIMEOUT_MS)')
    .option('--known-hosts <file>', 'known_hosts file to verify the server against (SFTP_KNOWN_HOSTS)')
    .option('--host-key <base64>', 'Trusted server key (SFTP_HOST_KEY)')
    .option('--host-key-type <type>', 'Type of --host-key, e.g. ssh-ed25519 (SFTP_HOST_KEY_TYPE)')
    .option('--no-host-key-check', 'Accept any server key (SFTP_NO_HOST_KEY_CHECK)')
    .option('--keep-alive <ms>', 'Keep-alive interval in milliseconds (SFTP_KEEP_ALIVE_MS)')
    .option('--overwrite <policy>', 'never | always | add-suffix-before-extension | add-suffix-after-extension (SFTP_OVERWRITE)')
    .option('--transactional', 'Write to a temporary name, then rename (SFTP_TRANSACTIONAL)')
    .option('--no-transactional', 'Write directly to the destination')
    .option('--strict', 'Fail when sources or destination folders are missing (SFTP_STRICT)')
    .option('--no-strict', 'Skip existence checks')
    .option('--create-dirs', 'Create missing destination folders (SFTP_CREATE_DIRS)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    initializeLogging();
    if (opts.verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    } else if (!process.env['LOG_LEVEL']) {
      setGlobalLevel(LogLevel.WARN);
    }
  });

  registerFileCommands(program, context);
  registerFolderCommands(program, context);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# List CSV files')}
  $ sftp-cli -H sftp.example.com -u deploy ls /inbox '*.csv'

  ${chalk.gray('# Upload, keeping existing files by numbering the new ones')}
  $ sftp-cli --overwrite add-suffix-before-extension put report.csv summary.csv --to /inbox

  ${chalk.gray('# Download everything in a folder')}
  $ sftp-cli mget /outbox ./received

  ${chalk.gray('# Archive processed files')}
  $ sftp-cli --create-dirs mv-files /inbox /archive/2026 '*.done'
`
  );

  program.on('command:*', () => {
    console.error(chalk.red('Unknown command:'), program.args.join(' '));
    console.log();
    console.log('Run', chalk.cyan('sftp-cli --help'), 'for usage information.');
    process.exit(1);
  });

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
