/**
 * Command Runner
 *
 * Shared plumbing of the file commands: builds a client from the global
 * options, shows a spinner while the operation runs, reports failures and
 * always disconnects.
 */

import { Command } from 'commander';
import ora from 'ora';
import { SftpClient } from '../../sftp/SftpClient.js';
import type { SftpClientSettings } from '../../sftp/SftpClientConfig.js';
import { describeError } from '../../sftp/errors.js';
import type { GlobalOptions } from '../types/index.js';
import { loadConnectionConfig } from './ConnectionConfig.js';
import { OutputFormatter } from './OutputFormatter.js';

export type ClientFactory = (settings: SftpClientSettings) => SftpClient;

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  createClient: ClientFactory;
}

export const defaultContext: CommandContext = {
  env: process.env,
  createClient: (settings) => new SftpClient(settings),
};

/**
 * Formatter that clears the spinner before anything is printed.
 */
class SpinnerAwareFormatter extends OutputFormatter {
  constructor(
    jsonMode: boolean | undefined,
    private readonly spinner: ora.Ora | null
  ) {
    super(jsonMode);
  }

  override output(tableOutput: string, jsonData: unknown): void {
    this.spinner?.stop();
    super.output(tableOutput, jsonData);
  }

  override success(message: string): void {
    this.spinner?.stop();
    super.success(message);
  }

  override error(message: string, details?: unknown): void {
    this.spinner?.stop();
    super.error(message, details);
  }

  override warn(message: string): void {
    this.spinner?.stop();
    super.warn(message);
  }
}

/**
 * Run one operation against a fresh client. Failures are printed and set
 * the exit code to 1.
 *
 * @param progress spinner text, suppressed in JSON mode
 * @param failure message printed before the error reason
 */
export async function runWithClient(
  cmd: Command,
  context: CommandContext,
  progress: string,
  failure: string,
  operation: (client: SftpClient, formatter: OutputFormatter) => Promise<void>
): Promise<void> {
  const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
  const spinner = globalOpts.json ? null : ora(progress).start();
  const formatter = new SpinnerAwareFormatter(globalOpts.json, spinner);

  let client: SftpClient | null = null;
  try {
    client = context.createClient(loadConnectionConfig(context.env, globalOpts));
    await operation(client, formatter);
  } catch (error) {
    formatter.error(failure, describeError(error));
    process.exitCode = 1;
  } finally {
    spinner?.stop();
    if (client) {
      await client.disconnect();
    }
  }
}
