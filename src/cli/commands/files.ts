/**
 * File Commands
 *
 * ls, stat, put, get, mget, rm, mv
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { defaultContext, runWithClient } from '../lib/CommandRunner.js';
import type { CommandContext } from '../lib/CommandRunner.js';
import { formatRemoteFileDetails, formatRemoteFileTable } from '../lib/OutputFormatter.js';

/**
 * Register file commands
 */
export function registerFileCommands(program: Command, context: CommandContext = defaultContext): void {
  // ==========================================================================
  // ls <folder> [wildcard]
  // ==========================================================================
  program
    .command('ls <folder> [wildcard]')
    .description('List a remote folder, optionally filtered by a wildcard such as *.csv')
    .action(async (folder: string, wildcard: string | undefined, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Listing ${folder}...`, 'Failed to list folder', async (client, formatter) => {
        const files = await client.listFiles(folder, wildcard);
        if (files.length === 0 && !formatter.isJson()) {
          formatter.warn('No matching entries');
          return;
        }
        formatter.output(
          formatRemoteFileTable(files) + '\n\n' + chalk.gray(`${files.length} entr${files.length === 1 ? 'y' : 'ies'}`),
          files
        );
      });
    });

  // ==========================================================================
  // stat <path>
  // ==========================================================================
  program
    .command('stat <path>')
    .description('Show type and size of a remote entry')
    .action(async (remotePath: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Checking ${remotePath}...`, 'Failed to stat', async (client, formatter) => {
        const file = await client.statRemoteFile(remotePath);
        if (!file) {
          formatter.error(`Not found: ${remotePath}`);
          process.exitCode = 1;
          return;
        }
        formatter.output(formatRemoteFileDetails(file), file);
      });
    });

  // ==========================================================================
  // put <local...> --to <remoteFolder>
  // ==========================================================================
  program
    .command('put <local...>')
    .description('Upload local files into a remote folder')
    .requiredOption('-t, --to <remoteFolder>', 'Remote destination folder')
    .action(async (locals: string[], options: { to: string }, cmd: Command) => {
      await runWithClient(cmd, context, `Uploading ${locals.length} file(s)...`, 'Upload failed', async (client, formatter) => {
        const written = await client.uploadFiles(options.to, locals);
        formatter.output(written.map((name) => `${chalk.green('✔')} ${name}`).join('\n'), { uploaded: written });
      });
    });

  // ==========================================================================
  // get <remote> <local>
  // ==========================================================================
  program
    .command('get <remote> <local>')
    .description('Download a remote file')
    .action(async (remotePath: string, localPath: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Downloading ${remotePath}...`, 'Download failed', async (client, formatter) => {
        const written = await client.downloadFile(remotePath, localPath);
        formatter.output(`${chalk.green('✔')} ${remotePath} -> ${written}`, { downloaded: written });
      });
    });

  // ==========================================================================
  // mget <folder> <localFolder> [wildcard]
  // ==========================================================================
  program
    .command('mget <folder> <localFolder> [wildcard]')
    .description('Download the matching files of a remote folder (not recursive)')
    .action(
      async (folder: string, localFolder: string, wildcard: string | undefined, _options: unknown, cmd: Command) => {
        await runWithClient(cmd, context, `Downloading from ${folder}...`, 'Download failed', async (client, formatter) => {
          const written = await client.downloadFiles(folder, localFolder, wildcard);
          formatter.output(
            written.map((name) => `${chalk.green('✔')} ${name}`).join('\n') + '\n' + chalk.gray(`${written.length} file(s)`),
            { downloaded: written }
          );
        });
      }
    );

  // ==========================================================================
  // rm <path>
  // ==========================================================================
  program
    .command('rm <path>')
    .description('Delete a remote file')
    .action(async (remotePath: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Deleting ${remotePath}...`, 'Delete failed', async (client, formatter) => {
        await client.deleteRemoteFile(remotePath);
        formatter.success(`Deleted ${remotePath}`);
      });
    });

  // ==========================================================================
  // mv <src> <dst>
  // ==========================================================================
  program
    .command('mv <src> <dst>')
    .description('Rename or move a remote file')
    .action(async (source: string, target: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Moving ${source}...`, 'Move failed', async (client, formatter) => {
        await client.renameRemoteFile(source, target);
        formatter.success(`Moved ${source} -> ${target}`);
      });
    });
}
