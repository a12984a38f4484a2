/**
 * Folder Commands
 *
 * mkdir, rmdir, rm-files, mv-files
 */

import { Command } from 'commander';
import { defaultContext, runWithClient } from '../lib/CommandRunner.js';
import type { CommandContext } from '../lib/CommandRunner.js';

/**
 * Register folder commands
 */
export function registerFolderCommands(program: Command, context: CommandContext = defaultContext): void {
  program
    .command('mkdir <path>')
    .description('Create a remote folder and any missing parents')
    .action(async (folder: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Creating ${folder}...`, 'Failed to create folder', async (client, formatter) => {
        await client.createFolder(folder);
        formatter.success(`Created ${folder}`);
      });
    });

  program
    .command('rmdir <path>')
    .description('Delete a remote folder with all of its content')
    .action(async (folder: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Deleting ${folder}...`, 'Failed to delete folder', async (client, formatter) => {
        await client.deleteFolder(folder);
        formatter.success(`Deleted ${folder}`);
      });
    });

  program
    .command('rm-files <folder> <wildcard>')
    .description('Delete the files of a remote folder matching a wildcard')
    .action(async (folder: string, wildcard: string, _options: unknown, cmd: Command) => {
      await runWithClient(cmd, context, `Deleting ${wildcard} in ${folder}...`, 'Delete failed', async (client, formatter) => {
        const count = await client.deleteFiles(folder, wildcard);
        formatter.success(`Deleted ${count} file(s) in ${folder}`);
      });
    });

  program
    .command('mv-files <srcFolder> <dstFolder> [wildcard]')
    .description('Move the matching files of a remote folder into another folder')
    .action(
      async (source: string, target: string, wildcard: string | undefined, _options: unknown, cmd: Command) => {
        await runWithClient(cmd, context, `Moving files to ${target}...`, 'Move failed', async (client, formatter) => {
          const count = await client.moveFiles(source, target, wildcard);
          formatter.success(`Moved ${count} file(s) from ${source} to ${target}`);
        });
      }
    );
}
