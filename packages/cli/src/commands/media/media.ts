import { Command } from 'commander';
import { MediaCommand } from './media-command';
import { addCallerOptions, addOutputOptions } from '../../base/command-options';
import type {
  MediaNewOptions,
  MediaRemoveOptions,
  MediaShowOptions,
  MediaTransferOptions,
  MediaUpdateOptions,
} from './media-command';

const parseSize = (value: string): number => Number(value);

function addFieldOptions(command: Command): Command {
  return command
    .requiredOption('-n, --name <name>', 'File name (1-64 characters)')
    .requiredOption('-s, --size <bytes>', 'Size in bytes', parseSize)
    .requiredOption('-d, --summary <text>', 'Short description (1-128 characters)')
    .requiredOption('-l, --label <label...>', 'Category label(s), 1-10 of 1-32 characters');
}

export function registerMediaCommands(program: Command): void {
  const mediaCommand = new MediaCommand();

  const media = program
    .command('media')
    .description('Archive and manage media records')
    .alias('m');

  // medialedger media new -n clip.mp4 -s 2048 -d "Opening shot" -l video intro
  addCallerOptions(addFieldOptions(
    media
      .command('new')
      .description('Archive a new media record owned by the caller')
      .alias('n')
  )).action(async (options: MediaNewOptions) => {
    await mediaCommand.executeNew(options);
  });

  addOutputOptions(
    media
      .command('show <recordId>')
      .description('Show a media record')
  ).action(async (recordId: string, options: MediaShowOptions) => {
    await mediaCommand.executeShow(recordId, options);
  });

  addCallerOptions(addFieldOptions(
    media
      .command('update <recordId>')
      .description('Replace the metadata of an owned media record')
  )).action(async (recordId: string, options: MediaUpdateOptions) => {
    await mediaCommand.executeUpdate(recordId, options);
  });

  addCallerOptions(
    media
      .command('transfer <recordId> <newOwner>')
      .description('Transfer an owned media record to another principal')
  ).action(async (recordId: string, newOwner: string, options: MediaTransferOptions) => {
    await mediaCommand.executeTransfer(recordId, newOwner, options);
  });

  addCallerOptions(
    media
      .command('remove <recordId>')
      .description('Delete an owned media record')
      .alias('rm')
  ).action(async (recordId: string, options: MediaRemoveOptions) => {
    await mediaCommand.executeRemove(recordId, options);
  });
}
