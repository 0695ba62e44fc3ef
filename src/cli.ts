#!/usr/bin/env node
/**
 * PAK Tools - CLI Interface
 *
 * Command-line interface for listing, extracting and editing Quake-family .pak archives.
 */

import { Command } from 'commander';
import { appendToPackage, createPackage, extractPackage, listPackage, removeFromPackage } from './commands.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

async function run(label: string, action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(`❌ ${label} failed:`, error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

program
  .name('pak-tools')
  .description('Read, extract and edit Quake-family .pak archives')
  .version(version);

program
  .command('list')
  .description('List the entries of a .pak archive')
  .argument('<pak-file>', 'Path to the archive')
  .option('--hash', 'Show the SHA256 of each entry')
  .action(async (pakFile: string, options: { hash?: boolean }) => {
    await run('List', () => listPackage(pakFile, { hash: options.hash }));
  });

program
  .command('extract')
  .description('Extract entries from a .pak archive')
  .argument('<pak-file>', 'Path to the archive')
  .argument('[names...]', 'Entry names to extract (default: all)')
  .option('-o, --output <dir>', 'Directory to extract into', '.')
  .option('--flat', 'Write entries by basename instead of recreating their directories')
  .action(async (pakFile: string, names: string[], options: { output: string; flat?: boolean }) => {
    await run('Extract', async () => {
      const written = await extractPackage(pakFile, options.output, { names, flat: options.flat });
      console.log('');
      console.log(`✅ Extracted ${written.length} entries`);
    });
  });

program
  .command('append')
  .description('Add files to a .pak archive')
  .argument('<pak-file>', 'Path to the archive')
  .argument('<files...>', 'Files to add')
  .option('--prefix <path>', 'Virtual directory to store the files under, e.g. "sound/"')
  .option('--replace', 'Replace entries that already exist instead of adding duplicates')
  .option('--create', 'Create the archive if it does not exist')
  .action(async (pakFile: string, files: string[], options: { prefix?: string; replace?: boolean; create?: boolean }) => {
    await run('Append', async () => {
      await appendToPackage(pakFile, files, options);
      console.log('');
      console.log('✅ Append completed successfully!');
    });
  });

program
  .command('remove')
  .description('Remove entries from a .pak archive')
  .argument('<pak-file>', 'Path to the archive')
  .argument('<names...>', 'Entry names to remove')
  .action(async (pakFile: string, names: string[]) => {
    await run('Remove', async () => {
      await removeFromPackage(pakFile, names);
      console.log('');
      console.log('✅ Remove completed successfully!');
    });
  });

program
  .command('create')
  .description('Pack a directory tree into a new .pak archive')
  .argument('<output-file>', 'Path where the archive will be written')
  .argument('<input-dir>', 'Directory whose files will be packed')
  .action(async (outputFile: string, inputDir: string) => {
    await run('Create', async () => {
      await createPackage(outputFile, inputDir);
      console.log('');
      console.log('✅ Create completed successfully!');
    });
  });

await program.parseAsync();
