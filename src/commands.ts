/**
 * PAK command orchestrators.
 *
 * Each command loads an archive, performs one operation and reports progress
 * through the supplied logger. The CLI is a thin wrapper over these.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join, relative, resolve, sep } from 'node:path';
import { PakArchive } from './pak-archive.js';
import { PakBinary } from './pak-binary.js';
import { PakError } from './errors.js';
import type { PakEntry, PakEntrySummary } from './types/pak-entry.js';

/**
 * Sink for progress messages. `console` satisfies it.
 */
export interface PakLogger {
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

interface LoggerOption {
  readonly logger?: PakLogger;
}

export interface ListOptions extends LoggerOption {
  /** Append the SHA256 of each entry's data. */
  readonly hash?: boolean;
}

export interface ExtractOptions extends LoggerOption {
  /** Entry names to extract; all entries when empty or omitted. */
  readonly names?: readonly string[];
  /** Write every entry directly into the output directory under its basename. */
  readonly flat?: boolean;
}

export interface AppendOptions extends LoggerOption {
  /** Virtual directory prepended to each file's basename, e.g. "sound/". */
  readonly prefix?: string;
  /** Overwrite the data of the first existing entry with the same name, in place, instead of adding a duplicate. */
  readonly replace?: boolean;
  /** Start a new archive when the file does not exist. */
  readonly create?: boolean;
}

function formatRow(summary: PakEntrySummary, hash?: string): string {
  const columns: string[] = [String(summary.size).padStart(10), String(summary.offset).padStart(10), summary.name];
  if (hash !== undefined) {
    columns.push(hash);
  }
  return columns.join('  ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Lists the entries of an archive in directory order.
 *
 * @returns Name, size and offset of each entry
 */
export async function listPackage(pakFile: string, options: ListOptions = {}): Promise<PakEntrySummary[]> {
  const logger: PakLogger = options.logger ?? console;
  const archive: PakArchive = await PakArchive.fromFile(resolve(pakFile));

  for (const entry of archive.entries) {
    const hash: string | undefined = options.hash ? PakBinary.hashEntryData({ data: entry.data }) : undefined;
    logger.log(formatRow(entry, hash));
  }

  const totalBytes: number = archive.entries.reduce((total: number, entry: PakEntry) => total + entry.size, 0);
  logger.log(`${archive.length} entries, ${totalBytes} bytes`);
  return archive.list();
}

/**
 * Extracts entries from an archive into a directory.
 *
 * By default entry names are recreated as nested paths beneath `outputDir`.
 * With `flat`, each entry lands directly in `outputDir` under its basename;
 * later entries overwrite earlier ones that share a basename.
 *
 * @returns Paths written, in directory order
 * @throws {PakError} NOT_FOUND for a requested name that is not in the archive
 */
export async function extractPackage(pakFile: string, outputDir: string, options: ExtractOptions = {}): Promise<string[]> {
  const logger: PakLogger = options.logger ?? console;
  const archive: PakArchive = await PakArchive.fromFile(resolve(pakFile));
  const resolvedOutputDir: string = resolve(outputDir);

  // Named requests resolve to the first match; a full extract visits every
  // entry, so later duplicates overwrite earlier ones on disk.
  const requested: readonly PakEntry[] = options.names && options.names.length > 0
    ? options.names.map((name: string) => archive.find(name))
    : archive.entries;

  logger.log(`Extracting ${requested.length} of ${archive.length} entries to: ${resolvedOutputDir}`);

  const written: string[] = [];
  for (const entry of requested) {
    const target: string = options.flat
      ? await archive.writeEntry(entry, { outputPath: join(resolvedOutputDir, basename(entry.name)), preservePaths: false })
      : await archive.writeEntry(entry, { outputPath: resolvedOutputDir, preservePaths: true });
    logger.log(`  ✓ ${entry.name} -> ${target}`);
    written.push(target);
  }
  return written;
}

/**
 * Adds files to an archive and saves it in place.
 *
 * @returns The archive as saved
 */
export async function appendToPackage(pakFile: string, inputFiles: readonly string[], options: AppendOptions = {}): Promise<PakArchive> {
  const logger: PakLogger = options.logger ?? console;
  const resolvedPakFile: string = resolve(pakFile);

  let archive: PakArchive;
  try {
    archive = await PakArchive.fromFile(resolvedPakFile);
  } catch (error) {
    if (!options.create || !isMissingFile(error)) {
      throw error;
    }
    logger.log(`Creating new archive: ${resolvedPakFile}`);
    archive = new PakArchive([], resolvedPakFile);
  }

  for (const inputFile of inputFiles) {
    const entryName: string = `${options.prefix ?? ''}${basename(inputFile)}`;
    if (archive.has(entryName) && options.replace) {
      const entry: PakEntry = archive.replace({ name: entryName, data: await readFile(resolve(inputFile)) });
      logger.log(`  ~ ${entry.name} (${entry.size} bytes)`);
      continue;
    }
    if (archive.has(entryName)) {
      logger.warn(`⚠️  ${entryName} already exists; adding a duplicate entry`);
    }
    const entry: PakEntry = await archive.appendFile({ inputPath: resolve(inputFile), entryName });
    logger.log(`  + ${entry.name} (${entry.size} bytes)`);
  }

  await archive.save();
  logger.log(`Saved ${archive.length} entries to: ${resolvedPakFile}`);
  return archive;
}

/**
 * Removes entries by name and saves the archive in place.
 * Nothing is written if any name is missing.
 *
 * @throws {PakError} NOT_FOUND
 */
export async function removeFromPackage(pakFile: string, names: readonly string[], options: LoggerOption = {}): Promise<PakArchive> {
  const logger: PakLogger = options.logger ?? console;
  const archive: PakArchive = await PakArchive.fromFile(resolve(pakFile));

  for (const name of names) {
    const removed: PakEntry = archive.remove(name);
    logger.log(`  - ${removed.name} (${removed.size} bytes)`);
  }

  await archive.save();
  logger.log(`Saved ${archive.length} entries to: ${archive.filePath ?? resolve(pakFile)}`);
  return archive;
}

async function enumerateFiles(dir: string): Promise<string[]> {
  const children: string[] = (await readdir(dir)).sort();
  const files: string[] = [];
  for (const child of children) {
    const fullPath: string = join(dir, child);
    const info = await stat(fullPath);
    if (info.isDirectory()) {
      files.push(...(await enumerateFiles(fullPath)));
    } else if (info.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Packs every file under `inputDir` into a new archive.
 * Entries are named by their path relative to `inputDir`, joined with `/`.
 *
 * @throws {PakError} INVALID_ARGUMENT when the directory holds no files
 */
export async function createPackage(outputFile: string, inputDir: string, options: LoggerOption = {}): Promise<PakArchive> {
  const logger: PakLogger = options.logger ?? console;
  const resolvedInputDir: string = resolve(inputDir);
  const resolvedOutputFile: string = resolve(outputFile);

  const files: string[] = await enumerateFiles(resolvedInputDir);
  if (files.length === 0) {
    throw new PakError('INVALID_ARGUMENT', `No files found in directory: ${resolvedInputDir}`);
  }
  logger.log(`Found ${files.length} files to pack`);

  const archive: PakArchive = new PakArchive();
  for (const filePath of files) {
    const entryName: string = relative(resolvedInputDir, filePath).split(sep).join('/');
    await archive.appendFile({ inputPath: filePath, entryName });
  }

  await archive.save(resolvedOutputFile);
  logger.log(`Wrote ${archive.length} entries to: ${resolvedOutputFile}`);
  return archive;
}
