/**
 * In-memory PAK archive with add/remove/lookup/extract operations.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { PakBinary, encodeEntryName } from './pak-binary.js';
import { PakError } from './errors.js';
import type { PakEntry, PakEntrySummary } from './types/pak-entry.js';
import type { PakBinaryStructure } from './types/pak-structure.js';

/**
 * Options for {@link PakArchive.add}.
 */
export interface AddEntryOptions {
  readonly name: string;
  readonly data: Buffer;
  /** Advisory only; replaced by the canonical offset on the next save. */
  readonly offset?: number;
}

/**
 * Destination for {@link PakArchive.writeEntry}.
 */
export interface EntryDestination {
  /**
   * With `preservePaths`, the base directory the entry's name is resolved
   * against; otherwise the exact file to write.
   */
  readonly outputPath: string;
  /** Recreate the `/` segments of the name as real directories. */
  readonly preservePaths: boolean;
}

/**
 * Options for {@link PakArchive.extractEntry}.
 */
export interface ExtractEntryOptions extends EntryDestination {
  readonly name: string;
}

/**
 * Resolves `name` beneath `baseDir`, refusing names that escape it.
 */
function resolveNestedPath(baseDir: string, name: string): string {
  const root: string = resolve(baseDir);
  const target: string = resolve(root, name);
  const rel: string = relative(root, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new PakError('UNSAFE_PATH', `Entry name "${name}" resolves outside ${root}`, { entryName: name });
  }
  return target;
}

/**
 * A PAK archive held fully in memory.
 *
 * Entries keep directory order. Names are not required to be unique:
 * {@link find}, {@link remove} and {@link extractEntry} always act on the
 * first entry with a matching name.
 */
export class PakArchive {
  private items: PakEntry[];
  private sourcePath: string | null;

  constructor(entries: readonly PakEntry[] = [], filePath: string | null = null) {
    this.items = entries.map((entry: PakEntry): PakEntry => ({ ...entry, size: entry.data.length }));
    this.sourcePath = filePath;
  }

  /**
   * Decodes an archive from a buffer.
   * @throws {PakError} If the buffer is not a valid archive
   */
  static fromBuffer(buffer: Buffer): PakArchive {
    const structure: PakBinaryStructure = PakBinary.decode({ buffer });
    return new PakArchive(structure.entries);
  }

  /**
   * Reads and decodes an archive from disk.
   * @throws {PakError} If the file is not a valid archive; file system errors propagate unchanged
   */
  static async fromFile(filePath: string): Promise<PakArchive> {
    const structure: PakBinaryStructure = await PakBinary.read({ filePath });
    return new PakArchive(structure.entries, filePath);
  }

  /** Entries in directory order. */
  get entries(): readonly PakEntry[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  /** Path the archive was loaded from or last saved to. */
  get filePath(): string | null {
    return this.sourcePath;
  }

  list(): PakEntrySummary[] {
    return this.items.map(({ name, offset, size }: PakEntry): PakEntrySummary => ({ name, offset, size }));
  }

  /**
   * Appends an entry.
   *
   * No uniqueness check is made: adding a name that already exists leaves the
   * earlier entry in place, and lookups by that name keep returning it.
   *
   * @returns The stored entry
   * @throws {PakError} NAME_TOO_LONG or INVALID_NAME
   */
  add({ name, data, offset }: AddEntryOptions): PakEntry {
    encodeEntryName(name);
    const pending: PakEntry = { name, offset: 0, size: data.length, data };
    const canonical: number = PakBinary.layout({ entries: [...this.items, pending] })[this.items.length];
    const entry: PakEntry = { ...pending, offset: offset ?? canonical };
    this.items.push(entry);
    return entry;
  }

  /**
   * Reads a file from disk and appends it.
   *
   * @param inputPath - File to read
   * @param entryName - Name inside the archive; defaults to the file's basename
   */
  async appendFile({ inputPath, entryName }: { readonly inputPath: string; readonly entryName?: string }): Promise<PakEntry> {
    const name: string = (entryName ?? basename(inputPath)).replace(/\\/g, '/');
    // Validate before touching the disk.
    encodeEntryName(name);
    const data: Buffer = await readFile(inputPath);
    return this.add({ name, data });
  }

  has(name: string): boolean {
    return this.items.some((entry: PakEntry) => entry.name === name);
  }

  /**
   * Returns the first entry named `name`.
   * @throws {PakError} NOT_FOUND
   */
  find(name: string): PakEntry {
    const match: PakEntry | undefined = this.items.find((entry: PakEntry) => entry.name === name);
    if (!match) {
      throw new PakError('NOT_FOUND', `Entry not found: ${name}`, { entryName: name });
    }
    return match;
  }

  /**
   * Removes the first entry named `name`.
   * @returns The removed entry
   * @throws {PakError} NOT_FOUND, leaving the entries unchanged
   */
  remove(name: string): PakEntry {
    const index: number = this.items.findIndex((entry: PakEntry) => entry.name === name);
    if (index === -1) {
      throw new PakError('NOT_FOUND', `Entry not found: ${name}`, { entryName: name });
    }
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  /**
   * Replaces the data of the first entry named `name`, keeping its position.
   *
   * @returns The new entry
   * @throws {PakError} NOT_FOUND
   */
  replace({ name, data }: { readonly name: string; readonly data: Buffer }): PakEntry {
    const index: number = this.items.findIndex((entry: PakEntry) => entry.name === name);
    if (index === -1) {
      throw new PakError('NOT_FOUND', `Entry not found: ${name}`, { entryName: name });
    }
    const entry: PakEntry = { ...this.items[index], size: data.length, data };
    this.items[index] = entry;
    return entry;
  }

  /**
   * Writes the data of the first entry named `name` to disk.
   *
   * @returns The path written
   * @throws {PakError} NOT_FOUND, or UNSAFE_PATH when a preserved name escapes the output directory
   */
  async extractEntry({ name, ...destination }: ExtractEntryOptions): Promise<string> {
    return this.writeEntry(this.find(name), destination);
  }

  /**
   * Writes a given entry's data to disk. Use this rather than
   * {@link extractEntry} to reach entries that share a name with an earlier one.
   *
   * @returns The path written
   * @throws {PakError} UNSAFE_PATH when a preserved name escapes the output directory
   */
  async writeEntry(entry: PakEntry, { outputPath, preservePaths }: EntryDestination): Promise<string> {
    const target: string = preservePaths ? resolveNestedPath(outputPath, entry.name) : resolve(outputPath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, entry.data);
    return target;
  }

  toBuffer(): Buffer {
    return PakBinary.encode({ entries: this.items });
  }

  /**
   * Encodes and writes the archive, then updates every entry's offset to where
   * it was written.
   *
   * @param outputPath - Destination; defaults to the path the archive was loaded from
   * @throws {PakError} INVALID_ARGUMENT when no destination is known, or any encode error
   */
  async save(outputPath?: string): Promise<void> {
    const target: string | null = outputPath ?? this.sourcePath;
    if (target === null) {
      throw new PakError('INVALID_ARGUMENT', 'No output path given and the archive was not loaded from a file');
    }
    const snapshot: PakEntry[] = [...this.items];
    await PakBinary.write({ entries: snapshot, outputPath: target });

    const offsets: number[] = PakBinary.layout({ entries: snapshot });
    this.items = snapshot.map((entry: PakEntry, i: number): PakEntry => ({ ...entry, offset: offsets[i], size: entry.data.length }));
    this.sourcePath = target;
  }

  toString(): string {
    return `<PakArchive from ${this.sourcePath ?? '<memory>'} with ${this.items.length} entries>`;
  }
}
