/**
 * PAK binary codec for Quake-family archives.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import {
  PAK_MAGIC,
  HEADER_SIZE,
  DIRECTORY_ENTRY_SIZE,
  NAME_FIELD_SIZE,
  MAX_NAME_LENGTH,
  ENTRY_OFFSET_FIELD,
  ENTRY_SIZE_FIELD,
  MAX_ARCHIVE_SIZE,
} from './constants/pak-format.js';
import { PakError } from './errors.js';
import type { PakEntry } from './types/pak-entry.js';
import type { PakBinaryStructure, PakHeader } from './types/pak-structure.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Encodes an entry name for the 56-byte name field.
 * @param name - Entry name
 * @returns UTF-8 bytes of the name, without terminator
 * @throws {PakError} INVALID_NAME if the name contains a NUL character,
 * NAME_TOO_LONG if it encodes to more than 55 bytes
 */
export function encodeEntryName(name: string): Buffer {
  if (name.includes('\0')) {
    throw new PakError('INVALID_NAME', `Entry name contains a NUL character: ${JSON.stringify(name)}`, { entryName: name });
  }
  const bytes: Buffer = Buffer.from(name, 'utf8');
  if (bytes.length > MAX_NAME_LENGTH) {
    throw new PakError('NAME_TOO_LONG', `Entry name "${name}" is ${bytes.length} bytes, limit is ${MAX_NAME_LENGTH}`, { entryName: name });
  }
  return bytes;
}

/**
 * Parses and validates the 12-byte header.
 * @throws {PakError} MALFORMED_HEADER or MALFORMED_DIRECTORY
 */
function readHeader(buffer: Buffer, source: string): PakHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new PakError('MALFORMED_HEADER', `File too small to be a PAK archive (${buffer.length} bytes): ${source}`);
  }
  const magic: string = buffer.toString('latin1', 0, 4);
  if (magic !== PAK_MAGIC) {
    throw new PakError('MALFORMED_HEADER', `Invalid PAK magic ${JSON.stringify(magic)} in ${source}`, { offset: 0 });
  }
  const directoryOffset: number = buffer.readUInt32LE(4);
  const directorySize: number = buffer.readUInt32LE(8);
  if (directorySize % DIRECTORY_ENTRY_SIZE !== 0) {
    throw new PakError('MALFORMED_DIRECTORY', `Directory size ${directorySize} is not a multiple of ${DIRECTORY_ENTRY_SIZE}`, { offset: 8 });
  }
  if (directoryOffset + directorySize > buffer.length) {
    throw new PakError('MALFORMED_DIRECTORY', `Directory extends beyond file bounds: offset=${directoryOffset}, size=${directorySize}, fileSize=${buffer.length}`, { offset: directoryOffset });
  }
  if (directorySize > 0 && directoryOffset < HEADER_SIZE) {
    throw new PakError('MALFORMED_DIRECTORY', `Directory at offset ${directoryOffset} overlaps the header`, { offset: directoryOffset });
  }
  return { magic, directoryOffset, directorySize };
}

function readEntryName(record: Buffer, recordOffset: number): string {
  const terminator: number = record.indexOf(0);
  if (terminator === -1) {
    throw new PakError('MALFORMED_DIRECTORY', `Entry name at offset ${recordOffset} is not null-terminated within ${NAME_FIELD_SIZE} bytes`, { offset: recordOffset });
  }
  try {
    return utf8Decoder.decode(record.subarray(0, terminator));
  } catch (error) {
    throw new PakError('MALFORMED_DIRECTORY', `Entry name at offset ${recordOffset} is not valid UTF-8`, { offset: recordOffset, cause: error });
  }
}

/**
 * Parses a single 64-byte directory record and copies out its data.
 *
 * @param buffer - Whole archive buffer
 * @param recordOffset - Offset of the record in the buffer
 * @param header - Parsed header, used to reject data overlapping the directory
 * @throws {PakError} If the name is unterminated or the data range is invalid
 */
function parseEntry(buffer: Buffer, recordOffset: number, header: PakHeader): PakEntry {
  const record: Buffer = buffer.subarray(recordOffset, recordOffset + DIRECTORY_ENTRY_SIZE);
  const name: string = readEntryName(record.subarray(0, NAME_FIELD_SIZE), recordOffset);
  const offset: number = record.readUInt32LE(ENTRY_OFFSET_FIELD);
  const size: number = record.readUInt32LE(ENTRY_SIZE_FIELD);

  if (offset + size > buffer.length) {
    throw new PakError('OUT_OF_BOUNDS', `Entry "${name}" extends beyond file bounds: offset=${offset}, size=${size}, fileSize=${buffer.length}`, { entryName: name, offset });
  }
  if (size > 0) {
    const directoryEnd: number = header.directoryOffset + header.directorySize;
    const overlapsHeader: boolean = offset < HEADER_SIZE;
    const overlapsDirectory: boolean = header.directorySize > 0 && offset < directoryEnd && offset + size > header.directoryOffset;
    if (overlapsHeader || overlapsDirectory) {
      throw new PakError('OUT_OF_BOUNDS', `Entry "${name}" overlaps the ${overlapsHeader ? 'header' : 'directory'}: offset=${offset}, size=${size}`, { entryName: name, offset });
    }
  }

  return { name, offset, size, data: Buffer.from(buffer.subarray(offset, offset + size)) };
}

function parseEntries(buffer: Buffer, header: PakHeader): PakEntry[] {
  const entries: PakEntry[] = [];
  const entryCount: number = header.directorySize / DIRECTORY_ENTRY_SIZE;
  for (let index = 0; index < entryCount; index++) {
    entries.push(parseEntry(buffer, header.directoryOffset + index * DIRECTORY_ENTRY_SIZE, header));
  }
  return entries;
}

function computeLayout(entries: readonly PakEntry[]): number[] {
  const offsets: number[] = [];
  let cursor: number = HEADER_SIZE + entries.length * DIRECTORY_ENTRY_SIZE;
  for (const entry of entries) {
    offsets.push(cursor);
    cursor += entry.data.length;
  }
  return offsets;
}

/**
 * Builds the header and directory region for a set of entries.
 * Every name is validated before anything is written.
 */
function buildDirectory(entries: readonly PakEntry[], offsets: readonly number[]): Buffer {
  const names: Buffer[] = entries.map((entry: PakEntry) => encodeEntryName(entry.name));
  const directory: Buffer = Buffer.alloc(HEADER_SIZE + entries.length * DIRECTORY_ENTRY_SIZE);

  directory.write(PAK_MAGIC, 0, 'latin1');
  directory.writeUInt32LE(HEADER_SIZE, 4);
  directory.writeUInt32LE(entries.length * DIRECTORY_ENTRY_SIZE, 8);

  for (let i = 0; i < entries.length; i++) {
    const recordOffset: number = HEADER_SIZE + i * DIRECTORY_ENTRY_SIZE;
    // Buffer.alloc zero-fills, so the name stays null-terminated and padded.
    names[i].copy(directory, recordOffset);
    directory.writeUInt32LE(offsets[i], recordOffset + ENTRY_OFFSET_FIELD);
    directory.writeUInt32LE(entries[i].data.length, recordOffset + ENTRY_SIZE_FIELD);
  }
  return directory;
}

/**
 * PAK (Quake-family package) binary processing utilities.
 * Decoding is strict: the first structural violation aborts the whole read.
 * Encoding lays the archive out canonically: header, directory, then data in
 * directory order, with every offset recomputed.
 */
export class PakBinary {
  /**
   * Parses a complete archive buffer.
   *
   * @param buffer - Whole archive contents
   * @param filePath - Source path recorded on the structure and used in messages
   * @returns Header and entries in directory order, each with its own copy of the data
   * @throws {PakError} MALFORMED_HEADER, MALFORMED_DIRECTORY or OUT_OF_BOUNDS
   */
  static decode({ buffer, filePath = null }: { readonly buffer: Buffer; readonly filePath?: string | null }): PakBinaryStructure {
    const header: PakHeader = readHeader(buffer, filePath ?? '<buffer>');
    const entries: PakEntry[] = parseEntries(buffer, header);
    const sha256: string = createHash('sha256').update(buffer).digest('hex');
    return { filePath, sha256, header, entries, totalSize: buffer.length };
  }

  /**
   * Canonical data offsets for `entries`, in the order `encode` writes them.
   */
  static layout({ entries }: { readonly entries: readonly PakEntry[] }): number[] {
    return computeLayout(entries);
  }

  /**
   * Serializes entries to a complete archive buffer.
   * Offsets stored on the entries are ignored; sizes come from the data itself.
   *
   * @throws {PakError} INVALID_NAME, NAME_TOO_LONG or ARCHIVE_TOO_LARGE, before any output is built
   */
  static encode({ entries }: { readonly entries: readonly PakEntry[] }): Buffer {
    const offsets: number[] = computeLayout(entries);
    const dataSize: number = entries.reduce((total: number, entry: PakEntry) => total + entry.data.length, 0);
    const totalSize: number = HEADER_SIZE + entries.length * DIRECTORY_ENTRY_SIZE + dataSize;
    if (totalSize > MAX_ARCHIVE_SIZE) {
      throw new PakError('ARCHIVE_TOO_LARGE', `Archive of ${totalSize} bytes exceeds the ${MAX_ARCHIVE_SIZE}-byte format limit`);
    }

    const directory: Buffer = buildDirectory(entries, offsets);
    return Buffer.concat([directory, ...entries.map((entry: PakEntry) => entry.data)], totalSize);
  }

  /**
   * Reads a PAK archive from disk and parses its structure.
   *
   * @param filePath - Path to the archive
   * @throws {PakError} If the file is not a valid archive; file system errors propagate unchanged
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<PakBinaryStructure> {
    const buffer: Buffer = await readFile(filePath);
    return PakBinary.decode({ buffer, filePath });
  }

  /**
   * Encodes entries and writes the whole archive to disk.
   * Nothing is written if encoding fails.
   */
  static async write({ entries, outputPath }: { readonly entries: readonly PakEntry[]; readonly outputPath: string }): Promise<void> {
    const buffer: Buffer = PakBinary.encode({ entries });
    await writeFile(outputPath, buffer);
  }

  /**
   * Computes SHA256 hash of an entry's data.
   *
   * @returns Hexadecimal SHA256 hash string
   */
  static hashEntryData({ data }: { readonly data: Buffer }): string {
    return createHash('sha256').update(data).digest('hex');
  }
}
