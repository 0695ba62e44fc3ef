/**
 * PAK Tools - Main entry point
 *
 * Reads, writes and edits Quake-family .pak archives.
 */

// Codec
export { PakBinary, encodeEntryName } from './pak-binary.js';

// Archive container
export { PakArchive } from './pak-archive.js';
export type { AddEntryOptions, EntryDestination, ExtractEntryOptions } from './pak-archive.js';

// Commands
export { listPackage, extractPackage, appendToPackage, removeFromPackage, createPackage } from './commands.js';
export type { PakLogger, ListOptions, ExtractOptions, AppendOptions } from './commands.js';

export { PakError } from './errors.js';
export type { PakErrorCode } from './errors.js';
export type { PakEntry, PakEntrySummary } from './types/pak-entry.js';
export type { PakHeader, PakBinaryStructure } from './types/pak-structure.js';
export * from './constants/pak-format.js';
