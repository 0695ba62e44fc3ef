/**
 * Snapshot of a decoded PAK archive with its header preserved.
 */
import type { PakEntry } from './pak-entry.js';

export interface PakHeader {
  readonly magic: string;
  readonly directoryOffset: number;
  readonly directorySize: number;
}

export interface PakBinaryStructure {
  /** Source path, or null when decoded from an in-memory buffer. */
  readonly filePath: string | null;
  readonly sha256: string;
  readonly header: PakHeader;
  readonly entries: PakEntry[];
  readonly totalSize: number;
}
