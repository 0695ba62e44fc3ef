/**
 * A single named file stored in a PAK archive.
 */
export interface PakEntry {
  /** Path-like name, e.g. "maps/e1m1.bsp". Directories are implied by `/` segments. */
  readonly name: string;
  /** Byte offset of the data in the archive it was read from. Recomputed on every encode. */
  readonly offset: number;
  /** Length of `data` in bytes. */
  readonly size: number;
  readonly data: Buffer;
}

/**
 * Directory listing row for display.
 */
export interface PakEntrySummary {
  readonly name: string;
  readonly offset: number;
  readonly size: number;
}
