/**
 * Layout constants for Quake-family PAK archives.
 */

/** Magic tag at offset 0 (not null-terminated). */
export const PAK_MAGIC = 'PACK';

/** Magic, directory offset and directory size. */
export const HEADER_SIZE = 12;

/** Size of one directory record: name field, offset, size. */
export const DIRECTORY_ENTRY_SIZE = 64;

/** Width of the null-terminated name field inside a directory record. */
export const NAME_FIELD_SIZE = 56;

/** Longest encoded name; the last byte of the field is reserved for the terminator. */
export const MAX_NAME_LENGTH = NAME_FIELD_SIZE - 1;

export const ENTRY_OFFSET_FIELD = 56;
export const ENTRY_SIZE_FIELD = 60;

/** Offsets and sizes are stored as u32. */
export const MAX_ARCHIVE_SIZE = 0xffffffff;
