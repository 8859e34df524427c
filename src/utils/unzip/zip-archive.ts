/**
 * Random-access ZIP reader over a file handle.
 *
 * Only the central directory is held in memory. Entry data is read on demand
 * with positional reads, so several entries can be streamed at the same time
 * from one handle.
 */

import { open, type FileHandle } from "fs/promises";
import { inflateChunks } from "./inflate-stream.js";
import {
  IoError,
  MissingPartError,
  NotAnArchiveError,
  toConversionError,
  type ErrorContext
} from "../../errors.js";

// ZIP file signatures
const LOCAL_FILE_HEADER_SIG = 0x04034b50;
const CENTRAL_DIR_HEADER_SIG = 0x02014b50;
const END_OF_CENTRAL_DIR_SIG = 0x06054b50;
const ZIP64_END_OF_CENTRAL_DIR_SIG = 0x06064b50;
const ZIP64_END_OF_CENTRAL_DIR_LOCATOR_SIG = 0x07064b50;

// Compression methods
const COMPRESSION_STORED = 0;
const COMPRESSION_DEFLATE = 8;

const EOCD_MIN_SIZE = 22;
// EOCD plus the longest possible archive comment
const EOCD_MAX_SEARCH = EOCD_MIN_SIZE + 0xffff;
const LOCAL_HEADER_SIZE = 30;
const ZIP64_EOCD_SIZE = 56;

const READ_CHUNK_SIZE = 64 * 1024;

/**
 * Parsed ZIP entry
 */
export interface ZipEntryInfo {
  /** File path within the ZIP */
  path: string;
  /** Whether this is a directory */
  isDirectory: boolean;
  /** Compressed size */
  compressedSize: number;
  /** Uncompressed size */
  uncompressedSize: number;
  /** Compression method (0 = stored, 8 = deflate) */
  compressionMethod: number;
  /** Offset to local file header */
  localHeaderOffset: number;
  /** Is encrypted */
  isEncrypted: boolean;
}

/**
 * DataView helper for reading little-endian values
 */
class BinaryReader {
  private view: DataView;
  private offset: number;
  private data: Uint8Array;

  constructor(data: Uint8Array, offset = 0) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  readUint16(): number {
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readUint64(): number {
    const value = Number(this.view.getBigUint64(this.offset, true));
    this.offset += 8;
    return value;
  }

  readBytes(length: number): Uint8Array {
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readString(length: number, utf8: boolean): string {
    return new TextDecoder(utf8 ? "utf-8" : "latin1").decode(this.readBytes(length));
  }

  skip(length: number): void {
    this.offset += length;
  }
}

/**
 * Parse ZIP64 extra field
 */
function parseZip64ExtraField(
  extraField: Uint8Array,
  compressedSize: number,
  uncompressedSize: number,
  localHeaderOffset: number
): { compressedSize: number; uncompressedSize: number; localHeaderOffset: number } {
  const view = new DataView(extraField.buffer, extraField.byteOffset, extraField.byteLength);
  let offset = 0;

  while (offset + 4 <= extraField.length) {
    const signature = view.getUint16(offset, true);
    const partSize = view.getUint16(offset + 2, true);

    if (signature === 0x0001) {
      // ZIP64 extended information
      let fieldOffset = offset + 4;
      const end = offset + 4 + partSize;

      if (uncompressedSize === 0xffffffff && fieldOffset + 8 <= end) {
        uncompressedSize = Number(view.getBigUint64(fieldOffset, true));
        fieldOffset += 8;
      }
      if (compressedSize === 0xffffffff && fieldOffset + 8 <= end) {
        compressedSize = Number(view.getBigUint64(fieldOffset, true));
        fieldOffset += 8;
      }
      if (localHeaderOffset === 0xffffffff && fieldOffset + 8 <= end) {
        localHeaderOffset = Number(view.getBigUint64(fieldOffset, true));
      }
      break;
    }

    offset += 4 + partSize;
  }

  return { compressedSize, uncompressedSize, localHeaderOffset };
}

/**
 * Find the End of Central Directory record
 * Searches backwards from the end of the buffer
 */
function findEndOfCentralDir(data: Uint8Array): number {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  for (let i = data.length - EOCD_MIN_SIZE; i >= 0; i--) {
    if (view.getUint32(i, true) === END_OF_CENTRAL_DIR_SIG) {
      return i;
    }
  }
  return -1;
}

async function readAt(
  handle: FileHandle,
  position: number,
  length: number,
  context: ErrorContext
): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) {
      throw new NotAnArchiveError("Unexpected end of file while reading archive", context);
    }
    filled += bytesRead;
  }
  return buffer;
}

interface CentralDirectoryLocation {
  totalEntries: number;
  offset: number;
  size: number;
}

async function locateCentralDirectory(
  handle: FileHandle,
  fileSize: number,
  context: ErrorContext
): Promise<CentralDirectoryLocation> {
  if (fileSize < EOCD_MIN_SIZE) {
    throw new NotAnArchiveError("File is too small to be a ZIP archive", context);
  }
  const tailStart = Math.max(0, fileSize - EOCD_MAX_SEARCH);
  const tail = await readAt(handle, tailStart, fileSize - tailStart, context);
  const eocdOffset = findEndOfCentralDir(tail);
  if (eocdOffset === -1) {
    throw new NotAnArchiveError("End of Central Directory not found", context);
  }

  // Offset  Size  Description
  // 0       4     EOCD signature (0x06054b50)
  // 4       2     Number of this disk
  // 6       2     Disk where central directory starts
  // 8       2     Number of central directory records on this disk
  // 10      2     Total number of central directory records
  // 12      4     Size of central directory (bytes)
  // 16      4     Offset of start of central directory
  // 20      2     Comment length
  const reader = new BinaryReader(tail, eocdOffset + 10);
  let totalEntries = reader.readUint16();
  let size = reader.readUint32();
  let offset = reader.readUint32();

  // ZIP64 EOCD locator sits right before the EOCD
  const locatorOffset = eocdOffset - 20;
  if (locatorOffset >= 0) {
    const locator = new BinaryReader(tail, locatorOffset);
    if (locator.readUint32() === ZIP64_END_OF_CENTRAL_DIR_LOCATOR_SIG) {
      locator.skip(4); // disk number with ZIP64 EOCD
      const zip64EocdOffset = locator.readUint64();
      const zip64 = new BinaryReader(
        await readAt(handle, zip64EocdOffset, ZIP64_EOCD_SIZE, context)
      );
      if (zip64.readUint32() === ZIP64_END_OF_CENTRAL_DIR_SIG) {
        zip64.skip(8); // size of ZIP64 EOCD
        zip64.skip(2); // version made by
        zip64.skip(2); // version needed
        zip64.skip(4); // disk number
        zip64.skip(4); // disk with central dir
        zip64.skip(8); // entries on this disk
        const zip64TotalEntries = zip64.readUint64();
        const zip64Size = zip64.readUint64();
        const zip64Offset = zip64.readUint64();

        // Use ZIP64 values if standard values are maxed out
        if (totalEntries === 0xffff) {
          totalEntries = zip64TotalEntries;
        }
        if (size === 0xffffffff) {
          size = zip64Size;
        }
        if (offset === 0xffffffff) {
          offset = zip64Offset;
        }
      }
    }
  }

  if (offset + size > fileSize) {
    throw new NotAnArchiveError("Central Directory lies outside the file", context);
  }
  return { totalEntries, offset, size };
}

/**
 * Parse ZIP file entries from Central Directory
 */
function parseCentralDirectory(
  data: Uint8Array,
  totalEntries: number,
  context: ErrorContext
): ZipEntryInfo[] {
  const entries: ZipEntryInfo[] = [];
  const reader = new BinaryReader(data);

  for (let i = 0; i < totalEntries; i++) {
    if (reader.remaining < 46 || reader.readUint32() !== CENTRAL_DIR_HEADER_SIG) {
      throw new NotAnArchiveError(`Invalid Central Directory header signature at entry ${i}`, context);
    }

    // Offset  Size  Description
    // 4       2     Version made by
    // 6       2     Version needed to extract
    // 8       2     General purpose bit flag
    // 10      2     Compression method
    // 12      2     File last modification time
    // 14      2     File last modification date
    // 16      4     CRC-32
    // 20      4     Compressed size
    // 24      4     Uncompressed size
    // 28      2     File name length
    // 30      2     Extra field length
    // 32      2     File comment length
    // 34      2     Disk number where file starts
    // 36      2     Internal file attributes
    // 38      4     External file attributes
    // 42      4     Relative offset of local file header
    reader.skip(4); // versions
    const flags = reader.readUint16();
    const compressionMethod = reader.readUint16();
    reader.skip(8); // time, date, crc32
    let compressedSize = reader.readUint32();
    let uncompressedSize = reader.readUint32();
    const fileNameLength = reader.readUint16();
    const extraFieldLength = reader.readUint16();
    const commentLength = reader.readUint16();
    reader.skip(4); // disk number start, internal attributes
    const externalAttributes = reader.readUint32();
    let localHeaderOffset = reader.readUint32();

    // Bit 11: file name is UTF-8
    const fileName = reader.readString(fileNameLength, (flags & 0x800) !== 0);
    const extraField = reader.readBytes(extraFieldLength);
    reader.skip(commentLength);

    if (extraFieldLength > 0) {
      const parsed = parseZip64ExtraField(
        extraField,
        compressedSize,
        uncompressedSize,
        localHeaderOffset
      );
      compressedSize = parsed.compressedSize;
      uncompressedSize = parsed.uncompressedSize;
      localHeaderOffset = parsed.localHeaderOffset;
    }

    entries.push({
      path: fileName,
      isDirectory: fileName.endsWith("/") || (externalAttributes & 0x10) !== 0,
      compressedSize,
      uncompressedSize,
      compressionMethod,
      localHeaderOffset,
      isEncrypted: (flags & 0x01) !== 0
    });
  }

  return entries;
}

function normalizeEntryName(name: string): string {
  return name.startsWith("/") ? name.slice(1) : name;
}

export class ZipArchive {
  readonly path: string;
  private handle: FileHandle;
  private entryMap: Map<string, ZipEntryInfo>;
  private closed = false;

  private constructor(path: string, handle: FileHandle, entries: ZipEntryInfo[]) {
    this.path = path;
    this.handle = handle;
    this.entryMap = new Map(entries.map(e => [normalizeEntryName(e.path), e]));
  }

  /**
   * Open an archive and read its central directory
   */
  static async open(path: string): Promise<ZipArchive> {
    const context: ErrorContext = { archivePath: path };
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (error) {
      throw toConversionError(error, context);
    }

    try {
      const { size } = await handle.stat();
      const location = await locateCentralDirectory(handle, size, context);
      const directory = await readAt(handle, location.offset, location.size, context);
      const entries = parseCentralDirectory(directory, location.totalEntries, context);
      return new ZipArchive(path, handle, entries);
    } catch (error) {
      await handle.close();
      throw toConversionError(error, context);
    }
  }

  /**
   * List all file paths
   */
  entryNames(): string[] {
    return [...this.entryMap.values()].filter(e => !e.isDirectory).map(e => e.path);
  }

  /**
   * Check if a file entry exists
   */
  has(name: string): boolean {
    const info = this.entryMap.get(normalizeEntryName(name));
    return info !== undefined && !info.isDirectory;
  }

  /**
   * Byte stream of one entry's uncompressed content. Each call starts an
   * independent read; the returned iterable can be consumed once.
   */
  entry(name: string): AsyncIterable<Uint8Array> {
    const key = normalizeEntryName(name);
    const context: ErrorContext = { archivePath: this.path, entry: key };
    const info = this.entryMap.get(key);
    if (!info || info.isDirectory) {
      throw new MissingPartError("Archive entry not found", context);
    }
    if (this.closed) {
      throw new IoError("Archive is closed", context);
    }
    if (info.isEncrypted) {
      throw new IoError("Archive entry is encrypted and cannot be extracted", context);
    }
    if (
      info.compressionMethod !== COMPRESSION_STORED &&
      info.compressionMethod !== COMPRESSION_DEFLATE
    ) {
      throw new IoError(`Unsupported compression method: ${info.compressionMethod}`, context);
    }
    return this.readEntry(info, context);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }

  private async *readEntry(
    info: ZipEntryInfo,
    context: ErrorContext
  ): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      const header = new BinaryReader(
        await readAt(this.handle, info.localHeaderOffset, LOCAL_HEADER_SIZE, context)
      );
      if (header.readUint32() !== LOCAL_FILE_HEADER_SIG) {
        throw new NotAnArchiveError("Invalid local file header signature", context);
      }
      header.skip(22); // version, flags, method, time, date, crc32, sizes
      const fileNameLength = header.readUint16();
      const extraFieldLength = header.readUint16();
      const dataStart = info.localHeaderOffset + LOCAL_HEADER_SIZE + fileNameLength + extraFieldLength;

      const raw = this.readRange(dataStart, info.compressedSize, context);
      if (info.compressionMethod === COMPRESSION_STORED) {
        yield* raw;
      } else {
        yield* inflateChunks(raw);
      }
    } catch (error) {
      throw toConversionError(error, context);
    }
  }

  private async *readRange(
    start: number,
    length: number,
    context: ErrorContext
  ): AsyncGenerator<Uint8Array, void, undefined> {
    let position = start;
    const end = start + length;
    while (position < end) {
      const size = Math.min(READ_CHUNK_SIZE, end - position);
      const chunk = new Uint8Array(size);
      const { bytesRead } = await this.handle.read(chunk, 0, size, position);
      if (bytesRead === 0) {
        throw new IoError("Unexpected end of file inside archive entry", context);
      }
      position += bytesRead;
      yield chunk.subarray(0, bytesRead);
    }
  }
}
