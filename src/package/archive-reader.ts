/**
 * Zip archive reading with size limits
 */

import JSZip from 'jszip';

import { ArchiveFormatError, toError } from '../errors/errors';

import { isSafePath } from './package-layout';

export interface ArchiveLimits {
  maxEntries: number;
  maxTotalBytes: number;
  maxEntryBytes: number;
  /** Uncompressed bytes allowed per byte of archive */
  maxCompressionRatio: number;
}

export const DEFAULT_ARCHIVE_LIMITS: ArchiveLimits = {
  maxEntries: 10_000,
  maxTotalBytes: 500 * 1024 * 1024,
  maxEntryBytes: 50 * 1024 * 1024,
  maxCompressionRatio: 100,
};

export interface ArchiveReadOptions {
  limits?: Partial<ArchiveLimits>;
  isSafePath?: (member: string) => boolean;
}

function readEntry(file: JSZip.JSZipObject, budget: number, onLimit: (bytes: number) => Error): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let stopped = false;
    const stream = file.internalStream('nodebuffer');
    stream
      .on('data', chunk => {
        if (stopped) {
          return;
        }
        size += chunk.length;
        if (size > budget) {
          stopped = true;
          stream.pause();
          reject(onLimit(size));
          return;
        }
        chunks.push(chunk);
      })
      .on('error', err => {
        stopped = true;
        reject(err);
      })
      .on('end', () => {
        if (!stopped) {
          resolve(Buffer.concat(chunks));
        }
      })
      .resume();
  });
}

/**
 * Read every file of a zip into memory. Directory entries are dropped.
 * Throws ArchiveFormatError for anything that is not a safe, bounded zip.
 */
export async function readPackageArchive(
  archive: Buffer,
  options: ArchiveReadOptions = {}
): Promise<Map<string, Buffer>> {
  const limits = { ...DEFAULT_ARCHIVE_LIMITS, ...options.limits };
  const safe = options.isSafePath ?? isSafePath;

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(archive);
  } catch (err) {
    throw new ArchiveFormatError('Archive is not a readable zip file', {}, toError(err));
  }

  const entries = Object.values(zip.files);
  if (entries.length > limits.maxEntries) {
    throw new ArchiveFormatError(`Archive has ${entries.length} entries, more than ${limits.maxEntries}`, {
      entries: entries.length,
    });
  }

  const ratioBudget = Math.max(archive.length, 1) * limits.maxCompressionRatio;
  const totalBudget = Math.min(limits.maxTotalBytes, ratioBudget);
  const files = new Map<string, Buffer>();
  let total = 0;

  for (const entry of entries) {
    // jszip rewrites `../` names on load and keeps what the archive said
    const original = entry.unsafeOriginalName ?? entry.name;
    if (!safe(original)) {
      throw new ArchiveFormatError(`Unsafe archive member name: ${original}`, { member: original });
    }
    if (entry.dir) {
      continue;
    }
    const budget = Math.min(limits.maxEntryBytes, totalBudget - total);
    const data = await readEntry(entry, budget, bytes =>
      bytes > limits.maxEntryBytes
        ? new ArchiveFormatError(`Archive member ${entry.name} exceeds ${limits.maxEntryBytes} bytes`, {
            member: entry.name,
          })
        : new ArchiveFormatError('Archive expands beyond the allowed total size or compression ratio', {
            member: entry.name,
            maxTotalBytes: limits.maxTotalBytes,
            maxCompressionRatio: limits.maxCompressionRatio,
          })
    );
    total += data.length;
    files.set(entry.name.split('\\').join('/'), data);
  }
  return files;
}

/**
 * Zip a file map. Text entries are stored as UTF-8.
 */
export async function writePackageArchive(files: Map<string, string | Buffer>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of files) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
