import * as fs from 'fs';
import { splitWords } from './words';

const CHUNK_SIZE = 64 * 1024;

/**
 * Read every whitespace-separated word from a file. The descriptor is
 * closed before returning, whether or not the read succeeds.
 */
export function readWordFile(filePath: string): string[] {
  const fd = fs.openSync(filePath, 'r');
  try {
    const chunks: Buffer[] = [];
    const buffer = Buffer.alloc(CHUNK_SIZE);
    let bytesRead: number;
    while ((bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null)) > 0) {
      chunks.push(Buffer.from(buffer.subarray(0, bytesRead)));
    }
    return splitWords(Buffer.concat(chunks).toString('utf-8'));
  } finally {
    fs.closeSync(fd);
  }
}

/** Errors from the filesystem (missing file, no permission, a directory). */
export function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
