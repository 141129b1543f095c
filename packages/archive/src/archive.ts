/**
 * Project archive container I/O
 *
 * Enterprise Guide projects are zip files. Entries are held in memory as
 * raw bytes, keyed by their path inside the archive.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import JSZip from 'jszip';
import { SchemashiftError } from '@schemashift/core';

/** File entries in archive order; directories are implied by paths */
export type ArchiveEntries = Map<string, Uint8Array>;

/**
 * Decode zip bytes into file entries
 */
export async function unpackArchive(data: Uint8Array): Promise<ArchiveEntries> {
  const zip = await JSZip.loadAsync(data);
  const entries: ArchiveEntries = new Map();

  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    entries.set(file.name, await file.async('uint8array'));
  }

  return entries;
}

/**
 * Encode file entries as DEFLATE-compressed zip bytes
 */
export async function packArchive(entries: ArchiveEntries): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of entries) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}

export async function readArchive(filePath: string): Promise<ArchiveEntries> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    const notFound = (error as NodeJS.ErrnoException).code === 'ENOENT';
    throw new SchemashiftError({
      code: 'ARCHIVE_READ_FAILED',
      message: notFound ? `File not found: ${filePath}` : `Cannot read archive: ${(error as Error).message}`,
      filePath,
      suggestion: notFound ? 'Check that the file path is correct and the file exists.' : undefined,
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    return await unpackArchive(data);
  } catch (error) {
    throw new SchemashiftError({
      code: 'ARCHIVE_READ_FAILED',
      message: `Not a valid project archive: ${(error as Error).message}`,
      filePath,
      suggestion: 'Project files must be zip containers as saved by Enterprise Guide.',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export async function writeArchive(entries: ArchiveEntries, filePath: string): Promise<void> {
  try {
    const data = await packArchive(entries);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, data);
  } catch (error) {
    throw new SchemashiftError({
      code: 'ARCHIVE_WRITE_FAILED',
      message: `Failed to write archive: ${(error as Error).message}`,
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
