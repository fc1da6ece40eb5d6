/**
 * Archive ingestion with path-traversal defense.
 *
 * Extraction is two-phase: every entry is listed and validated first, and
 * nothing is written until all of them pass. A rejected archive therefore
 * leaves the target directory untouched.
 *
 * @module archive/ingester
 */

import { createWriteStream } from 'node:fs';
import { copyFile, lstat, mkdir, readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Readable } from 'node:stream';
import * as tar from 'tar';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import type { ArchiveLimits } from '../config/index.js';
import { SecurityError, ValidationError, errorCode, errorMessage } from '../errors/index.js';
import { NoopLogger } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import type { ProcessRunner } from '../process/runner.js';

export type ArchiveFormat = 'zip' | 'tar' | 'tar.gz' | 'tar.bz2' | 'tar.xz' | 'file';

const FORMAT_SUFFIXES: ReadonlyArray<readonly [string, ArchiveFormat]> = [
  ['.tar.gz', 'tar.gz'],
  ['.tgz', 'tar.gz'],
  ['.tar.bz2', 'tar.bz2'],
  ['.tbz2', 'tar.bz2'],
  ['.tar.xz', 'tar.xz'],
  ['.txz', 'tar.xz'],
  ['.tar', 'tar'],
  ['.zip', 'zip'],
];

export function detectArchiveFormat(fileName: string): ArchiveFormat {
  const lower = fileName.toLowerCase();
  const match = FORMAT_SUFFIXES.find(([suffix]) => lower.endsWith(suffix));
  return match ? match[1] : 'file';
}

/**
 * Resolves an archive entry name inside `targetDir`.
 *
 * @returns The absolute destination path
 * @throws SecurityError for empty, absolute, NUL-containing or `..` names, or
 *   names that resolve outside `targetDir`
 */
export function assertSafeEntryName(name: string, targetDir: string): string {
  if (name.length === 0) {
    throw new SecurityError('Archive entry has an empty name');
  }
  if (name.includes('\0')) {
    throw new SecurityError(`Archive entry name contains a NUL byte: ${JSON.stringify(name)}`);
  }

  const normalized = name.replace(/\\/g, '/');
  if (normalized.startsWith('/') || /^[A-Za-z]:/.test(normalized)) {
    throw new SecurityError(`Archive entry uses an absolute path: ${name}`);
  }
  if (normalized.split('/').includes('..')) {
    throw new SecurityError(`Archive entry escapes the target directory: ${name}`);
  }

  const root = path.resolve(targetDir);
  const destination = path.resolve(root, normalized);
  if (destination !== root && !destination.startsWith(root + path.sep)) {
    throw new SecurityError(`Archive entry resolves outside the target directory: ${name}`);
  }
  return destination;
}

export interface DirectorySummary {
  fileCount: number;
  totalSize: number;
}

/**
 * Counts regular files below `dir` and sums their sizes. Symlinks are skipped.
 */
export async function summarizeDirectory(dir: string): Promise<DirectorySummary> {
  let fileCount = 0;
  let totalSize = 0;
  const pending = [dir];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    for (const entry of await readdir(current, { withFileTypes: true })) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile()) {
        fileCount++;
        totalSize += (await stat(entryPath)).size;
      }
    }
  }

  return { fileCount, totalSize };
}

export interface IngestResult {
  format: ArchiveFormat;
  /** Entries written, directories included. */
  entries: number;
}

export interface ArchiveIngesterOptions {
  limits: ArchiveLimits;
  runner: ProcessRunner;
  /** System tar, used for bzip2 and xz archives. */
  tarPath: string;
  logger?: Logger;
}

export interface ListedEntry {
  name: string;
  size: number;
  type: string;
  linkpath?: string;
}

const TAR_FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile', 'Directory']);

/** yauzl validates names itself when decoding; its refusals are traversal attempts. */
const YAUZL_NAME_ERROR = /^(absolute path|invalid relative path|invalid characters in fileName): /;

export class ArchiveIngester {
  private readonly limits: ArchiveLimits;
  private readonly runner: ProcessRunner;
  private readonly tarPath: string;
  private readonly logger: Logger;

  constructor(options: ArchiveIngesterOptions) {
    this.limits = options.limits;
    this.runner = options.runner;
    this.tarPath = options.tarPath;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Extracts (or, for non-archives, copies) `archivePath` into `targetDir`.
   */
  async extract(archivePath: string, targetDir: string): Promise<IngestResult> {
    await this.assertReadable(archivePath);
    const format = detectArchiveFormat(path.basename(archivePath));
    await mkdir(targetDir, { recursive: true });

    let entries: number;
    switch (format) {
      case 'zip':
        entries = await this.extractZip(archivePath, targetDir);
        break;
      case 'tar':
      case 'tar.gz':
        entries = await this.extractTar(archivePath, targetDir);
        break;
      case 'tar.bz2':
      case 'tar.xz':
        entries = await this.extractWithSystemTar(archivePath, targetDir);
        break;
      case 'file':
        await copyFile(archivePath, path.join(targetDir, path.basename(archivePath)));
        entries = 1;
        break;
    }

    this.logger.info('Archive extracted', { archive: path.basename(archivePath), format, entries });
    return { format, entries };
  }

  private async assertReadable(archivePath: string): Promise<void> {
    try {
      const info = await lstat(archivePath);
      if (!info.isFile()) {
        throw new ValidationError(`Archive is not a regular file: ${archivePath}`);
      }
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new ValidationError(`Archive not found: ${archivePath}`, { cause: error });
      }
      throw error;
    }
  }

  private checkLimits(entries: readonly ListedEntry[]): void {
    if (entries.length > this.limits.maxEntries) {
      throw new SecurityError(`Archive has more than ${this.limits.maxEntries} entries`);
    }
    const declared = entries.reduce((sum, entry) => sum + entry.size, 0);
    if (declared > this.limits.maxExtractedBytes) {
      throw new SecurityError(
        `Archive would extract ${declared} bytes, above the limit of ${this.limits.maxExtractedBytes}`
      );
    }
  }

  private validate(entries: readonly ListedEntry[], targetDir: string): string[] {
    this.checkLimits(entries);
    return entries.map((entry) => {
      const destination = assertSafeEntryName(entry.name, targetDir);
      if (entry.type === 'SymbolicLink') {
        assertSafeLinkTarget(entry, destination, targetDir);
      } else if (entry.type === 'Link') {
        assertSafeEntryName(entry.linkpath ?? '', targetDir);
      } else if (!TAR_FILE_TYPES.has(entry.type)) {
        throw new SecurityError(`Archive entry ${entry.name} has unsupported type ${entry.type}`);
      }
      return destination;
    });
  }

  // ==========================================================================
  // ZIP
  // ==========================================================================

  private async extractZip(archivePath: string, targetDir: string): Promise<number> {
    const zipfile = await openZip(archivePath);
    try {
      const zipEntries = await this.readZipEntries(zipfile);
      const destinations = this.validate(
        zipEntries.map((entry) => ({
          name: entry.fileName,
          size: entry.uncompressedSize,
          type: entry.fileName.endsWith('/') ? 'Directory' : 'File',
        })),
        targetDir
      );

      for (const [index, entry] of zipEntries.entries()) {
        const destination = destinations[index];
        if (destination === undefined) continue;
        if (entry.fileName.endsWith('/')) {
          await mkdir(destination, { recursive: true });
          continue;
        }
        await mkdir(path.dirname(destination), { recursive: true });
        const stream = await openZipStream(zipfile, entry);
        await pipeline(stream, createWriteStream(destination));
      }
      return zipEntries.length;
    } finally {
      zipfile.close();
    }
  }

  private readZipEntries(zipfile: ZipFile): Promise<Entry[]> {
    return new Promise((resolve, reject) => {
      const entries: Entry[] = [];
      zipfile.on('entry', (entry: Entry) => {
        entries.push(entry);
        if (entries.length > this.limits.maxEntries) {
          reject(new SecurityError(`Archive has more than ${this.limits.maxEntries} entries`));
          return;
        }
        zipfile.readEntry();
      });
      zipfile.once('end', () => resolve(entries));
      zipfile.once('error', (error: Error) => reject(mapZipError(error)));
      zipfile.readEntry();
    });
  }

  // ==========================================================================
  // TAR (node-tar)
  // ==========================================================================

  private async extractTar(archivePath: string, targetDir: string): Promise<number> {
    const entries: ListedEntry[] = [];
    try {
      await tar.list({
        file: archivePath,
        onentry: (entry) => {
          entries.push({
            name: entry.path,
            size: entry.size ?? 0,
            type: String(entry.type),
            linkpath: entry.linkpath || undefined,
          });
        },
      });
    } catch (error) {
      throw new ValidationError(`Invalid tar archive: ${errorMessage(error)}`, { cause: error });
    }

    this.validate(entries, targetDir);
    await tar.extract({ file: archivePath, cwd: targetDir, preservePaths: false });
    return entries.length;
  }

  // ==========================================================================
  // TAR (system binary, for bzip2 and xz)
  // ==========================================================================

  private async extractWithSystemTar(archivePath: string, targetDir: string): Promise<number> {
    const { stdout } = await this.runner.run(this.tarPath, ['--numeric-owner', '-tvf', archivePath]);
    const entries = stdout
      .split('\n')
      .filter((line) => line.length > 0)
      .map(parseVerboseTarLine);

    this.validate(entries, targetDir);
    await this.runner.run(this.tarPath, ['-xf', archivePath, '-C', targetDir, '--no-same-owner']);
    return entries.length;
  }
}

const VERBOSE_TYPES: Record<string, string> = {
  '-': 'File',
  d: 'Directory',
  l: 'SymbolicLink',
  h: 'Link',
  C: 'ContiguousFile',
  b: 'BlockDevice',
  c: 'CharacterDevice',
  p: 'FIFO',
};

/** `<mode> <uid>/<gid> <size> <date> <time> <name>[ -> target| link to target]` */
const VERBOSE_LINE = /^(\S)\S{9}\S*\s+\S+\s+(\d+)\s+\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}(?::\d{2})?\s(.+)$/;

/**
 * Parses one line of GNU `tar --numeric-owner -tvf`. Lines that do not parse
 * are refused, since their entries cannot be checked.
 */
export function parseVerboseTarLine(line: string): ListedEntry {
  const match = VERBOSE_LINE.exec(line);
  if (!match) {
    throw new SecurityError(`Unrecognized tar listing line: ${JSON.stringify(line)}`);
  }
  const [, typeChar = '', size = '0', rest = ''] = match;

  const type = VERBOSE_TYPES[typeChar] ?? `Unknown(${typeChar})`;
  const separator = type === 'SymbolicLink' ? ' -> ' : type === 'Link' ? ' link to ' : undefined;
  if (separator !== undefined) {
    const index = rest.indexOf(separator);
    if (index < 0) {
      throw new SecurityError(`Tar link entry without a target: ${JSON.stringify(line)}`);
    }
    return {
      name: rest.slice(0, index),
      size: Number(size),
      type,
      linkpath: rest.slice(index + separator.length),
    };
  }
  return { name: rest, size: Number(size), type };
}

function assertSafeLinkTarget(entry: ListedEntry, destination: string, targetDir: string): void {
  const target = entry.linkpath ?? '';
  if (target.length === 0 || path.isAbsolute(target)) {
    throw new SecurityError(`Archive link ${entry.name} points to an absolute path`);
  }
  const root = path.resolve(targetDir);
  const resolved = path.resolve(path.dirname(destination), target);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new SecurityError(`Archive link ${entry.name} points outside the target directory`);
  }
}

function mapZipError(error: Error): Error {
  if (YAUZL_NAME_ERROR.test(error.message)) {
    return new SecurityError(`Archive entry rejected: ${error.message}`, { cause: error });
  }
  return new ValidationError(`Invalid zip archive: ${error.message}`, { cause: error });
}

function openZip(zipPath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err) return reject(mapZipError(err));
      if (!zipfile) return reject(new ValidationError(`Could not open zip archive: ${zipPath}`));
      resolve(zipfile);
    });
  });
}

function openZipStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err) return reject(mapZipError(err));
      if (!stream) return reject(new ValidationError(`No data for zip entry ${entry.fileName}`));
      resolve(stream);
    });
  });
}
