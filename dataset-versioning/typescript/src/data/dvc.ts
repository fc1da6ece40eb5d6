/**
 * Data-versioning adapter over the dvc CLI.
 *
 * @module data/dvc
 */

import { z } from 'zod';
import type { SecretString } from '../config/index.js';
import { CommandFailedError, ValidationError } from '../errors/index.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../process/runner.js';
import type { FileRecord } from '../tree/types.js';

export interface DvcOptions {
  dvcPath: string;
  runner: ProcessRunner;
}

/**
 * S3-compatible remote a dataset's content is pushed to.
 */
export interface DataRemoteDescriptor {
  /** `s3://<prefix>/<datasetId>` */
  url: string;
  endpointUrl: string;
  accessKeyId: string;
  secretAccessKey: SecretString;
}

export interface ListOptions {
  rev?: string;
  /** Path inside the repository; the repository root when omitted. */
  path?: string;
  recursive?: boolean;
}

const dvcListEntrySchema = z.object({
  path: z.string(),
  isdir: z.boolean(),
  isout: z.boolean().optional(),
  isexec: z.boolean().optional(),
  size: z.number().nullable().optional(),
  md5: z.string().nullable().optional(),
});

const dvcListSchema = z.array(dvcListEntrySchema);

const MISSING_PATH_PATTERN = /does not exist|not found|no such file/i;

export function dataRemoteUrl(storagePrefix: string, datasetId: string): string {
  const prefix = storagePrefix.replace(/^s3:\/\//, '').replace(/\/+$/, '');
  return `s3://${prefix}/${datasetId}`;
}

/**
 * DVC project inside a working directory.
 */
export class DvcRepository {
  readonly dir: string;
  private readonly options: DvcOptions;

  constructor(dir: string, options: DvcOptions) {
    this.dir = dir;
    this.options = options;
  }

  async init(options: { noScm?: boolean } = {}): Promise<void> {
    await this.dvc(['init', ...(options.noScm ? ['--no-scm'] : [])]);
  }

  /**
   * Adds (or replaces) a remote. The URL and endpoint go to the committed
   * project config; credentials go to the local config only.
   */
  async configureRemote(
    name: string,
    remote: DataRemoteDescriptor,
    options: { isDefault?: boolean } = {}
  ): Promise<void> {
    await this.dvc(['remote', 'add', '--force', ...(options.isDefault ? ['--default'] : []), name, remote.url]);
    await this.dvc(['remote', 'modify', name, 'endpointurl', remote.endpointUrl]);
    await this.configureCredentials(name, remote);
  }

  async configureCredentials(
    name: string,
    remote: Pick<DataRemoteDescriptor, 'accessKeyId' | 'secretAccessKey'>
  ): Promise<void> {
    const secret = remote.secretAccessKey.expose();
    await this.dvc(['remote', 'modify', '--local', name, 'access_key_id', remote.accessKeyId]);
    await this.dvc(['remote', 'modify', '--local', name, 'secret_access_key', secret], { redact: [secret] });
  }

  /**
   * Starts tracking `path`, writing `<path>.dvc`.
   */
  async track(path: string): Promise<void> {
    await this.dvc(['add', path]);
  }

  async push(remote?: string): Promise<void> {
    await this.dvc(['push', ...(remote ? ['--remote', remote] : [])]);
  }

  /**
   * Lists the content of a (remote) repository at a revision.
   *
   * @returns Records with absolute paths (`/data/a.csv`), or `null` when the
   *   requested path does not exist at that revision
   */
  static async list(repoUrl: string, listOptions: ListOptions, options: DvcOptions): Promise<FileRecord[] | null> {
    const base = normalizeRepoPath(listOptions.path);
    const args = [
      'ls',
      repoUrl,
      ...(base === '/' ? [] : [base.slice(1)]),
      '--json',
      '--size',
      '--show-hash',
      ...(listOptions.recursive ? ['--recursive'] : []),
      ...(listOptions.rev ? ['--rev', listOptions.rev] : []),
    ];

    let result: ProcessResult;
    try {
      result = await options.runner.run(options.dvcPath, args);
    } catch (error) {
      if (error instanceof CommandFailedError && MISSING_PATH_PATTERN.test(error.stderr)) {
        return null;
      }
      throw error;
    }

    return parseListing(result.stdout, base);
  }

  private dvc(args: readonly string[], runOptions: RunOptions = {}): Promise<ProcessResult> {
    return this.options.runner.run(this.options.dvcPath, args, { ...runOptions, cwd: this.dir });
  }
}

function normalizeRepoPath(path: string | undefined): string {
  const segments = (path ?? '').split('/').filter((segment) => segment.length > 0 && segment !== '.');
  return '/' + segments.join('/');
}

/**
 * Parses `dvc ls --json` output. Entry paths are relative to `base`.
 */
export function parseListing(stdout: string, base = '/'): FileRecord[] {
  const text = stdout.trim();
  if (text.length === 0) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError('dvc ls produced invalid JSON', { operation: 'list', cause: error });
  }

  const parsed = dvcListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Unexpected dvc ls output: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
      operation: 'list',
    });
  }

  return parsed.data.map((entry): FileRecord => {
    const path = base === '/' ? `/${entry.path}` : `${base}/${entry.path}`;
    const record: FileRecord = { path, type: entry.isdir ? 'directory' : 'file' };
    if (typeof entry.size === 'number') record.size = entry.size;
    if (entry.md5) record.checksum = entry.md5;
    if (entry.isout) record.dvcTracked = true;
    return record;
  });
}
