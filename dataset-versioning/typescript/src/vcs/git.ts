/**
 * Version-control adapter over the git CLI.
 *
 * @module vcs/git
 */

import { CommandFailedError, ConflictError, ValidationError } from '../errors/index.js';
import type { ProcessResult, ProcessRunner } from '../process/runner.js';

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GitOptions {
  gitPath: string;
  identity: GitIdentity;
  defaultBranch: string;
  runner: ProcessRunner;
}

export interface TagInfo {
  name: string;
  commitHash: string;
  /** ISO-8601 creation date of the tag (or of the commit, for lightweight tags). */
  createdAt: string;
}

export interface CommitInfo {
  hash: string;
  author: string;
  /** ISO-8601 commit date. */
  date: string;
  message: string;
}

export interface WorkingTreeStatus {
  /** Changed in the working tree but not staged. */
  modified: string[];
  staged: string[];
  untracked: string[];
}

const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';
const LOG_FORMAT = '%H%x1f%an%x1f%cI%x1f%B%x1e';

const TAG_FORMAT = '%(refname:short)%09%(objectname)%09%(*objectname)%09%(creatordate:iso-strict)';

/**
 * Rejects names git would refuse as a tag, plus anything that looks like an option.
 */
export function assertValidTagName(name: string): void {
  const invalid =
    name.length === 0 ||
    name.length > 200 ||
    name.startsWith('-') ||
    name.startsWith('/') ||
    name.endsWith('/') ||
    name.endsWith('.') ||
    name.endsWith('.lock') ||
    name.includes('..') ||
    name.includes('@{') ||
    name.includes('//') ||
    name === '@' ||
    /[\x00-\x20\x7f~^:?*[\\]/.test(name);
  if (invalid) {
    throw new ValidationError(`Invalid version tag: '${name}'`);
  }
}

/**
 * A git working tree (or bare repository) on local disk.
 */
export class GitRepository {
  readonly dir: string;
  private readonly options: GitOptions;

  constructor(dir: string, options: GitOptions) {
    this.dir = dir;
    this.options = options;
  }

  /**
   * Clones `url` into `dir`. `dir` must not exist or must be empty.
   */
  static async clone(
    url: string,
    dir: string,
    options: GitOptions,
    cloneOptions: { bare?: boolean } = {}
  ): Promise<GitRepository> {
    const args = ['clone', ...(cloneOptions.bare ? ['--bare'] : []), '--', url, dir];
    await options.runner.run(options.gitPath, withIdentity(options.identity, args), {
      env: { GIT_TERMINAL_PROMPT: '0' },
    });
    return new GitRepository(dir, options);
  }

  async init(): Promise<void> {
    await this.git(['init', '-b', this.options.defaultBranch]);
  }

  /**
   * Adds the remote, or points an existing one at `url`.
   */
  async setRemote(name: string, url: string): Promise<void> {
    const { stdout } = await this.git(['remote']);
    const remotes = stdout.split('\n').map((line) => line.trim());
    if (remotes.includes(name)) {
      await this.git(['remote', 'set-url', name, url]);
    } else {
      await this.git(['remote', 'add', name, url]);
    }
  }

  /**
   * Stages `paths` and commits them.
   * @returns Hash of the new commit
   */
  async commit(paths: readonly string[], message: string): Promise<string> {
    await this.git(['add', '--', ...paths]);
    await this.git(['commit', '-m', message]);
    return this.revParse('HEAD');
  }

  async revParse(ref: string): Promise<string> {
    const { stdout } = await this.git(['rev-parse', ref]);
    return stdout.trim();
  }

  async tagExists(name: string): Promise<boolean> {
    const { stdout } = await this.git(['tag', '--list', name]);
    return stdout.split('\n').some((line) => line.trim() === name);
  }

  async remoteTagExists(name: string, remote = 'origin'): Promise<boolean> {
    const { stdout } = await this.git(['ls-remote', '--tags', remote, `refs/tags/${name}`]);
    return stdout.trim().length > 0;
  }

  /**
   * Creates an annotated tag on HEAD.
   * @throws ConflictError when the tag already exists
   */
  async createTag(name: string, message: string): Promise<void> {
    assertValidTagName(name);
    if (await this.tagExists(name)) {
      throw new ConflictError(`Tag '${name}' already exists`, { operation: 'createTag' });
    }
    try {
      await this.git(['tag', '-a', name, '-m', message]);
    } catch (error) {
      if (error instanceof CommandFailedError && /already exists/i.test(error.stderr)) {
        throw new ConflictError(`Tag '${name}' already exists`, { operation: 'createTag', cause: error });
      }
      throw error;
    }
  }

  async push(remote: string, ref: string): Promise<void> {
    try {
      await this.git(['push', remote, ref]);
    } catch (error) {
      // A rejected tag push means someone else published the same version first.
      if (error instanceof CommandFailedError && /\[rejected\].*\(already exists\)/.test(error.stderr)) {
        throw new ConflictError(`Ref '${ref}' already exists on ${remote}`, { operation: 'push', cause: error });
      }
      throw error;
    }
  }

  /**
   * Lists tags, newest first.
   */
  async listTags(): Promise<TagInfo[]> {
    const { stdout } = await this.git(['for-each-ref', '--sort=-creatordate', `--format=${TAG_FORMAT}`, 'refs/tags']);
    return stdout
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map(parseTagLine);
  }

  /**
   * Most recent commits reachable from HEAD, newest first.
   */
  async history(maxCount = 10): Promise<CommitInfo[]> {
    if (!Number.isInteger(maxCount) || maxCount < 1) {
      throw new ValidationError(`History length must be a positive integer, got ${maxCount}`, {
        operation: 'history',
      });
    }
    const { stdout } = await this.git(['log', `--max-count=${maxCount}`, `--format=${LOG_FORMAT}`]);
    return stdout
      .split(RECORD_SEPARATOR)
      .map((record) => record.replace(/^\n+/, ''))
      .filter((record) => record.length > 0)
      .map(parseCommitRecord);
  }

  /**
   * Detaches HEAD at a tag.
   */
  async checkoutTag(name: string): Promise<void> {
    assertValidTagName(name);
    await this.git(['checkout', '--quiet', `refs/tags/${name}`]);
  }

  async status(): Promise<WorkingTreeStatus> {
    const { stdout } = await this.git(['status', '--porcelain=v1', '-z']);
    return parseStatus(stdout);
  }

  /**
   * True when there is nothing to commit, untracked files included.
   */
  async isClean(): Promise<boolean> {
    const { modified, staged, untracked } = await this.status();
    return modified.length === 0 && staged.length === 0 && untracked.length === 0;
  }

  private git(args: readonly string[]): Promise<ProcessResult> {
    return this.options.runner.run(this.options.gitPath, withIdentity(this.options.identity, args), {
      cwd: this.dir,
      env: { GIT_TERMINAL_PROMPT: '0' },
    });
  }
}

function withIdentity(identity: GitIdentity, args: readonly string[]): string[] {
  return ['-c', `user.name=${identity.name}`, '-c', `user.email=${identity.email}`, ...args];
}

function parseTagLine(line: string): TagInfo {
  const [name = '', objectName = '', peeled = '', createdAt = ''] = line.split('\t');
  // Annotated tags point at a tag object; the peeled name is the commit.
  return { name, commitHash: peeled || objectName, createdAt };
}

function parseCommitRecord(record: string): CommitInfo {
  const [hash = '', author = '', date = '', ...rest] = record.split(FIELD_SEPARATOR);
  return { hash, author, date, message: rest.join(FIELD_SEPARATOR).trim() };
}

function parseStatus(output: string): WorkingTreeStatus {
  const status: WorkingTreeStatus = { modified: [], staged: [], untracked: [] };
  const entries = output.split('\0');
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i] ?? '';
    if (entry.length < 4) continue;
    const index = entry.charAt(0);
    const worktree = entry.charAt(1);
    const path = entry.slice(3);
    if (index === '?' && worktree === '?') {
      status.untracked.push(path);
      continue;
    }
    if (index !== ' ' && index !== '!') status.staged.push(path);
    if (worktree !== ' ' && worktree !== '!') status.modified.push(path);
    // Renames and copies carry the source path as the next entry.
    if (index === 'R' || index === 'C') i++;
  }
  return status;
}
