/**
 * Dataset orchestration: creating datasets, publishing versions and reading
 * them back.
 *
 * Every write operation runs in its own scoped workspace and talks to three
 * remotes: the hosting API (repositories), the version-control remote (commits
 * and tags) and the data remote (content). Each class of remote call has its
 * own retry policy and circuit breaker.
 *
 * @module orchestrator/dataset-orchestrator
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ArchiveIngester, assertSafeEntryName, summarizeDirectory } from '../archive/ingester.js';
import type { DatasetVersioningConfig } from '../config/index.js';
import { DvcRepository, dataRemoteUrl } from '../data/dvc.js';
import type { DataRemoteDescriptor, DvcOptions, ListOptions } from '../data/dvc.js';
import {
  ConflictError,
  DatasetOperationError,
  DatasetVersioningError,
  ValidationError,
  redactUrlCredentials,
  settle,
} from '../errors/index.js';
import type { RepoHostingClient } from '../hosting/client.js';
import type { HostingRepo } from '../hosting/types.js';
import { createLoggingHook } from '../observability/events.js';
import { NoopLogger, withLogContext } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import { ResiliencePipeline } from '../resilience/pipeline.js';
import { createGitRetryPolicy, createHttpRetryPolicy } from '../resilience/policy.js';
import { CIRCUITS } from '../resilience/registry.js';
import type { CircuitBreakerRegistry } from '../resilience/registry.js';
import { RetryExecutor } from '../resilience/retry.js';
import type { ProcessRunner } from '../process/runner.js';
import type { FileDownloader } from '../transport/downloader.js';
import { buildDirectoryListing, buildFileTree, normalizePath } from '../tree/tree-builder.js';
import type { DirectoryListing, FileRecord, FileTree } from '../tree/types.js';
import { GitRepository, assertValidTagName } from '../vcs/git.js';
import type { GitOptions } from '../vcs/git.js';
import { renderDatasetReadme } from './readme.js';
import type {
  CleanupInput,
  CleanupResult,
  CreateVersionInput,
  CreateVersionResult,
  FileReference,
  InitializeDatasetInput,
  InitializeDatasetResult,
  VersionFileList,
  VersionSummary,
} from './types.js';
import { clearDirectory, withWorkspace } from './workspace.js';

export const DATA_DIR = 'data';
export const GITKEEP = '.gitkeep';
export const INITIAL_VERSION_TAG = 'v1';
export const DEFAULT_BROWSE_PATH = '/data';

const INITIAL_METADATA_FILES = ['data.dvc', '.dvc/config', '.dvcignore', '.gitignore', 'README.md'];
const VERSION_METADATA_FILES = ['data.dvc', '.gitignore'];
const ORIGIN = 'origin';

const DATA_PATH = `/${DATA_DIR}`;

/** `data/` is the one DVC output of every dataset repository. */
function isDataPath(path: string): boolean {
  return path === DATA_PATH || path.startsWith(`${DATA_PATH}/`);
}

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,99}$/;

function assertIdentifier(label: string, value: string): void {
  if (!IDENTIFIER_PATTERN.test(value) || value.endsWith('.git')) {
    throw new ValidationError(`Invalid ${label}: '${value}'`);
  }
}

export interface DatasetOrchestratorDeps {
  config: DatasetVersioningConfig;
  hosting: RepoHostingClient;
  runner: ProcessRunner;
  downloader: FileDownloader;
  logger?: Logger;
  /** Circuit breakers per remote class; calls are unguarded when omitted. */
  breakers?: CircuitBreakerRegistry;
  /** Defaults to the configured HTTP retry policy. */
  httpRetry?: RetryExecutor;
  /** Defaults to the configured git retry policy. */
  gitRetry?: RetryExecutor;
}

interface PlannedDownload {
  file: FileReference;
  destination: string;
}

export class DatasetOrchestrator {
  private readonly config: DatasetVersioningConfig;
  private readonly hosting: RepoHostingClient;
  private readonly downloader: FileDownloader;
  private readonly logger: Logger;
  private readonly ingester: ArchiveIngester;
  private readonly gitOptions: GitOptions;
  private readonly dvcOptions: DvcOptions;
  private readonly vcsRemote: ResiliencePipeline;
  private readonly dataRemote: ResiliencePipeline;
  private readonly fileSource: ResiliencePipeline;

  constructor(deps: DatasetOrchestratorDeps) {
    const { config } = deps;
    this.config = config;
    this.hosting = deps.hosting;
    this.downloader = deps.downloader;
    this.logger = deps.logger ?? new NoopLogger();

    const hooks = [createLoggingHook(this.logger)];
    const httpRetry = deps.httpRetry ?? new RetryExecutor(createHttpRetryPolicy(config.resilience.http), { hooks });
    const gitRetry = deps.gitRetry ?? new RetryExecutor(createGitRetryPolicy(config.resilience.git), { hooks });
    this.vcsRemote = new ResiliencePipeline(gitRetry, deps.breakers?.get(CIRCUITS.vcsRemote));
    this.dataRemote = new ResiliencePipeline(gitRetry, deps.breakers?.get(CIRCUITS.dataRemote));
    this.fileSource = new ResiliencePipeline(httpRetry, deps.breakers?.get(CIRCUITS.fileSource));

    this.ingester = new ArchiveIngester({
      limits: config.archive,
      runner: deps.runner,
      tarPath: config.vcs.tarPath,
      logger: this.logger,
    });
    this.gitOptions = {
      gitPath: config.vcs.gitPath,
      identity: { name: config.vcs.authorName, email: config.vcs.authorEmail },
      defaultBranch: config.vcs.defaultBranch,
      runner: deps.runner,
    };
    this.dvcOptions = { dvcPath: config.vcs.dvcPath, runner: deps.runner };
  }

  // ==========================================================================
  // Write operations
  // ==========================================================================

  /**
   * Creates the hosting repository for a dataset, imports the archive as its
   * content and publishes it as version `v1`.
   *
   * Organization and repository are left in place when a later step fails.
   */
  async initializeDataset(input: InitializeDatasetInput): Promise<InitializeDatasetResult> {
    const logger = withLogContext(this.logger, {
      taskId: input.taskId ?? uuidv4(),
      datasetId: input.datasetId,
      tenant: input.tenant,
    });

    return this.run('initializeDataset', `dataset ${input.datasetId}`, logger, async () => {
      assertIdentifier('dataset id', input.datasetId);
      assertIdentifier('tenant', input.tenant);
      if (input.storagePrefix.trim().length === 0) {
        throw new ValidationError('storagePrefix must not be empty');
      }

      return withWorkspace(
        'dataset-init',
        async (workspace): Promise<InitializeDatasetResult> => {
          const repoDir = path.join(workspace, input.datasetId);
          const dataDir = path.join(repoDir, DATA_DIR);

          const ingest = await this.ingester.extract(input.archivePath, dataDir);
          const { fileCount, totalSize } = await summarizeDirectory(dataDir);
          logger.info('Archive ingested', { format: ingest.format, fileCount, totalSize });

          await this.hosting.createOrg(input.tenant);
          const repo = await this.ensureRepo(input.tenant, input.datasetId);

          const git = new GitRepository(repoDir, this.gitOptions);
          await git.init();
          await git.setRemote(ORIGIN, this.hosting.authenticatedCloneUrl(repo.clone_url));

          const remote = this.dataRemoteFor(input.storagePrefix, input.datasetId);
          const dvc = new DvcRepository(repoDir, this.dvcOptions);
          await dvc.init({ noScm: true });
          await dvc.configureRemote(this.config.storage.remoteName, remote, { isDefault: true });
          await writeFile(path.join(repoDir, '.gitignore'), `/${DATA_DIR}\n`);
          await dvc.track(DATA_DIR);
          await writeFile(
            path.join(repoDir, 'README.md'),
            renderDatasetReadme({
              datasetId: input.datasetId,
              datasetName: input.datasetName,
              tenant: input.tenant,
              fileCount,
              totalSize,
              sourceFile: path.basename(input.archivePath),
              dataRemoteUrl: remote.url,
            })
          );

          const commitHash = await git.commit(INITIAL_METADATA_FILES, `Initialize dataset ${input.datasetName}`);
          await git.createTag(INITIAL_VERSION_TAG, `Initial version - ${fileCount} files, ${totalSize} bytes`);
          await this.publish(git, dvc, this.config.vcs.defaultBranch, INITIAL_VERSION_TAG);

          return {
            datasetId: input.datasetId,
            repoUrl: repo.clone_url,
            dataRemoteUrl: remote.url,
            commitHash,
            fileCount,
            totalSize,
            versionTag: INITIAL_VERSION_TAG,
            status: 'initialized',
          };
        },
        { rootDir: this.config.workspace.rootDir }
      );
    });
  }

  /**
   * Replaces the dataset content with `files` and publishes it under a new tag.
   *
   * Files that cannot be downloaded are skipped and reported; an existing tag
   * fails the whole operation before anything is downloaded.
   */
  async createVersion(input: CreateVersionInput): Promise<CreateVersionResult> {
    const logger = withLogContext(this.logger, {
      taskId: input.taskId ?? uuidv4(),
      datasetId: input.datasetId,
      versionTag: input.versionTag,
    });
    const tag = input.versionTag;

    return this.run('createVersion', `dataset ${input.datasetId}`, logger, async () => {
      assertValidTagName(tag);

      return withWorkspace(
        'dataset-version',
        async (workspace): Promise<CreateVersionResult> => {
          const repoDir = path.join(workspace, 'repo');
          const dataDir = path.join(repoDir, DATA_DIR);
          const downloads = planDownloads(input.files, dataDir);

          const git = await this.cloneRepo(input.repoUrl, repoDir);
          if (
            (await git.tagExists(tag)) ||
            (await this.vcsRemote.execute('git.lsRemoteTag', () => git.remoteTagExists(tag, ORIGIN)))
          ) {
            throw new ConflictError(`Version tag '${tag}' already exists`, { operation: 'createVersion' });
          }

          const dvc = new DvcRepository(repoDir, this.dvcOptions);
          await dvc.configureCredentials(this.config.storage.remoteName, this.config.storage);
          await mkdir(dataDir, { recursive: true });
          await clearDirectory(dataDir, [GITKEEP]);

          const { fileCount, totalSize, skippedFiles } = await this.downloadAll(downloads, logger);
          logger.info('Files materialized', { fileCount, totalSize, skipped: skippedFiles.length });

          await dvc.track(DATA_DIR);
          const message = `Version ${tag}: ${input.commitMessage}`;
          const commitHash = await git.commit(VERSION_METADATA_FILES, message);
          await git.createTag(tag, message);
          await this.publish(git, dvc, 'HEAD', tag);

          return {
            versionId: input.versionId,
            versionTag: tag,
            commitHash,
            fileCount,
            totalSize,
            skippedFiles,
            status: 'completed',
          };
        },
        { rootDir: this.config.workspace.rootDir }
      );
    });
  }

  /**
   * Deletes the dataset's hosting repository. A repository that no longer
   * exists counts as deleted. Data remote content is not touched.
   */
  async cleanup(input: CleanupInput): Promise<CleanupResult> {
    const logger = withLogContext(this.logger, { datasetId: input.datasetId, tenant: input.tenant });
    return this.run('cleanup', `dataset ${input.datasetId}`, logger, async (): Promise<CleanupResult> => {
      assertIdentifier('dataset id', input.datasetId);
      assertIdentifier('tenant', input.tenant);
      const repoDeleted = await this.hosting.deleteRepo(input.tenant, input.datasetId);
      return { datasetId: input.datasetId, status: 'deleted', repoDeleted };
    });
  }

  // ==========================================================================
  // Read operations
  // ==========================================================================

  /**
   * Tags of the repository, newest first.
   */
  async listVersions(repoUrl: string): Promise<VersionSummary[]> {
    return this.run('listVersions', redactUrlCredentials(repoUrl), this.logger, () =>
      withWorkspace(
        'dataset-tags',
        async (workspace) => {
          const git = await this.cloneRepo(repoUrl, path.join(workspace, 'repo.git'), { bare: true });
          const tags = await git.listTags();
          return tags.map((tag) => ({ tag: tag.name, commitHash: tag.commitHash, createdAt: tag.createdAt }));
        },
        { rootDir: this.config.workspace.rootDir }
      )
    );
  }

  /**
   * Every file of a version. A listing failure is logged and yields an empty
   * list.
   */
  async getVersionFiles(repoUrl: string, tag: string): Promise<VersionFileList> {
    return this.run('getVersionFiles', redactUrlCredentials(repoUrl), this.logger, async (): Promise<VersionFileList> => {
      assertValidTagName(tag);
      const outcome = await settle(() => this.listRepository(repoUrl, { rev: tag, recursive: true }));
      if (!outcome.ok) {
        this.logger.warn('Could not list version files', {
          repo: redactUrlCredentials(repoUrl),
          tag,
          kind: outcome.error.kind,
          error: outcome.error.message,
        });
        return { files: [], totalCount: 0, totalSize: 0 };
      }

      const files = (outcome.value ?? [])
        .filter((record) => record.type === 'file')
        .map((record) => ({
          path: record.path,
          size: record.size ?? 0,
          ...(record.checksum !== undefined ? { checksum: record.checksum } : {}),
        }));
      return {
        files,
        totalCount: files.length,
        totalSize: files.reduce((sum, file) => sum + file.size, 0),
      };
    });
  }

  /**
   * One level of a version's content. A path that does not exist at that
   * version yields an empty listing.
   */
  async browsePath(repoUrl: string, tag: string, browse: string = DEFAULT_BROWSE_PATH): Promise<DirectoryListing> {
    return this.run('browsePath', redactUrlCredentials(repoUrl), this.logger, async () => {
      assertValidTagName(tag);
      const currentPath = normalizePath(browse);
      const records = await this.listRepository(repoUrl, { rev: tag, path: currentPath, recursive: false });
      return buildDirectoryListing(records ?? [], currentPath, { isTracked: isDataPath });
    });
  }

  async getFileTree(repoUrl: string, tag: string): Promise<FileTree> {
    return this.run('getFileTree', redactUrlCredentials(repoUrl), this.logger, async () => {
      assertValidTagName(tag);
      const records = await this.listRepository(repoUrl, { rev: tag, recursive: true });
      return buildFileTree(records ?? [], { rootPath: '/', versionTag: tag, isTracked: isDataPath });
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async run<T>(operation: string, subject: string, logger: Logger, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    logger.info(`${operation} started`, { subject });
    try {
      const result = await fn();
      logger.info(`${operation} completed`, { subject, durationMs: Date.now() - startTime });
      return result;
    } catch (error) {
      const failure = new DatasetOperationError(operation, subject, error);
      logger.error(`${operation} failed`, {
        subject,
        kind: failure.kind,
        error: failure.message,
        durationMs: Date.now() - startTime,
      });
      throw failure;
    }
  }

  /**
   * Returns the repository, creating it if needed. Losing a creation race to
   * another caller is not an error.
   */
  private async ensureRepo(org: string, name: string): Promise<HostingRepo> {
    const existing = await this.hosting.getRepo(org, name);
    if (existing) return existing;
    try {
      return await this.hosting.createRepo(org, name);
    } catch (error) {
      if (error instanceof DatasetVersioningError && error.kind === 'conflict') {
        const raced = await this.hosting.getRepo(org, name);
        if (raced) return raced;
      }
      throw error;
    }
  }

  private cloneRepo(repoUrl: string, dir: string, options: { bare?: boolean } = {}): Promise<GitRepository> {
    const url = this.hosting.authenticatedCloneUrl(repoUrl);
    return this.vcsRemote.execute('git.clone', async () => {
      // A failed attempt can leave a partial checkout behind.
      await rm(dir, { recursive: true, force: true });
      return GitRepository.clone(url, dir, this.gitOptions, options);
    });
  }

  private listRepository(repoUrl: string, options: ListOptions): Promise<FileRecord[] | null> {
    const url = this.hosting.authenticatedCloneUrl(repoUrl);
    return this.vcsRemote.execute('dvc.list', () => DvcRepository.list(url, options, this.dvcOptions));
  }

  /**
   * Content first, then the commit, then the tag: a published tag always
   * points at content that is already in the data remote.
   */
  private async publish(git: GitRepository, dvc: DvcRepository, ref: string, tag: string): Promise<void> {
    await this.dataRemote.execute('dvc.push', () => dvc.push());
    await this.vcsRemote.execute('git.push', () => git.push(ORIGIN, ref));
    await this.vcsRemote.execute('git.pushTag', () => git.push(ORIGIN, tag));
  }

  private async downloadAll(
    downloads: readonly PlannedDownload[],
    logger: Logger
  ): Promise<{ fileCount: number; totalSize: number; skippedFiles: string[] }> {
    let fileCount = 0;
    let totalSize = 0;
    const skippedFiles: string[] = [];

    for (const { file, destination } of downloads) {
      await mkdir(path.dirname(destination), { recursive: true });
      const outcome = await settle(() =>
        this.fileSource.execute(`download ${file.name}`, () => this.downloader.download(file.url, destination))
      );
      if (outcome.ok) {
        fileCount++;
        totalSize += outcome.value;
        continue;
      }
      skippedFiles.push(file.name);
      await rm(destination, { force: true });
      logger.warn('Skipping file that could not be downloaded', {
        file: file.name,
        kind: outcome.error.kind,
        error: outcome.error.message,
      });
    }

    return { fileCount, totalSize, skippedFiles };
  }

  private dataRemoteFor(storagePrefix: string, datasetId: string): DataRemoteDescriptor {
    return {
      url: dataRemoteUrl(storagePrefix, datasetId),
      endpointUrl: this.config.storage.endpointUrl,
      accessKeyId: this.config.storage.accessKeyId,
      secretAccessKey: this.config.storage.secretAccessKey,
    };
  }
}

function planDownloads(files: readonly FileReference[], dataDir: string): PlannedDownload[] {
  const seen = new Set<string>();
  return files.map((file) => {
    const destination = assertSafeEntryName(file.name, dataDir);
    if (seen.has(destination)) {
      throw new ValidationError(`File '${file.name}' is listed more than once`);
    }
    seen.add(destination);
    return { file, destination };
  });
}
