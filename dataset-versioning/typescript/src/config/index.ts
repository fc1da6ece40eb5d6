/**
 * Configuration types for the dataset versioning integration.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LOG_FORMATS, LOG_LEVELS } from '../observability/logging.js';
import type { LogFormat, LogLevel } from '../observability/logging.js';
import { DEFAULT_CIRCUIT_BREAKER, DEFAULT_GIT_RETRY, DEFAULT_HTTP_RETRY } from '../resilience/policy.js';
import type { CircuitBreakerSettings, RetrySettings } from '../resilience/types.js';

// ============================================================================
// Secret String
// ============================================================================

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Default Constants
// ============================================================================

/** Default hosting API request timeout in milliseconds. */
export const DEFAULT_HOSTING_TIMEOUT_MS = 30000;

/** Default number of pooled connections to the hosting API. */
export const DEFAULT_POOL_CONNECTIONS = 10;

/** Default keep-alive for idle pooled connections in milliseconds. */
export const DEFAULT_KEEP_ALIVE_MS = 60000;

/** Name of the data remote inside each dataset repository. */
export const DEFAULT_REMOTE_NAME = 'storage';

export const DEFAULT_BRANCH = 'main';

/** Default timeout for external commands (10 minutes). */
export const DEFAULT_COMMAND_TIMEOUT_MS = 10 * 60 * 1000;

export const DEFAULT_MAX_ARCHIVE_ENTRIES = 100000;

/** Default cap on declared extracted bytes (10 GiB). */
export const DEFAULT_MAX_EXTRACTED_BYTES = 10 * 1024 * 1024 * 1024;

// ============================================================================
// Configuration Types
// ============================================================================

export interface PoolSettings {
  /** Maximum concurrent connections to the hosting API. */
  connections: number;
  /** Idle keep-alive timeout in milliseconds. */
  keepAliveTimeoutMs: number;
}

/**
 * Repository hosting service (Gitea-compatible REST API).
 */
export interface HostingConfig {
  /** Base URL, e.g. `https://git.example.com`. */
  baseUrl: string;
  /** Service account that owns the token; also used in clone URLs. */
  user: string;
  token: SecretString;
  /** Contact email set on newly created organizations. */
  defaultOrgEmail?: string;
  /** Location set on newly created organizations. */
  defaultLocation?: string;
  timeoutMs: number;
  pool: PoolSettings;
}

/**
 * S3-compatible object storage backing the data remote.
 */
export interface StorageConfig {
  endpointUrl: string;
  accessKeyId: string;
  secretAccessKey: SecretString;
  remoteName: string;
}

export interface VcsConfig {
  gitPath: string;
  dvcPath: string;
  /** System tar, used for bzip2 and xz archives. */
  tarPath: string;
  authorName: string;
  authorEmail: string;
  defaultBranch: string;
  commandTimeoutMs: number;
}

export interface WorkspaceConfig {
  /** Parent directory for scoped workspaces. Defaults to the OS temp dir. */
  rootDir?: string;
}

export interface ArchiveLimits {
  maxEntries: number;
  maxExtractedBytes: number;
}

export interface ResilienceConfig {
  http: RetrySettings;
  git: RetrySettings;
  circuitBreaker: CircuitBreakerSettings;
}

export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
}

export interface DatasetVersioningConfig {
  hosting: HostingConfig;
  storage: StorageConfig;
  vcs: VcsConfig;
  workspace: WorkspaceConfig;
  archive: ArchiveLimits;
  resilience: ResilienceConfig;
  logging: LoggingSettings;
}

// ============================================================================
// Zod Validation Schemas
// ============================================================================

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
    message: 'must start with http:// or https://',
  });

const hostingSchema = z.object({
  baseUrl: httpUrlSchema,
  user: z.string().min(1, 'user is required'),
  token: z.string().min(1, 'token is required'),
  defaultOrgEmail: z.string().email().optional(),
  defaultLocation: z.string().optional(),
  timeoutMs: z.number().int().positive(),
  pool: z.object({
    connections: z.number().int().min(1),
    keepAliveTimeoutMs: z.number().int().min(0),
  }),
});

const storageSchema = z.object({
  endpointUrl: httpUrlSchema,
  accessKeyId: z.string().min(1, 'access key id is required'),
  secretAccessKey: z.string().min(1, 'secret access key is required'),
  remoteName: z.string().regex(/^[A-Za-z0-9_-]+$/, 'remote name must be alphanumeric'),
});

const vcsSchema = z.object({
  gitPath: z.string().min(1),
  dvcPath: z.string().min(1),
  tarPath: z.string().min(1),
  authorName: z.string().min(1),
  authorEmail: z.string().email(),
  defaultBranch: z.string().min(1),
  commandTimeoutMs: z.number().int().positive(),
});

const archiveSchema = z.object({
  maxEntries: z.number().int().min(1),
  maxExtractedBytes: z.number().int().min(1),
});

const retrySettingsSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    backoffMultiplier: z.number().min(1.0),
    jitter: z.boolean(),
  })
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: 'maxDelayMs must not be below baseDelayMs',
    path: ['maxDelayMs'],
  });

const circuitBreakerSchema = z.object({
  failureThreshold: z.number().int().min(1),
  recoveryTimeoutMs: z.number().int().min(0),
  enabled: z.boolean(),
});

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);
const logFormatSchema = z.enum(['pretty', 'json', 'compact']);

// ============================================================================
// Configuration Factory
// ============================================================================

/**
 * Creates a configuration with defaults for everything except the hosting
 * and storage credentials, which must be supplied.
 */
export function createDefaultConfig(): DatasetVersioningConfig {
  return {
    hosting: {
      baseUrl: '',
      user: '',
      token: new SecretString(''),
      timeoutMs: DEFAULT_HOSTING_TIMEOUT_MS,
      pool: {
        connections: DEFAULT_POOL_CONNECTIONS,
        keepAliveTimeoutMs: DEFAULT_KEEP_ALIVE_MS,
      },
    },
    storage: {
      endpointUrl: '',
      accessKeyId: '',
      secretAccessKey: new SecretString(''),
      remoteName: DEFAULT_REMOTE_NAME,
    },
    vcs: {
      gitPath: 'git',
      dvcPath: 'dvc',
      tarPath: 'tar',
      authorName: 'Dataset Service',
      authorEmail: 'dataset-service@localhost.localdomain',
      defaultBranch: DEFAULT_BRANCH,
      commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    },
    workspace: {},
    archive: {
      maxEntries: DEFAULT_MAX_ARCHIVE_ENTRIES,
      maxExtractedBytes: DEFAULT_MAX_EXTRACTED_BYTES,
    },
    resilience: {
      http: { ...DEFAULT_HTTP_RETRY },
      git: { ...DEFAULT_GIT_RETRY },
      circuitBreaker: { ...DEFAULT_CIRCUIT_BREAKER },
    },
    logging: {
      level: 'info',
      format: 'pretty',
    },
  };
}

// ============================================================================
// Validation
// ============================================================================

function check(section: string, schema: z.ZodTypeAny, value: unknown): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid ${section} configuration: ${detail}`);
  }
}

/**
 * Validates a configuration.
 * @throws {ConfigurationError} If any section is invalid.
 */
export function validateConfig(config: DatasetVersioningConfig): void {
  check('hosting', hostingSchema, { ...config.hosting, token: config.hosting.token.expose() });
  check('storage', storageSchema, {
    ...config.storage,
    secretAccessKey: config.storage.secretAccessKey.expose(),
  });
  check('vcs', vcsSchema, config.vcs);
  check('archive', archiveSchema, config.archive);
  check('http retry', retrySettingsSchema, config.resilience.http);
  check('git retry', retrySettingsSchema, config.resilience.git);
  check('circuit breaker', circuitBreakerSchema, config.resilience.circuitBreaker);
  check('logging', z.object({ level: logLevelSchema, format: logFormatSchema }), config.logging);
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Fluent builder for {@link DatasetVersioningConfig}.
 *
 * @example
 * ```typescript
 * const config = new DatasetVersioningConfigBuilder()
 *   .hosting('https://git.example.com', 'svc-datasets', 'token')
 *   .storage('https://s3.example.com', 'access-key', 'secret-key')
 *   .build();
 * ```
 */
export class DatasetVersioningConfigBuilder {
  private readonly config: DatasetVersioningConfig;

  constructor(base?: DatasetVersioningConfig) {
    this.config = base ?? createDefaultConfig();
  }

  hosting(baseUrl: string, user: string, token: string): this {
    this.config.hosting.baseUrl = baseUrl.replace(/\/+$/, '');
    this.config.hosting.user = user;
    this.config.hosting.token = new SecretString(token);
    return this;
  }

  orgDefaults(email?: string, location?: string): this {
    this.config.hosting.defaultOrgEmail = email;
    this.config.hosting.defaultLocation = location;
    return this;
  }

  hostingTimeout(timeoutMs: number): this {
    this.config.hosting.timeoutMs = timeoutMs;
    return this;
  }

  pool(settings: Partial<PoolSettings>): this {
    this.config.hosting.pool = { ...this.config.hosting.pool, ...settings };
    return this;
  }

  storage(endpointUrl: string, accessKeyId: string, secretAccessKey: string): this {
    this.config.storage.endpointUrl = endpointUrl;
    this.config.storage.accessKeyId = accessKeyId;
    this.config.storage.secretAccessKey = new SecretString(secretAccessKey);
    return this;
  }

  tools(paths: Partial<Pick<VcsConfig, 'gitPath' | 'dvcPath' | 'tarPath'>>): this {
    this.config.vcs = { ...this.config.vcs, ...paths };
    return this;
  }

  author(name: string, email: string): this {
    this.config.vcs.authorName = name;
    this.config.vcs.authorEmail = email;
    return this;
  }

  commandTimeout(timeoutMs: number): this {
    this.config.vcs.commandTimeoutMs = timeoutMs;
    return this;
  }

  workspaceRoot(rootDir: string): this {
    this.config.workspace.rootDir = rootDir;
    return this;
  }

  archiveLimits(limits: Partial<ArchiveLimits>): this {
    this.config.archive = { ...this.config.archive, ...limits };
    return this;
  }

  httpRetry(settings: Partial<RetrySettings>): this {
    this.config.resilience.http = { ...this.config.resilience.http, ...settings };
    return this;
  }

  gitRetry(settings: Partial<RetrySettings>): this {
    this.config.resilience.git = { ...this.config.resilience.git, ...settings };
    return this;
  }

  circuitBreaker(settings: Partial<CircuitBreakerSettings>): this {
    this.config.resilience.circuitBreaker = { ...this.config.resilience.circuitBreaker, ...settings };
    return this;
  }

  logging(level: LogLevel, format: LogFormat = this.config.logging.format): this {
    this.config.logging = { level, format };
    return this;
  }

  /**
   * Validates and returns the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): DatasetVersioningConfig {
    validateConfig(this.config);
    return this.config;
  }
}

// ============================================================================
// Environment
// ============================================================================

export const ENV_PREFIX = 'DATASET_';

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[ENV_PREFIX + name];
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`Missing required environment variable: ${ENV_PREFIX}${name}`);
  }
  return value.trim();
}

function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[ENV_PREFIX + name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Builds a configuration from `DATASET_*` environment variables.
 *
 * Required: `DATASET_HOSTING_URL`, `DATASET_HOSTING_USER`,
 * `DATASET_HOSTING_TOKEN`, `DATASET_S3_ENDPOINT_URL`,
 * `DATASET_S3_ACCESS_KEY_ID`, `DATASET_S3_SECRET_ACCESS_KEY`.
 *
 * @throws {ConfigurationError} If a required variable is missing or a value is invalid.
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv = process.env): DatasetVersioningConfig {
  const builder = new DatasetVersioningConfigBuilder()
    .hosting(required(env, 'HOSTING_URL'), required(env, 'HOSTING_USER'), required(env, 'HOSTING_TOKEN'))
    .storage(
      required(env, 'S3_ENDPOINT_URL'),
      required(env, 'S3_ACCESS_KEY_ID'),
      required(env, 'S3_SECRET_ACCESS_KEY')
    )
    .orgDefaults(optional(env, 'HOSTING_ORG_EMAIL'), optional(env, 'HOSTING_ORG_LOCATION'));

  const gitPath = optional(env, 'GIT_PATH');
  const dvcPath = optional(env, 'DVC_PATH');
  const tarPath = optional(env, 'TAR_PATH');
  builder.tools({
    ...(gitPath ? { gitPath } : {}),
    ...(dvcPath ? { dvcPath } : {}),
    ...(tarPath ? { tarPath } : {}),
  });

  const authorName = optional(env, 'GIT_AUTHOR_NAME');
  const authorEmail = optional(env, 'GIT_AUTHOR_EMAIL');
  if (authorName && authorEmail) {
    builder.author(authorName, authorEmail);
  }

  const workDir = optional(env, 'WORK_DIR');
  if (workDir) {
    builder.workspaceRoot(workDir);
  }

  const level = optional(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Invalid ${ENV_PREFIX}LOG_LEVEL: ${level}`);
  }
  const format = optional(env, 'LOG_FORMAT') ?? 'pretty';
  if (!isLogFormat(format)) {
    throw new ConfigurationError(`Invalid ${ENV_PREFIX}LOG_FORMAT: ${format}`);
  }
  builder.logging(level, format);

  return builder.build();
}
