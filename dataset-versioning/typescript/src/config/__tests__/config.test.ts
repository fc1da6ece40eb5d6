import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BRANCH,
  DEFAULT_REMOTE_NAME,
  DatasetVersioningConfigBuilder,
  SecretString,
  configFromEnvironment,
  createDefaultConfig,
  validateConfig,
} from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

const BASE_ENV = {
  DATASET_HOSTING_URL: 'https://git.test.local/',
  DATASET_HOSTING_USER: 'svc-datasets',
  DATASET_HOSTING_TOKEN: 'test-token',
  DATASET_S3_ENDPOINT_URL: 'https://s3.test.local',
  DATASET_S3_ACCESS_KEY_ID: 'test-access-key',
  DATASET_S3_SECRET_ACCESS_KEY: 'test-secret',
};

function builder(): DatasetVersioningConfigBuilder {
  return new DatasetVersioningConfigBuilder()
    .hosting('https://git.test.local', 'svc-datasets', 'test-token')
    .storage('https://s3.test.local', 'test-access-key', 'test-secret');
}

describe('SecretString', () => {
  it('should hide its value when printed or serialized', () => {
    const secret = new SecretString('test-secret');

    expect(secret.expose()).toBe('test-secret');
    expect(String(secret)).toBe('[REDACTED]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[REDACTED]"}');
  });

  it('should report emptiness', () => {
    expect(new SecretString('').isEmpty()).toBe(true);
    expect(new SecretString('x').isEmpty()).toBe(false);
  });
});

describe('createDefaultConfig', () => {
  it('should fill in tool and resilience defaults', () => {
    const config = createDefaultConfig();

    expect(config.storage.remoteName).toBe(DEFAULT_REMOTE_NAME);
    expect(config.vcs.defaultBranch).toBe(DEFAULT_BRANCH);
    expect(config.vcs.gitPath).toBe('git');
    expect(config.resilience.http.maxAttempts).toBe(4);
    expect(config.resilience.git.baseDelayMs).toBe(2000);
    expect(config.resilience.circuitBreaker).toEqual({ failureThreshold: 5, recoveryTimeoutMs: 60000, enabled: true });
  });

  it('should not validate without credentials', () => {
    expect(() => validateConfig(createDefaultConfig())).toThrow(ConfigurationError);
  });
});

describe('DatasetVersioningConfigBuilder', () => {
  it('should build a valid configuration', () => {
    const config = builder()
      .author('Data Bot', 'bot@test.local')
      .workspaceRoot('/var/tmp/datasets')
      .gitRetry({ maxAttempts: 2 })
      .circuitBreaker({ enabled: false })
      .logging('debug', 'json')
      .build();

    expect(config.hosting.token.expose()).toBe('test-token');
    expect(config.vcs.authorName).toBe('Data Bot');
    expect(config.workspace.rootDir).toBe('/var/tmp/datasets');
    expect(config.resilience.git.maxAttempts).toBe(2);
    expect(config.resilience.git.baseDelayMs).toBe(2000);
    expect(config.resilience.circuitBreaker.enabled).toBe(false);
    expect(config.logging).toEqual({ level: 'debug', format: 'json' });
  });

  it('should strip trailing slashes from the hosting URL', () => {
    const config = builder().hosting('https://git.test.local///', 'svc', 'test-token').build();

    expect(config.hosting.baseUrl).toBe('https://git.test.local');
  });

  it('should reject a non-http hosting URL', () => {
    expect(() => builder().hosting('ftp://git.test.local', 'svc', 'test-token').build()).toThrow(
      /Invalid hosting configuration: baseUrl: must start with http:\/\/ or https:\/\//
    );
  });

  it('should reject a max delay below the base delay', () => {
    expect(() => builder().httpRetry({ baseDelayMs: 5000, maxDelayMs: 1000 }).build()).toThrow(
      'Invalid http retry configuration: maxDelayMs: maxDelayMs must not be below baseDelayMs'
    );
  });

  it('should reject an empty storage secret without echoing secrets', () => {
    let caught: unknown;
    try {
      builder().storage('https://s3.test.local', 'test-access-key', '').build();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(String(caught)).toContain('secretAccessKey: secret access key is required');
  });
});

describe('configFromEnvironment', () => {
  it('should read required and optional variables', () => {
    const config = configFromEnvironment({
      ...BASE_ENV,
      DATASET_HOSTING_ORG_EMAIL: 'data@test.local',
      DATASET_GIT_PATH: '/usr/local/bin/git',
      DATASET_GIT_AUTHOR_NAME: 'Data Bot',
      DATASET_GIT_AUTHOR_EMAIL: 'bot@test.local',
      DATASET_WORK_DIR: '/srv/work',
      DATASET_LOG_LEVEL: 'warn',
    });

    expect(config.hosting.baseUrl).toBe('https://git.test.local');
    expect(config.hosting.defaultOrgEmail).toBe('data@test.local');
    expect(config.storage.secretAccessKey.expose()).toBe('test-secret');
    expect(config.vcs.gitPath).toBe('/usr/local/bin/git');
    expect(config.vcs.dvcPath).toBe('dvc');
    expect(config.vcs.authorEmail).toBe('bot@test.local');
    expect(config.workspace.rootDir).toBe('/srv/work');
    expect(config.logging).toEqual({ level: 'warn', format: 'pretty' });
  });

  it('should name the missing variable', () => {
    const { DATASET_S3_ACCESS_KEY_ID: _omitted, ...env } = BASE_ENV;

    expect(() => configFromEnvironment(env)).toThrow('Missing required environment variable: DATASET_S3_ACCESS_KEY_ID');
  });

  it('should treat blank values as missing', () => {
    expect(() => configFromEnvironment({ ...BASE_ENV, DATASET_HOSTING_TOKEN: '  ' })).toThrow(
      'Missing required environment variable: DATASET_HOSTING_TOKEN'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => configFromEnvironment({ ...BASE_ENV, DATASET_LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid DATASET_LOG_LEVEL: verbose'
    );
  });
});
