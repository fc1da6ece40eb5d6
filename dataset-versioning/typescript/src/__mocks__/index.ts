import { SecretString, createDefaultConfig } from '../config/index.js';
import type { DatasetVersioningConfig } from '../config/index.js';
import { RetryExecutor } from '../resilience/retry.js';
import { createGitRetryPolicy, createHttpRetryPolicy } from '../resilience/policy.js';
import type { HostingRepo } from '../hosting/types.js';

export * from './http-transport.mock.js';
export * from './process-runner.mock.js';
export * from './downloader.mock.js';

/**
 * Complete, valid configuration with placeholder credentials.
 */
export function mockConfig(workspaceRoot?: string): DatasetVersioningConfig {
  const config = createDefaultConfig();
  config.hosting.baseUrl = 'https://git.test.local';
  config.hosting.user = 'svc-datasets';
  config.hosting.token = new SecretString('test-token');
  config.storage.endpointUrl = 'https://s3.test.local';
  config.storage.accessKeyId = 'test-access-key';
  config.storage.secretAccessKey = new SecretString('test-secret');
  if (workspaceRoot !== undefined) config.workspace.rootDir = workspaceRoot;
  return config;
}

export function mockRepo(overrides: Partial<HostingRepo> = {}): HostingRepo {
  return {
    id: 7,
    name: 'ds-1',
    full_name: 'acme/ds-1',
    clone_url: 'https://git.test.local/acme/ds-1.git',
    private: true,
    ...overrides,
  };
}

const noSleep = async (): Promise<void> => {};

export function immediateHttpRetry(maxAttempts = 3): RetryExecutor {
  return new RetryExecutor(createHttpRetryPolicy({ maxAttempts }), { sleep: noSleep });
}

export function immediateGitRetry(maxAttempts = 3): RetryExecutor {
  return new RetryExecutor(createGitRetryPolicy({ maxAttempts }), { sleep: noSleep });
}
