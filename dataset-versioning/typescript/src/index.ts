/**
 * Dataset Versioning Integration
 *
 * Versioned datasets on top of a Git hosting service and an S3-backed data
 * remote:
 * - Archive ingestion (zip, tar, tar.gz, tar.bz2, tar.xz) with traversal checks
 * - Repository and organization management over the hosting REST API
 * - Tagged versions published through git and dvc
 * - Version listings, directory browsing and full file trees
 * - Retry with exponential backoff and per-remote circuit breakers
 *
 * @example
 * ```typescript
 * import { configFromEnvironment, createDatasetVersioning } from 'dataset-versioning';
 *
 * const service = createDatasetVersioning(configFromEnvironment());
 * try {
 *   const result = await service.orchestrator.initializeDataset({
 *     datasetId: 'ds-42',
 *     datasetName: 'Street scenes',
 *     tenant: 'acme',
 *     storagePrefix: 'datasets/acme',
 *     archivePath: '/uploads/street-scenes.zip',
 *   });
 *   console.log(result.repoUrl, result.versionTag);
 * } finally {
 *   await service.close();
 * }
 * ```
 *
 * @module dataset-versioning
 */

import type { DatasetVersioningConfig } from './config/index.js';
import { RepoHostingClient } from './hosting/client.js';
import { createLoggingHook } from './observability/events.js';
import { ConsoleLogger } from './observability/logging.js';
import type { Logger } from './observability/logging.js';
import { DatasetOrchestrator } from './orchestrator/dataset-orchestrator.js';
import { SpawnProcessRunner } from './process/runner.js';
import type { ProcessRunner } from './process/runner.js';
import { RetryExecutor } from './resilience/retry.js';
import { createHttpRetryPolicy } from './resilience/policy.js';
import { CIRCUITS, CircuitBreakerRegistry } from './resilience/registry.js';
import { UndiciFileDownloader } from './transport/downloader.js';
import type { FileDownloader } from './transport/downloader.js';
import type { HttpTransport } from './transport/http-transport.js';

// =============================================================================
// Module Exports
// =============================================================================

export * from './errors/index.js';
export * from './config/index.js';
export * from './observability/logging.js';
export * from './observability/events.js';
export * from './resilience/index.js';
export * from './transport/index.js';
export * from './process/index.js';
export * from './hosting/index.js';
export * from './vcs/index.js';
export * from './data/index.js';
export * from './archive/index.js';
export * from './tree/index.js';
export * from './orchestrator/index.js';

// =============================================================================
// Factory
// =============================================================================

export interface DatasetVersioningOverrides {
  logger?: Logger;
  runner?: ProcessRunner;
  downloader?: FileDownloader;
  transport?: HttpTransport;
}

export interface DatasetVersioning {
  orchestrator: DatasetOrchestrator;
  hosting: RepoHostingClient;
  /** Absent when circuit breaking is disabled in the config. */
  breakers?: CircuitBreakerRegistry;
  close(): Promise<void>;
}

/**
 * Wires the orchestrator and its collaborators from a validated config.
 */
export function createDatasetVersioning(
  config: DatasetVersioningConfig,
  overrides: DatasetVersioningOverrides = {}
): DatasetVersioning {
  const logger = overrides.logger ?? new ConsoleLogger({ ...config.logging, includeTimestamps: true });
  const hooks = [createLoggingHook(logger)];

  const { circuitBreaker } = config.resilience;
  const breakers = circuitBreaker.enabled
    ? new CircuitBreakerRegistry(
        { failureThreshold: circuitBreaker.failureThreshold, recoveryTimeoutMs: circuitBreaker.recoveryTimeoutMs },
        { hooks }
      )
    : undefined;

  const hosting = new RepoHostingClient(config.hosting, {
    transport: overrides.transport,
    logger,
    retry: new RetryExecutor(createHttpRetryPolicy(config.resilience.http), { hooks }),
    circuitBreaker: breakers?.get(CIRCUITS.hostingApi),
    defaultBranch: config.vcs.defaultBranch,
  });

  const orchestrator = new DatasetOrchestrator({
    config,
    hosting,
    runner: overrides.runner ?? new SpawnProcessRunner({ timeoutMs: config.vcs.commandTimeoutMs }),
    downloader: overrides.downloader ?? new UndiciFileDownloader({ timeoutMs: config.hosting.timeoutMs }),
    logger,
    breakers,
  });

  return {
    orchestrator,
    hosting,
    breakers,
    close: () => hosting.close(),
  };
}

/**
 * Runs `fn` against a freshly wired service and closes it afterwards.
 */
export async function withDatasetVersioning<T>(
  config: DatasetVersioningConfig,
  fn: (service: DatasetVersioning) => Promise<T>,
  overrides: DatasetVersioningOverrides = {}
): Promise<T> {
  const service = createDatasetVersioning(config, overrides);
  try {
    return await fn(service);
  } finally {
    await service.close();
  }
}
