/**
 * Repository hosting client (Gitea-compatible REST API, `/api/v1`).
 *
 * @module hosting/client
 */

import type { z } from 'zod';
import type { HostingConfig } from '../config/index.js';
import { ApplicationRejectedError, ConflictError, ValidationError } from '../errors/index.js';
import { NoopLogger } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import type { ResilienceHook } from '../observability/events.js';
import { RetryExecutor } from '../resilience/retry.js';
import { createHttpRetryPolicy } from '../resilience/policy.js';
import { ResiliencePipeline } from '../resilience/pipeline.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { UndiciHttpTransport } from '../transport/http-transport.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/http-transport.js';
import {
  MAX_PAGE_LIMIT,
  hostingOrgSchema,
  hostingRepoListSchema,
  hostingRepoSchema,
} from './types.js';
import type { CreateOrgRequest, CreateRepoRequest, HostingOrg, HostingRepo } from './types.js';

const API_PREFIX = '/api/v1';

export interface RepoHostingClientOptions {
  /** Defaults to an {@link UndiciHttpTransport} built from the config. */
  transport?: HttpTransport;
  logger?: Logger;
  /** Defaults to an executor with the HTTP retry policy. */
  retry?: RetryExecutor;
  hooks?: ResilienceHook[];
  circuitBreaker?: CircuitBreaker;
  defaultBranch?: string;
}

/**
 * Inserts `user:token@` into an http(s) URL. Other schemes are returned
 * unchanged.
 */
export function withUrlCredentials(url: string, user: string, token: string): string {
  if (!/^https?:\/\//i.test(url)) {
    return url;
  }
  const parsed = new URL(url);
  parsed.username = encodeURIComponent(user);
  parsed.password = encodeURIComponent(token);
  return parsed.toString();
}

/**
 * Client for the organization and repository endpoints of the hosting service.
 *
 * Every request goes through the HTTP retry policy and, when one is given, a
 * circuit breaker. A 404 on a lookup means "not found" and yields `null`.
 * Other non-2xx answers fail with kind `rejected`, or `conflict` for 409.
 *
 * The client owns its transport; call {@link close} when done, or use
 * {@link withHostingClient}.
 */
export class RepoHostingClient {
  private readonly config: HostingConfig;
  private readonly transport: HttpTransport;
  private readonly pipeline: ResiliencePipeline;
  private readonly logger: Logger;
  private readonly defaultBranch: string;

  constructor(config: HostingConfig, options: RepoHostingClientOptions = {}) {
    this.config = config;
    this.transport =
      options.transport ??
      new UndiciHttpTransport(config.baseUrl, {
        connections: config.pool.connections,
        keepAliveTimeoutMs: config.pool.keepAliveTimeoutMs,
        timeoutMs: config.timeoutMs,
      });
    const retry = options.retry ?? new RetryExecutor(createHttpRetryPolicy(), { hooks: options.hooks });
    this.pipeline = new ResiliencePipeline(retry, options.circuitBreaker);
    this.logger = options.logger ?? new NoopLogger();
    this.defaultBranch = options.defaultBranch ?? 'main';
  }

  /**
   * Returns the organization, creating it when it does not exist yet.
   */
  async createOrg(name: string): Promise<HostingOrg> {
    const existing = await this.getOrg(name);
    if (existing) {
      this.logger.debug('Organization already exists', { org: name });
      return existing;
    }

    const body: CreateOrgRequest = {
      username: name,
      full_name: `Data Service ${name}`,
      description: `Organization for ${name} datasets`,
      email: this.config.defaultOrgEmail,
      location: this.config.defaultLocation,
      visibility: 'public',
      repo_admin_change_team_access: true,
    };
    const response = await this.send('createOrg', { method: 'POST', path: `${API_PREFIX}/orgs`, body });
    const org = this.parse('createOrg', hostingOrgSchema, response);
    this.logger.info('Created organization', { org: name, id: org.id });
    return org;
  }

  async getOrg(name: string): Promise<HostingOrg | null> {
    const response = await this.send(
      'getOrg',
      { method: 'GET', path: `${API_PREFIX}/orgs/${encodeURIComponent(name)}` },
      { allowNotFound: true }
    );
    return response.status === 404 ? null : this.parse('getOrg', hostingOrgSchema, response);
  }

  /**
   * Creates a private repository under `org`.
   * @throws ConflictError when a repository with that name already exists
   */
  async createRepo(org: string, name: string, description?: string): Promise<HostingRepo> {
    const body: CreateRepoRequest = {
      name,
      description: description ?? `Dataset ${name}`,
      private: true,
      default_branch: this.defaultBranch,
    };
    const response = await this.send('createRepo', {
      method: 'POST',
      path: `${API_PREFIX}/orgs/${encodeURIComponent(org)}/repos`,
      body,
    });
    const repo = this.parse('createRepo', hostingRepoSchema, response);
    this.logger.info('Created repository', { repo: repo.full_name });
    return repo;
  }

  async getRepo(org: string, name: string): Promise<HostingRepo | null> {
    const response = await this.send(
      'getRepo',
      { method: 'GET', path: repoPath(org, name) },
      { allowNotFound: true }
    );
    return response.status === 404 ? null : this.parse('getRepo', hostingRepoSchema, response);
  }

  /**
   * Deletes a repository.
   * @returns false when the repository did not exist
   */
  async deleteRepo(org: string, name: string): Promise<boolean> {
    const response = await this.send(
      'deleteRepo',
      { method: 'DELETE', path: repoPath(org, name) },
      { allowNotFound: true }
    );
    if (response.status === 404) {
      this.logger.debug('Repository already absent', { repo: `${org}/${name}` });
      return false;
    }
    this.logger.info('Deleted repository', { repo: `${org}/${name}` });
    return true;
  }

  /**
   * Lists one page of an organization's repositories.
   * @throws ValidationError for `page < 1` or a limit outside 1..100, before any request
   */
  async listRepos(org: string, page = 1, limit = 50): Promise<HostingRepo[]> {
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError(`page must be a positive integer, got ${page}`, { operation: 'listRepos' });
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
      throw new ValidationError(`limit must be between 1 and ${MAX_PAGE_LIMIT}, got ${limit}`, {
        operation: 'listRepos',
      });
    }
    const response = await this.send('listRepos', {
      method: 'GET',
      path: `${API_PREFIX}/orgs/${encodeURIComponent(org)}/repos`,
      query: { page, limit },
    });
    return this.parse('listRepos', hostingRepoListSchema, response);
  }

  /**
   * Clone URL carrying the service account credentials.
   */
  authenticatedCloneUrl(url: string): string {
    return withUrlCredentials(url, this.config.user, this.config.token.expose());
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private async send(
    operation: string,
    request: HttpRequest,
    options: { allowNotFound?: boolean } = {}
  ): Promise<HttpResponse> {
    return this.pipeline.execute(`hosting.${operation}`, async () => {
      const response = await this.transport.request({
        ...request,
        headers: { ...request.headers, authorization: `Bearer ${this.config.token.expose()}` },
      });
      if (response.status >= 200 && response.status < 300) {
        return response;
      }
      if (response.status === 404 && options.allowNotFound) {
        return response;
      }
      throw rejection(operation, request, response);
    });
  }

  private parse<S extends z.ZodTypeAny>(operation: string, schema: S, response: HttpResponse): z.infer<S> {
    const result = schema.safeParse(response.body);
    if (!result.success) {
      throw new ApplicationRejectedError(
        `Unexpected response body for ${operation}: ${result.error.issues[0]?.message ?? 'invalid'}`,
        response.status,
        { operation }
      );
    }
    return result.data;
  }
}

function repoPath(org: string, name: string): string {
  return `${API_PREFIX}/repos/${encodeURIComponent(org)}/${encodeURIComponent(name)}`;
}

function rejection(operation: string, request: HttpRequest, response: HttpResponse): Error {
  const detail = extractMessage(response.body);
  const message = `${request.method} ${request.path} returned ${response.status}${detail ? `: ${detail}` : ''}`;
  if (response.status === 409) {
    return new ConflictError(message, { operation, statusCode: 409 });
  }
  return new ApplicationRejectedError(message, response.status, { operation });
}

function extractMessage(body: unknown): string | undefined {
  if (typeof body === 'string') return body.slice(0, 200);
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * Runs `fn` with a client and closes the client afterwards.
 */
export async function withHostingClient<T>(
  config: HostingConfig,
  fn: (client: RepoHostingClient) => Promise<T>,
  options: RepoHostingClientOptions = {}
): Promise<T> {
  const client = new RepoHostingClient(config, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
