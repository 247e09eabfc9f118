/**
 * Delegation client
 * Calls a capability on another service and normalizes every outcome into a result value
 */

import type pino from 'pino';
import type { z } from 'zod';
import { version } from '../version.js';
import { describeError, truncate } from '../utils/index.js';

/**
 * Minimal fetch signature, injectable for tests
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Failure kinds a delegated call can produce
 */
export type DelegationErrorKind = 'upstream_transport' | 'upstream_application';

export interface DelegationSuccess<T> {
  success: true;
  status: number;
  data: T;
}

export interface DelegationFailure {
  success: false;
  kind: DelegationErrorKind;
  error: string;
  status?: number;
}

/**
 * Uniform outcome of a delegated call
 */
export type DelegationResult<T = unknown> = DelegationSuccess<T> | DelegationFailure;

/**
 * Per-call options
 */
export interface DelegationOptions {
  /** Overrides the client's default timeout */
  timeoutMs?: number;
  /** Statuses counted as success; any 2xx when omitted */
  acceptStatuses?: readonly number[];
}

/**
 * Options for a call whose body is validated
 */
export interface ValidatedDelegationOptions<T> extends DelegationOptions {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Client configuration
 */
export interface DelegationClientConfig {
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: pino.Logger;
}

const USER_AGENT = `team-agents/${version}`;

/**
 * Join a base URL and a tool name into the tool's invocation endpoint
 */
export function toolUrl(baseUrl: string, tool: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/tools/${encodeURIComponent(tool)}`;
}

export class DelegationClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: pino.Logger;

  constructor(config: DelegationClientConfig) {
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.logger = config.logger;
  }

  /**
   * Invoke a named tool on a sibling service
   */
  invokeTool<T>(baseUrl: string, tool: string, payload: unknown, options: ValidatedDelegationOptions<T>): Promise<DelegationResult<T>>;
  invokeTool(baseUrl: string, tool: string, payload: unknown, options?: DelegationOptions): Promise<DelegationResult>;
  invokeTool<T>(
    baseUrl: string,
    tool: string,
    payload: unknown,
    options: DelegationOptions & { schema?: z.ZodType<T, z.ZodTypeDef, unknown> } = {}
  ): Promise<DelegationResult<T> | DelegationResult> {
    return this.send('POST', toolUrl(baseUrl, tool), payload, options);
  }

  /**
   * POST a JSON body to any endpoint
   */
  postJson<T>(url: string, payload: unknown, options: ValidatedDelegationOptions<T>): Promise<DelegationResult<T>>;
  postJson(url: string, payload: unknown, options?: DelegationOptions): Promise<DelegationResult>;
  postJson<T>(
    url: string,
    payload: unknown,
    options: DelegationOptions & { schema?: z.ZodType<T, z.ZodTypeDef, unknown> } = {}
  ): Promise<DelegationResult<T> | DelegationResult> {
    return this.send('POST', url, payload, options);
  }

  /**
   * GET a JSON document, e.g. a service's /health
   */
  getJson<T>(url: string, options: ValidatedDelegationOptions<T>): Promise<DelegationResult<T>>;
  getJson(url: string, options?: DelegationOptions): Promise<DelegationResult>;
  getJson<T>(
    url: string,
    options: DelegationOptions & { schema?: z.ZodType<T, z.ZodTypeDef, unknown> } = {}
  ): Promise<DelegationResult<T> | DelegationResult> {
    return this.send('GET', url, undefined, options);
  }

  private async send<T>(
    method: 'GET' | 'POST',
    url: string,
    payload: unknown,
    options: DelegationOptions & { schema?: z.ZodType<T, z.ZodTypeDef, unknown> }
  ): Promise<DelegationResult<T> | DelegationResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const started = Date.now();

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, method === 'POST'
        ? {
            method,
            headers: {
              'Content-Type': 'application/json',
              'Accept': 'application/json',
              'User-Agent': USER_AGENT,
            },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(timeoutMs),
          }
        : {
            method,
            headers: { 'Accept': 'application/json', 'User-Agent': USER_AGENT },
            signal: AbortSignal.timeout(timeoutMs),
          });
      text = await response.text();
    } catch (error) {
      const message = isTimeout(error)
        ? `Request to ${url} timed out after ${timeoutMs}ms`
        : `Request to ${url} failed: ${describeError(error)}`;
      return this.fail({ success: false, kind: 'upstream_transport', error: message }, url);
    }

    this.logger?.debug({ url, status: response.status, durationMs: Date.now() - started }, 'Delegated call completed');

    if (!isAccepted(response.status, options.acceptStatuses)) {
      return this.fail({
        success: false,
        kind: 'upstream_application',
        status: response.status,
        error: `HTTP ${response.status}: ${truncate(text)}`,
      }, url);
    }

    let body: unknown = null;
    if (text.trim().length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        return this.fail({
          success: false,
          kind: 'upstream_application',
          status: response.status,
          error: `Invalid JSON response: ${truncate(text, 200)}`,
        }, url);
      }
    }

    if (!options.schema) {
      return { success: true, status: response.status, data: body };
    }

    const parsed = options.schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join(', ');
      return this.fail({
        success: false,
        kind: 'upstream_application',
        status: response.status,
        error: `Unexpected response shape: ${issues}`,
      }, url);
    }

    return { success: true, status: response.status, data: parsed.data };
  }

  private fail(failure: DelegationFailure, url: string): DelegationFailure {
    this.logger?.warn({ url, kind: failure.kind, status: failure.status, error: failure.error }, 'Delegated call failed');
    return failure;
  }
}

function isAccepted(status: number, accept?: readonly number[]): boolean {
  if (accept) return accept.includes(status);
  return status >= 200 && status < 300;
}

function isTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}
