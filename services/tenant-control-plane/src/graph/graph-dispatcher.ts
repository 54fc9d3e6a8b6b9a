import type { Dispatcher } from 'undici';
import { request } from 'undici';
import { type AuditSink, describeError } from '../audit';
import type { AccessTokenProvider } from '../auth/types';
import type { TenantConfig } from '../config';
import { GraphRequestError, RetryExhaustedError } from '../errors';
import {
  type GraphErrorResponse,
  GraphErrorResponseSchema,
  type GraphRequestOptions,
  type GraphResponse,
  type HttpMethod,
  IDEMPOTENT_METHODS,
} from './graph.types';
import { isRetryable, parseRetryAfter, planRetry, type RetryPolicy } from './retry-policy';
import type { Sleeper } from './sleeper';

export interface GraphDispatcherOptions {
  httpDispatcher: Dispatcher;
  sleep: Sleeper;
  timeoutMs: number;
  maxRetries: number;
  retryPolicy: RetryPolicy;
}

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Sends Graph calls for one tenant. Every attempt asks the token provider for
 * a token, so an expired one is replaced between retries. Throttled and
 * unavailable responses are retried within the attempt budget; everything
 * else is final.
 */
export class GraphDispatcher {
  public constructor(
    private readonly tenant: TenantConfig,
    private readonly tokenProvider: AccessTokenProvider,
    private readonly audit: AuditSink,
    private readonly options: GraphDispatcherOptions,
  ) {}

  public async get(path: string, options?: GraphRequestOptions): Promise<GraphResponse> {
    return this.request('GET', path, options);
  }

  public async post(
    path: string,
    body: unknown,
    options: GraphRequestOptions = {},
  ): Promise<GraphResponse> {
    return this.request('POST', path, { ...options, body });
  }

  public async request(
    method: HttpMethod,
    path: string,
    options: GraphRequestOptions = {},
  ): Promise<GraphResponse> {
    const url = this.buildUrl(path);
    const scopes = options.scopes ?? this.tenant.defaultScopes;
    const idempotent = options.idempotent ?? IDEMPOTENT_METHODS.has(method);
    const maxAttempts = this.options.maxRetries + 1;
    let backoffStep = 0;
    let lastStatus = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const token = await this.tokenProvider.acquireToken(scopes);
      const response = await this.send(method, url, token, options, attempt);
      const { statusCode } = response;
      lastStatus = statusCode;

      if (isRetryable(statusCode, idempotent)) {
        await response.body.dump();
        if (attempt === maxAttempts) {
          break;
        }

        const plan = planRetry(
          this.options.retryPolicy,
          backoffStep,
          parseRetryAfter(response.headers['retry-after']),
        );
        this.audit.warn('graph_throttled', {
          status: statusCode,
          retryAfter: plan.waitSeconds,
          attempt,
          url,
        });
        await this.options.sleep(plan.waitSeconds * 1000, options.signal);
        backoffStep = plan.nextBackoffStep;
        continue;
      }

      if (statusCode >= 400) {
        return this.handleErrorResponse(statusCode, response, url);
      }

      const body = await this.readBody(statusCode, response, url);
      this.audit.info('graph_request_succeeded', { status: statusCode, url });
      return { statusCode, headers: response.headers, url, body };
    }

    this.audit.error('graph_retries_exhausted', {
      status: lastStatus,
      attempts: maxAttempts,
      url,
    });
    throw new RetryExhaustedError(url, maxAttempts, lastStatus);
  }

  private buildUrl(path: string): string {
    if (ABSOLUTE_URL.test(path)) {
      return path;
    }
    return `${this.tenant.graphBaseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  private async send(
    method: HttpMethod,
    url: string,
    token: string,
    options: GraphRequestOptions,
    attempt: number,
  ): Promise<Dispatcher.ResponseData> {
    const callerHeaders = Object.fromEntries(
      Object.entries(options.headers ?? {}).filter(
        ([name]) => name.toLowerCase() !== 'authorization',
      ),
    );
    const hasHeader = (name: string) =>
      Object.keys(callerHeaders).some((header) => header.toLowerCase() === name);

    const headers: Record<string, string> = {
      ...(hasHeader('accept') ? {} : { Accept: 'application/json' }),
      ...(options.body !== undefined && !hasHeader('content-type')
        ? { 'Content-Type': 'application/json' }
        : {}),
      ...callerHeaders,
      Authorization: `Bearer ${token}`,
    };

    try {
      return await request(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: options.signal,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.httpDispatcher,
      });
    } catch (error) {
      this.audit.error('graph_transport_failed', { url, attempt, error: describeError(error) });
      throw error;
    }
  }

  private async handleErrorResponse(
    statusCode: number,
    response: Dispatcher.ResponseData,
    url: string,
  ): Promise<never> {
    const body = await response.body.text();
    const graphError = parseGraphError(body);
    const requestId =
      graphError?.innerError?.['request-id'] ?? headerValue(response.headers['request-id']);

    this.audit.error('graph_request_failed', { status: statusCode, url, body });
    throw new GraphRequestError(
      graphError?.message ?? `Graph request failed with status ${statusCode}`,
      { statusCode, body, code: graphError?.code, requestId },
    );
  }

  private async readBody(
    statusCode: number,
    response: Dispatcher.ResponseData,
    url: string,
  ): Promise<unknown> {
    const text = await response.body.text();
    if (text === '') {
      return undefined;
    }
    const contentType = headerValue(response.headers['content-type']) ?? '';
    if (!contentType.includes('json')) {
      return text;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      this.audit.error('graph_request_failed', { status: statusCode, url, body: text });
      throw new GraphRequestError(`Graph returned malformed JSON with status ${statusCode}`, {
        statusCode,
        body: text,
        requestId: headerValue(response.headers['request-id']),
        cause: error,
      });
    }
  }
}

function parseGraphError(body: string): GraphErrorResponse['error'] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = GraphErrorResponseSchema.safeParse(parsed);
  return result.success ? result.data.error : undefined;
}

function headerValue(header: string | string[] | undefined): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}
