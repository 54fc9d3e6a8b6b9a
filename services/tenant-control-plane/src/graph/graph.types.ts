import type { IncomingHttpHeaders } from 'node:http';
import { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'DELETE']);

export interface GraphRequestOptions {
  /** Defaults to the tenant's configured scopes. */
  scopes?: readonly string[];
  /** Serialized as JSON. */
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Retry 503/504 even for POST and PATCH. */
  idempotent?: boolean;
}

export interface GraphResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  url: string;
  /** Parsed JSON, raw text for other content types, undefined when empty. */
  body: unknown;
}

export const GraphErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    innerError: z
      .object({
        'request-id': z.string().optional(),
        date: z.string().optional(),
      })
      .optional(),
  }),
});

export type GraphErrorResponse = z.infer<typeof GraphErrorResponseSchema>;
