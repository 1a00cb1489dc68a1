/**
 * Project: Raid Sync
 * File: src/core/infra/http/fetchRemoteClient.ts
 * Summary: RemoteClient adapter over fetch with a fixed timeout and failure classification.
 */

import { z } from 'zod';

import type {
  JsonValue,
  RemoteClient,
  RemoteFailure,
  RemoteFailureKind,
  RemoteRequest,
  RemoteResult,
} from '../../app/ports/remoteClient';
import { jsonValueSchema } from '../../app/validation/json';

type FetchFn = typeof fetch;

export const DEFAULT_REMOTE_TIMEOUT_MS = 10_000;

export type FetchRemoteClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
};

/** Validation responses of the backend: `{ message, errors: { field: [messages] } }`. */
const validationBodySchema = z.object({
  message: z.string().optional(),
  errors: z.record(z.array(z.string())).optional(),
});

const TRANSIENT_STATUSES = new Set([408, 429]);

export const classifyStatus = (status: number): Exclude<RemoteFailureKind, 'connectivity' | 'cancelled'> =>
  status >= 500 || TRANSIENT_STATUSES.has(status) ? 'server' : 'client';

type BodyParseResult = { ok: true; value: JsonValue } | { ok: false; error: unknown };

const parseBody = (text: string): BodyParseResult => {
  if (text.trim().length === 0) {
    return { ok: true, value: null };
  }

  try {
    const raw: unknown = JSON.parse(text);
    const parsed = jsonValueSchema.safeParse(raw);
    return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: parsed.error };
  } catch (error) {
    return { ok: false, error };
  }
};

const httpFailure = (status: number, statusText: string, body: BodyParseResult): RemoteFailure => {
  const kind = classifyStatus(status);
  const fallbackMessage = `Request failed with status ${status}${statusText ? ` ${statusText}` : ''}.`;

  if (!body.ok) {
    return { kind, status, message: fallbackMessage };
  }

  const details = validationBodySchema.safeParse(body.value);
  if (!details.success) {
    return { kind, status, message: fallbackMessage };
  }

  return {
    kind,
    status,
    message: details.data.message ?? fallbackMessage,
    ...(details.data.errors ? { fieldErrors: details.data.errors } : {}),
  };
};

export class FetchRemoteClient implements RemoteClient {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchFn;

  constructor(options: FetchRemoteClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/u, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async request(request: RemoteRequest): Promise<RemoteResult> {
    if (request.signal?.aborted) {
      return { ok: false, failure: { kind: 'cancelled', status: null, message: 'Request aborted.' } };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener('abort', forwardAbort, { once: true });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (request.authToken) {
      headers.Authorization = `Bearer ${request.authToken}`;
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${request.path}`, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (response.status === 204) {
        return { ok: true, status: 204, data: null };
      }

      const body = parseBody(await response.text());

      if (!response.ok) {
        return { ok: false, failure: httpFailure(response.status, response.statusText, body) };
      }

      if (!body.ok) {
        return {
          ok: false,
          failure: {
            kind: 'server',
            status: response.status,
            message: 'Response body was not valid JSON.',
            cause: body.error,
          },
        };
      }

      return { ok: true, status: response.status, data: body.value };
    } catch (error) {
      if (request.signal?.aborted) {
        return {
          ok: false,
          failure: { kind: 'cancelled', status: null, message: 'Request aborted.', cause: error },
        };
      }

      return {
        ok: false,
        failure: {
          kind: 'connectivity',
          status: null,
          message: timedOut
            ? `Request timed out after ${this.timeoutMs} ms.`
            : 'Network request failed.',
          cause: error,
        },
      };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
