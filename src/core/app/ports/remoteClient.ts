/**
 * Project: Raid Sync
 * File: src/core/app/ports/remoteClient.ts
 * Summary: Port for the authenticated JSON gateway to the raid backend.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RemoteRequest = {
  method: HttpMethod;
  /** Path relative to the API base URL, starting with `/`. */
  path: string;
  authToken?: string | null;
  body?: JsonValue;
  signal?: AbortSignal;
};

/**
 * `connectivity`: no response (network error or timeout).
 * `server`: the backend answered with a transient failure (5xx, 408, 429).
 * `client`: the request itself was refused (other 4xx).
 * `cancelled`: the caller aborted the request.
 */
export type RemoteFailureKind = 'connectivity' | 'server' | 'client' | 'cancelled';

export type RemoteFailure = {
  kind: RemoteFailureKind;
  status: number | null;
  message: string;
  /** Structured field errors from validation responses. */
  fieldErrors?: Record<string, string[]>;
  cause?: unknown;
};

export type RemoteResult =
  | { ok: true; status: number; data: JsonValue }
  | { ok: false; failure: RemoteFailure };

export interface RemoteClient {
  request(request: RemoteRequest): Promise<RemoteResult>;
}

/** Connectivity-class failures are the only ones served from the local cache or queue. */
export const isConnectivityClass = (failure: RemoteFailure): boolean =>
  failure.kind === 'connectivity' || failure.kind === 'server';
