import type { RequestListener } from 'node:http';

import type { AxiosInstance } from 'axios';

export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'HEAD'
  | 'OPTIONS';

export type HeaderMap = Record<string, string>;

export type RequestBody = string | Buffer;

export type FormParams = Record<string, string | string[]> | URLSearchParams;

/**
 * The application under test: any Node request listener, such as an
 * express app. It is invoked in process, never through a socket.
 */
export type ApplicationHandler = RequestListener;

// Host roots

export interface HostRoots {
  /** Base URL of the application itself. Takes priority over defaultHost. */
  appHost?: string | undefined;
  /** Base URL used when no appHost is set. */
  defaultHost?: string | undefined;
  /** Hostnames treated as local alongside the defaultHost. */
  localHosts?: readonly string[] | undefined;
}

/**
 * Process-wide settings. The driver keeps a reference and reads it on every
 * call, so callers may change fields between navigations.
 */
export interface DriverSettings extends HostRoots {
  raiseServerErrors: boolean;
}

// Driver options

export interface DriverOptions {
  headers?: HeaderMap;
  followRedirects?: boolean;
  redirectLimit?: number;
  /** Client used for remote requests. Defaults to a fresh axios instance. */
  httpClient?: AxiosInstance;
}

export interface ResolvedDriverOptions {
  headers: HeaderMap;
  followRedirects: boolean;
  redirectLimit: number;
}

export interface RequestInit {
  params?: FormParams;
  body?: RequestBody;
  headers?: HeaderMap;
}

// Transports

export type TransportKind = 'local' | 'remote';

export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL. */
  url: string;
  headers: HeaderMap;
  body?: RequestBody | undefined;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  /** Lower-cased header names. */
  headers: HeaderMap;
  body: Buffer;
}

export interface Transport {
  readonly kind: TransportKind;
  send(request: TransportRequest): Promise<TransportResponse>;
}

// Navigation

export interface SessionContext {
  readonly lastUrl?: string | undefined;
  /** Whether the last navigation was served over the network. */
  readonly lastRemote?: boolean | undefined;
}

export interface NavigationRequest extends TransportRequest {
  /** The target as the caller gave it; may be relative. */
  target: string;
}

export interface NavigationOptions {
  selectTransport: (target: string) => Transport;
  followRedirects: boolean;
  redirectLimit: number;
  headers: HeaderMap;
}

export interface NavigationResult {
  response: TransportResponse;
  /** Method and URL of the last hop. */
  method: HttpMethod;
  url: string;
  remote: boolean;
  chain: string[];
}
