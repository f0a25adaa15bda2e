import type {
  HeaderMap,
  HttpMethod,
  NavigationResult,
} from '../config/types.js';

export class DriverResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<HeaderMap>;
  readonly body: Buffer;
  /** URL of the last hop, after redirects. */
  readonly url: string;
  readonly method: HttpMethod;
  readonly remote: boolean;

  constructor(result: NavigationResult) {
    this.status = result.response.status;
    this.statusText = result.response.statusText;
    this.headers = result.response.headers;
    this.body = result.response.body;
    this.url = result.url;
    this.method = result.method;
    this.remote = result.remote;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  get html(): string {
    return this.body.toString('utf8');
  }
}
