import type { SessionContext } from '../config/types.js';

import type { PageDocument } from './document.js';
import type { DriverResponse } from './response.js';

interface SessionState {
  lastUrl?: string;
  response?: DriverResponse;
  document?: PageDocument;
}

/**
 * Navigation state of one driver. Only completed navigations are committed.
 */
export class Session implements SessionContext {
  private state: SessionState = {};

  get lastUrl(): string | undefined {
    return this.state.lastUrl;
  }

  get lastRemote(): boolean | undefined {
    return this.state.response?.remote;
  }

  get response(): DriverResponse | undefined {
    return this.state.response;
  }

  commit(response: DriverResponse): void {
    this.state = { lastUrl: response.url, response };
  }

  document(
    parse: (response: DriverResponse) => PageDocument
  ): PageDocument | undefined {
    const { response } = this.state;
    if (!response) return undefined;
    this.state.document ??= parse(response);
    return this.state.document;
  }

  clear(): void {
    this.state = {};
  }
}
