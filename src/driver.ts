import type { AxiosInstance } from 'axios';
import type { Element } from 'domhandler';

import { config } from './config/index.js';
import { createSettings } from './config/settings.js';
import type {
  ApplicationHandler,
  DriverOptions,
  DriverSettings,
  FormParams,
  HeaderMap,
  HostRoots,
  HttpMethod,
  NavigationRequest,
  RequestBody,
  RequestInit,
  ResolvedDriverOptions,
  Transport,
} from './config/types.js';

import {
  ElementError,
  ServerError,
  ValidationError,
} from './errors/app-error.js';

import {
  driverOptionsSchema,
  driverSettingsSchema,
  parseWithSchema,
} from './schemas/options.js';

import { PageDocument } from './services/document.js';
import {
  buildFormSubmission,
  encodeParams,
  findOwnerForm,
  isSubmitControl,
} from './services/forms.js';
import { isRemote } from './services/host-classifier.js';
import { logDebug, logInfo, logWarn } from './services/logger.js';
import { PageNode } from './services/node.js';
import { resolveNavigation } from './services/redirects.js';
import { DriverResponse } from './services/response.js';
import { Session } from './services/session.js';
import {
  mergeHeaders,
  validateRequestHeaders,
} from './services/transports/headers.js';
import { InProcessTransport } from './services/transports/in-process.js';
import { NetworkTransport } from './services/transports/network.js';

import {
  isSameDocument,
  requestPath,
  resolveUrl,
} from './utils/url-validator.js';

interface Navigation {
  method: HttpMethod;
  target: string;
  url: string;
  headers?: HeaderMap | undefined;
  body?: RequestBody | undefined;
}

function resolveOptions(options: DriverOptions): ResolvedDriverOptions {
  const parsed = parseWithSchema(
    driverOptionsSchema,
    {
      headers: options.headers,
      followRedirects: options.followRedirects,
      redirectLimit: options.redirectLimit,
    },
    'Invalid driver options'
  );
  return { ...parsed, headers: validateRequestHeaders(parsed.headers) };
}

/**
 * Browses an in-process application and remote hosts through one session.
 * Each request is routed by host: local targets are dispatched into the
 * application, remote ones go over the network.
 */
export class Driver {
  private readonly options: ResolvedDriverOptions;
  private readonly session = new Session();
  private readonly local: Transport;
  private readonly remote: NetworkTransport;

  constructor(
    app: ApplicationHandler,
    options: DriverOptions = {},
    private readonly settings: DriverSettings = createSettings()
  ) {
    if (typeof app !== 'function') {
      throw new ValidationError('An application request handler is required');
    }
    this.options = resolveOptions(options);
    this.local = new InProcessTransport(app);
    this.remote = new NetworkTransport(options.httpClient);
  }

  /** Hands the remote transport's axios instance over for extra setup. */
  configure(callback: (client: AxiosInstance) => void): void {
    callback(this.remote.client);
  }

  get currentUrl(): string {
    return this.session.lastUrl ?? '';
  }

  get response(): DriverResponse | undefined {
    return this.session.response;
  }

  get status(): number | undefined {
    return this.session.response?.status;
  }

  get html(): string {
    return this.session.response?.html ?? '';
  }

  get title(): string {
    return this.document()?.title() ?? '';
  }

  get responseHeaders(): Readonly<HeaderMap> {
    return this.session.response?.headers ?? {};
  }

  get headers(): Readonly<HeaderMap> {
    return this.options.headers;
  }

  get followRedirects(): boolean {
    return this.options.followRedirects;
  }

  get redirectLimit(): number {
    return this.options.redirectLimit;
  }

  isRemote(url: string): boolean {
    return isRemote(url, this.session, this.hostRoots());
  }

  async visit(url: string): Promise<void> {
    await this.request('GET', url);
  }

  get(url: string, params?: FormParams, headers?: HeaderMap): Promise<void> {
    return this.request('GET', url, { params, headers });
  }

  post(url: string, params?: FormParams, headers?: HeaderMap): Promise<void> {
    return this.request('POST', url, { params, headers });
  }

  put(url: string, params?: FormParams, headers?: HeaderMap): Promise<void> {
    return this.request('PUT', url, { params, headers });
  }

  patch(url: string, params?: FormParams, headers?: HeaderMap): Promise<void> {
    return this.request('PATCH', url, { params, headers });
  }

  delete(
    url: string,
    params?: FormParams,
    headers?: HeaderMap
  ): Promise<void> {
    return this.request('DELETE', url, { params, headers });
  }

  head(url: string, params?: FormParams, headers?: HeaderMap): Promise<void> {
    return this.request('HEAD', url, { params, headers });
  }

  async request(
    method: HttpMethod,
    target: string,
    init: RequestInit = {}
  ): Promise<void> {
    const headers = init.headers
      ? validateRequestHeaders(init.headers)
      : undefined;
    const encoded = encodeParams(
      method,
      resolveUrl(target, this.baseUrl()),
      init.params,
      init.body,
      headers
    );
    await this.navigate({ method, target, ...encoded });
  }

  find(selector: string): PageNode[] {
    const page = this.document();
    if (!page) return [];
    return page
      .find(selector)
      .map((element) => new PageNode(this, page, element));
  }

  async click(node: PageNode): Promise<void> {
    if (node.tagName === 'a') {
      await this.followLink(node);
      return;
    }
    if (isSubmitControl(node.element)) {
      await this.submitOwnerForm(node);
      return;
    }
    if (node.tagName === 'input' && node.type === 'checkbox') {
      node.setChecked(!node.checked);
      return;
    }
    if (node.tagName === 'input' && node.type === 'radio') {
      node.setChecked(true);
      return;
    }
    throw new ElementError(
      `Cannot click a <${node.tagName}> element`,
      node.tagName
    );
  }

  async submit(node: PageNode): Promise<void> {
    if (node.tagName === 'form') {
      await this.submitForm(node.page, node.element);
      return;
    }
    if (isSubmitControl(node.element)) {
      await this.submitOwnerForm(node);
      return;
    }
    throw new ElementError(
      `Only forms and submit buttons can be submitted, got <${node.tagName}>`,
      node.tagName
    );
  }

  /**
   * Forgets the visited URL and page. Construction options and settings
   * are left alone.
   */
  reset(): void {
    this.session.clear();
    logDebug('Session reset');
  }

  private readSettings(): DriverSettings {
    return parseWithSchema(
      driverSettingsSchema,
      this.settings,
      'Invalid driver settings'
    );
  }

  private hostRoots(): HostRoots {
    return this.readSettings();
  }

  private baseUrl(): string {
    const roots = this.hostRoots();
    return (
      this.session.lastUrl ??
      roots.appHost ??
      roots.defaultHost ??
      config.navigation.fallbackBaseUrl
    );
  }

  private document(): PageDocument | undefined {
    return this.session.document(
      (response) => new PageDocument(response.html, response.url)
    );
  }

  private selectTransport(target: string): Transport {
    return this.isRemote(target) ? this.remote : this.local;
  }

  private async followLink(node: PageNode): Promise<void> {
    const href = node.attr('href');
    if (href === undefined || isSameDocument(href)) return;
    const url = resolveUrl(href, node.page.url);
    await this.navigate({ method: 'GET', target: url, url });
  }

  private async submitOwnerForm(node: PageNode): Promise<void> {
    const form = findOwnerForm(node.page.$, node.element);
    if (!form) {
      throw new ElementError(
        `<${node.tagName}> is not inside a form`,
        node.tagName
      );
    }
    await this.submitForm(node.page, form, node.element);
  }

  private async submitForm(
    page: PageDocument,
    form: Element,
    submitter?: Element
  ): Promise<void> {
    const submission = buildFormSubmission(page.$, form, page.url, submitter);
    await this.navigate({ ...submission, target: submission.url });
  }

  private async navigate(navigation: Navigation): Promise<void> {
    const request: NavigationRequest = {
      method: navigation.method,
      target: navigation.target,
      url: navigation.url,
      headers: mergeHeaders(this.options.headers, navigation.headers),
      body: navigation.body,
    };

    logDebug('Navigating', { method: request.method, url: request.url });

    const result = await resolveNavigation(request, {
      selectTransport: (target) => this.selectTransport(target),
      followRedirects: this.options.followRedirects,
      redirectLimit: this.options.redirectLimit,
      headers: this.options.headers,
    });

    const response = new DriverResponse(result);
    this.assertNoServerError(response);
    this.session.commit(response);

    logInfo('Navigation complete', {
      method: response.method,
      url: response.url,
      status: response.status,
      remote: response.remote,
      redirects: result.chain.length - 1,
    });
  }

  private assertNoServerError(response: DriverResponse): void {
    if (response.status < 400) return;
    if (!this.readSettings().raiseServerErrors) return;

    const path = requestPath(response.url);
    logWarn('Server error response', {
      method: response.method,
      path,
      status: response.status,
    });
    throw new ServerError(response.method, path, {
      status: response.status,
      statusText: response.statusText,
      headers: { ...response.headers },
      body: response.body,
    });
  }
}
