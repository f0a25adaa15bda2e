export { Driver } from './driver.js';
export { config } from './config/index.js';
export { createSettings } from './config/settings.js';
export type {
  ApplicationHandler,
  DriverOptions,
  DriverSettings,
  FormParams,
  HeaderMap,
  HostRoots,
  HttpMethod,
  RequestInit,
  SessionContext,
  Transport,
  TransportKind,
  TransportRequest,
  TransportResponse,
} from './config/types.js';
export {
  AppError,
  ElementError,
  InfiniteRedirectError,
  NetworkError,
  ServerError,
  UrlValidationError,
  ValidationError,
} from './errors/app-error.js';
export { isRemote } from './services/host-classifier.js';
export { isRedirect, resolveNavigation } from './services/redirects.js';
export { DriverResponse } from './services/response.js';
export { PageNode } from './services/node.js';
export { InProcessTransport } from './services/transports/in-process.js';
export {
  createHttpClient,
  NetworkTransport,
} from './services/transports/network.js';
