import {
  parseBoolean,
  parseInteger,
  parseList,
  parseLogLevel,
} from './env-parsers.js';

const SIZE_LIMITS = {
  TEN_MB: 10 * 1024 * 1024,
} as const;

const TIMEOUT = {
  DEFAULT_NETWORK_TIMEOUT_MS: 30000,
} as const;

export const config = {
  driver: {
    name: 'hostswitch',
  },
  navigation: {
    followRedirects: true,
    redirectLimit: 5,
    defaultHost: process.env.DEFAULT_HOST ?? 'http://www.example.com',
    localHosts: parseList(process.env.LOCAL_HOSTS),
    raiseServerErrors: parseBoolean(process.env.RAISE_SERVER_ERRORS, false),
    fallbackBaseUrl: 'http://localhost/',
  },
  network: {
    timeout: parseInteger(
      process.env.NETWORK_TIMEOUT_MS,
      TIMEOUT.DEFAULT_NETWORK_TIMEOUT_MS,
      1000,
      300000
    ),
    userAgent: process.env.USER_AGENT ?? 'hostswitch/1.0',
    maxContentLength: SIZE_LIMITS.TEN_MB,
  },
  logging: {
    enabled: parseBoolean(process.env.LOG_ENABLED, true),
    level: parseLogLevel(process.env.LOG_LEVEL),
    file: process.env.LOG_FILE,
  },
};
