import type { DriverSettings } from './types.js';

import { config } from './index.js';

export function createSettings(
  overrides: Partial<DriverSettings> = {}
): DriverSettings {
  return {
    appHost: undefined,
    defaultHost: config.navigation.defaultHost,
    localHosts: [...config.navigation.localHosts],
    raiseServerErrors: config.navigation.raiseServerErrors,
    ...overrides,
  };
}
