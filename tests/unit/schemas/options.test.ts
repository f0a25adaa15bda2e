import { describe, expect, test } from 'vitest';

import { ValidationError } from '../../../src/errors/app-error.js';
import {
  driverOptionsSchema,
  driverSettingsSchema,
  parseWithSchema,
} from '../../../src/schemas/options.js';

describe('options schemas', () => {
  test('fills driver option defaults', () => {
    expect(parseWithSchema(driverOptionsSchema, {}, 'Invalid options')).toEqual(
      { headers: {}, followRedirects: true, redirectLimit: 5 }
    );
  });

  test('reports every issue with its path', () => {
    let caught: unknown;
    try {
      parseWithSchema(
        driverOptionsSchema,
        { redirectLimit: 0, followRedirects: 'yes' },
        'Invalid options'
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message).toBe('Invalid options');
    const issues = caught.details?.issues;
    expect(Array.isArray(issues)).toBe(true);
    if (!Array.isArray(issues)) return;
    expect(issues.map((issue: { path: string }) => issue.path).sort()).toEqual(
      ['followRedirects', 'redirectLimit']
    );
  });

  test('accepts http roots and rejects other schemes', () => {
    expect(
      driverSettingsSchema.safeParse({
        appHost: 'http://app.test:3000',
        raiseServerErrors: true,
      }).success
    ).toBe(true);
    expect(
      driverSettingsSchema.safeParse({
        defaultHost: 'ftp://files.test',
        raiseServerErrors: true,
      }).success
    ).toBe(false);
  });
});
