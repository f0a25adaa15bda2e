import { z } from 'zod';

import { config } from '../config/index.js';

import { ValidationError } from '../errors/app-error.js';

const httpUrlSchema = z.url({ protocol: /^https?$/i });

export const driverOptionsSchema = z.object({
  headers: z
    .record(z.string(), z.string())
    .default({})
    .describe('Headers attached to every request and redirect hop.'),
  followRedirects: z
    .boolean()
    .default(config.navigation.followRedirects)
    .describe('Follow Location redirects.'),
  redirectLimit: z
    .number()
    .int()
    .positive()
    .default(config.navigation.redirectLimit)
    .describe('Maximum number of redirects followed per navigation.'),
});

export const driverSettingsSchema = z.object({
  appHost: httpUrlSchema.optional(),
  defaultHost: httpUrlSchema.optional(),
  localHosts: z.array(z.string().trim().min(1)).optional(),
  raiseServerErrors: z.boolean(),
});

export function parseWithSchema<T extends z.ZodType>(
  schema: T,
  value: unknown,
  message: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  throw new ValidationError(message, {
    issues: result.error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    })),
  });
}
