/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

export const DEFAULT_ENDPOINT = 'https://app.fossa.com';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const RunModeSchema = z.enum(['full', 'create-only', 'analyze-only']);

/**
 * Settings that may live in `.fossa-tools.yml`. No API key: credentials come
 * from the environment only.
 */
export const ProjectFileSchema = z
  .object({
    endpoint: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
    cliPath: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    logDir: z.string().optional(),
  })
  .strict();

export const ConfigSchema = z.object({
  endpoint: z
    .string()
    .url()
    .default(DEFAULT_ENDPOINT)
    .transform((url) => url.replace(/\/+$/, '')),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30000),
  cliPath: z.string().min(1).default('fossa'),
  mode: RunModeSchema.default('full'),
  debug: z.boolean().default(false),
  logLevel: LogLevelSchema.default('info'),
  logDir: z.string().optional(),
});

export type RunMode = z.infer<typeof RunModeSchema>;
export type ProjectFileConfig = z.infer<typeof ProjectFileSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type Config = Readonly<z.infer<typeof ConfigSchema>>;
