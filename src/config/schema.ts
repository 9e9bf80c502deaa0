/**
 * Configuration Schema
 *
 * Defines the shape of ~/.lens/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Scan configuration
 * Controls which files are read and how many readers run at once
 */
export const ScanSettingsSchema = z.object({
  extensions: z
    .array(z.string().startsWith('.', 'extensions must start with "."'))
    .min(1)
    .describe('File extensions to read, dot included (e.g. [".ts", ".go"])'),
  ignored_dirs: z
    .array(z.string().min(1))
    .describe('Directory names that are never descended into'),
  ignore_file: z
    .string()
    .min(1)
    .describe('Ignore file with base-name glob patterns, relative to the scanned root'),
  extra_patterns: z
    .array(z.string())
    .describe('Additional base-name glob patterns to exclude'),
  workers: z
    .number()
    .int()
    .min(0)
    .max(512)
    .describe('Number of reader workers (0 = host parallelism)'),
  queue_capacity: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .describe('Accepted paths buffered between the walk and the readers'),
});

/**
 * Output configuration
 * Controls the context bundle written by `lens scan`
 */
export const OutputSettingsSchema = z.object({
  max_bytes: z
    .number()
    .int()
    .min(0)
    .describe('Maximum bundle size in bytes (0 = unlimited)'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  scan: ScanSettingsSchema,
  output: OutputSettingsSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

/**
 * Description of a `section.key` setting, taken from the schema.
 * Example: describeConfigKey('scan.workers') => 'Number of reader workers (0 = host parallelism)'
 */
export function describeConfigKey(key: string): string | undefined {
  const [section, field] = key.split('.');
  const shape =
    section === 'scan'
      ? ScanSettingsSchema.shape
      : section === 'output'
        ? OutputSettingsSchema.shape
        : undefined;
  if (shape === undefined) return undefined;
  return Object.entries(shape).find(([name]) => name === field)?.[1].description;
}
