/**
 * Configuration schema for the smpte-frames CLI.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';
import { tryParseFramerate } from '../framerate/parse.js';

// ============================================================================
// Sub-schemas
// ============================================================================

const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  prettyPrint: z.boolean().default(true),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  /**
   * Framerate used when a command gets neither --framerate nor a
   * "<timecode>@<framerate>" argument. Same syntax as --framerate.
   */
  framerate: z
    .union([z.string(), z.number()])
    .default('29.97')
    .refine((value) => tryParseFramerate(value) !== null, {
      message: 'Unrecognised framerate. Use e.g. 25, 29.97, 23.98 or 59.94',
    }),
  output: z.enum(['text', 'json']).default('text'),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type OutputFormat = Config['output'];

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw);
}
