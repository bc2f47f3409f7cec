/**
 * CLI option and config file schemas
 */

import { z } from 'zod';

export const DialectSchema = z.enum(['oracle', 'mysql', 'postgresql']);

export const FailOnSchema = z.enum(['info', 'warning', 'error', 'never']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const TranspilerConfigSchema = z.object({
  source: DialectSchema,
  target: DialectSchema,
  format: z.boolean(),
  score: z.boolean(),
  failOn: FailOnSchema,
  json: z.boolean(),
  logLevel: LogLevelSchema
});

// A config file may set any subset of the options
export const PartialTranspilerConfigSchema = TranspilerConfigSchema.partial().strict();

export const ConvertOptionsSchema = z.object({
  source: DialectSchema.optional(),
  target: DialectSchema.optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  format: z.boolean().optional(),
  score: z.boolean().optional(),
  failOn: FailOnSchema.optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional()
});

export type TranspilerConfig = z.infer<typeof TranspilerConfigSchema>;
export type PartialTranspilerConfig = z.infer<typeof PartialTranspilerConfigSchema>;
export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_CONFIG: TranspilerConfig = {
  source: 'oracle',
  target: 'postgresql',
  format: false,
  score: false,
  failOn: 'never',
  json: false,
  logLevel: 'info'
};
