/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";
import { FALLBACK_SLUG_PATTERN } from "../utils/generate-slug";

// Zod schemas
export const InputConfigSchema = z.object({
  maxBytes: z.number().int().positive(), // Ceiling checked before rendering
});

export const RenderConfigSchema = z.object({
  fallbackSlug: z
    .string()
    .regex(FALLBACK_SLUG_PATTERN, "fallbackSlug must be lowercase a-z, 0-9 and single hyphens"),
  diagnostics: z.boolean(),
});

export const OutputConfigSchema = z.object({
  format: z.enum(["html", "json"]),
  pretty: z.boolean(),
});

export const TocConfigSchema = z.object({
  // Path to a Handlebars template, null for the built-in one
  template: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  input: InputConfigSchema,
  render: RenderConfigSchema,
  output: OutputConfigSchema,
  toc: TocConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  render: RenderConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  toc: TocConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type TocConfig = z.infer<typeof TocConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;
