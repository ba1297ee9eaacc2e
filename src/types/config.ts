/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DisplayConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  maxBodyBytes: z.number().int().positive(), // Largest accepted SVG body, in bytes
});

export const RenderConfigSchema = z.object({
  loadSystemFonts: z.boolean(),
  defaultFontFamily: z.string().optional(),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const StoreConfigSchema = z.object({
  imageDir: z.string().min(1),
  display: DisplayConfigSchema,
  server: ServerConfigSchema,
  render: RenderConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialStoreConfigSchema = StoreConfigSchema.partial().extend({
  display: DisplayConfigSchema.partial().optional(),
  server: ServerConfigSchema.partial().optional(),
  render: RenderConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type PartialStoreConfig = z.infer<typeof PartialStoreConfigSchema>;

/**
 * Errors collected while loading user/custom config layers
 */
export interface ConfigError {
  path: string;
  error: Error;
}
