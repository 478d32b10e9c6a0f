/**
 * Config Schema with Zod
 *
 * Defines Zod schemas for interpreter configuration and exports
 * the inferred TypeScript types. Every field has a default, so a
 * partial config.json is completed rather than rejected.
 */

import { z } from 'zod';

/**
 * Pipeline thresholds and the semantic parser time budget
 */
export const PipelineConfigSchema = z.object({
  /** Minimum confidence for a non-stop command to be executed */
  validationThreshold: z.number().min(0).max(1).default(0.7),
  /** Minimum semantic confidence accepted without the pattern parser */
  fallbackThreshold: z.number().min(0).max(1).default(0.5),
  semanticTimeoutMs: z.number().int().min(100).max(60000).default(5000), // milliseconds
});

/**
 * Language model settings for the semantic parser
 */
export const LlmConfigSchema = z.object({
  model: z.string().min(1).default('gemini-flash-latest'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().min(16).max(8192).default(256),
  maxRequestsPerMinute: z.number().int().min(1).max(600).default(60),
  maxRetries: z.number().int().min(1).max(10).default(2),
  baseRetryDelayMs: z.number().int().min(0).max(60000).default(250), // milliseconds
});

/**
 * Complete configuration schema
 * Matches the structure of config/config.json
 */
export const InterpreterConfigSchema = z.object({
  pipeline: PipelineConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type InterpreterConfig = z.infer<typeof InterpreterConfigSchema>;

/**
 * Validate configuration against schema
 */
export function validateConfig(config: unknown): InterpreterConfig {
  return InterpreterConfigSchema.parse(config);
}

/**
 * Safely validate configuration, returning errors instead of throwing
 */
export function safeValidateConfig(
  config: unknown,
): { success: true; data: InterpreterConfig } | { success: false; error: z.ZodError } {
  const result = InterpreterConfigSchema.safeParse(config);
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: result.error };
}

export function getDefaultConfig(): InterpreterConfig {
  return InterpreterConfigSchema.parse({});
}
