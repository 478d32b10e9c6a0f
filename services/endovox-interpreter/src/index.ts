/**
 * endovox interpreter - Entry Point
 *
 * Turns a transcribed utterance into a validated robot command for a
 * robot-held endoscope: Gemini-backed semantic parsing, deterministic
 * pattern fallback, and a confidence gate that never blocks STOP.
 */

import { configManager } from './config/ConfigManager.js';
import { GeminiCommandParser } from './parser/GeminiCommandParser.js';
import { CommandPipeline } from './pipeline/CommandPipeline.js';
import { ExecutionBridge } from './types/index.js';

export {
  ACTIONS,
  MAGNITUDES,
  MAGNITUDE_MM,
  COMMAND_FRAME,
  DEFAULT_MAGNITUDE,
  DEFAULT_VALIDATION_THRESHOLD,
  RobotCommand,
  WireCommandSchema,
  type Action,
  type Magnitude,
  type CommandFrame,
  type RobotCommandInput,
  type RobotCommandSnapshot,
  type WireCommand,
} from './schema/CommandSchema.js';
export { PatternParser } from './parser/PatternParser.js';
export { GeminiCommandParser, type GeminiCommandParserOptions, type JsonGenerator } from './parser/GeminiCommandParser.js';
export { PROMPT_VERSION, SYSTEM_PROMPT, buildCommandPrompt } from './parser/prompts.js';
export { GeminiClient, type GeminiClientConfig, type GenerateOptions } from './ai/GeminiClient.js';
export { RateLimiter, type RateLimiterConfig } from './ai/RateLimiter.js';
export { ConfidenceValidator } from './pipeline/ConfidenceValidator.js';
export {
  FallbackOrchestrator,
  DEFAULT_FALLBACK_THRESHOLD,
  DEFAULT_SEMANTIC_TIMEOUT_MS,
  MAX_SEMANTIC_TIMEOUT_MS,
  type FallbackOrchestratorOptions,
} from './pipeline/FallbackOrchestrator.js';
export { CommandPipeline, type CommandPipelineDeps } from './pipeline/CommandPipeline.js';
export { ConfigManager, configManager } from './config/ConfigManager.js';
export {
  InterpreterConfigSchema,
  getDefaultConfig,
  validateConfig,
  safeValidateConfig,
  type InterpreterConfig,
  type LlmConfig,
  type PipelineConfig,
} from './config/ConfigSchema.js';

// Error handling utilities
export {
  EndovoxError,
  ErrorCode,
  getUserFriendlyMessage,
  calculateBackoffDelay,
  isRetryableError,
  classifyError,
  type BackoffConfig,
} from './utils/ErrorHandler.js';

// Re-export types
export * from './types/index.js';

/**
 * Build a pipeline from config/config.json and the environment
 */
export function createCommandPipeline(bridge?: ExecutionBridge): CommandPipeline {
  const config = configManager.loadConfig();
  return CommandPipeline.fromConfig(config, {
    semanticParser: GeminiCommandParser.fromConfig(config.llm, configManager.getGeminiKey()),
    bridge,
  });
}
