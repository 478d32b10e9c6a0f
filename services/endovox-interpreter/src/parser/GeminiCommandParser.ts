/**
 * Semantic command parser backed by Gemini.
 *
 * Rejects on transport, format or schema problems; the fallback
 * orchestrator decides what happens next.
 */

import { Logger } from '@endovox/shared';
import { GeminiClient } from '../ai/GeminiClient.js';
import { LlmConfig } from '../config/ConfigSchema.js';
import { RobotCommand } from '../schema/CommandSchema.js';
import { SemanticParser } from '../types/index.js';
import { buildCommandPrompt, PROMPT_VERSION } from './prompts.js';

/** The slice of GeminiClient the parser needs */
export type JsonGenerator = Pick<GeminiClient, 'generateJSON'>;

export interface GeminiCommandParserOptions {
  temperature?: number;
  maxOutputTokens?: number;
  logger?: Logger;
}

export class GeminiCommandParser implements SemanticParser {
  private readonly logger: Logger;

  constructor(
    private readonly client: JsonGenerator,
    private readonly options: GeminiCommandParserOptions = {},
  ) {
    this.logger = options.logger ?? Logger.getInstance('endovox:GeminiCommandParser');
  }

  static fromConfig(llm: LlmConfig, apiKey?: string): GeminiCommandParser {
    const client = new GeminiClient({
      apiKey,
      modelName: llm.model,
      maxRequestsPerMinute: llm.maxRequestsPerMinute,
      maxRetries: llm.maxRetries,
      baseRetryDelayMs: llm.baseRetryDelayMs,
    });
    return new GeminiCommandParser(client, {
      temperature: llm.temperature,
      maxOutputTokens: llm.maxOutputTokens,
    });
  }

  async parse(text: string): Promise<RobotCommand> {
    const timerId = this.logger.startTimer('semantic_parse', undefined, {
      promptVersion: PROMPT_VERSION,
    });

    try {
      const payload = await this.client.generateJSON(buildCommandPrompt(text), {
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
      });
      const command = RobotCommand.fromWire(payload, text);
      this.logger.endTimer(timerId, { action: command.action, confidence: command.confidence });
      return command;
    } catch (error) {
      this.logger.endTimer(timerId, { failed: true });
      throw error;
    }
  }
}
