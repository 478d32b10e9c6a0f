/**
 * Gemini Client
 *
 * Wrapper around Google's Generative AI SDK with rate limiting,
 * retry with exponential backoff and error classification.
 * Default model uses Google's `-latest` alias so it never goes stale.
 */

import { GenerationConfig, GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { Logger } from '@endovox/shared';
import { RateLimiter } from './RateLimiter.js';
import { calculateBackoffDelay, classifyError, EndovoxError, ErrorCode } from '../utils/ErrorHandler.js';
import { configManager } from '../config/ConfigManager.js';

export interface GeminiClientConfig {
  apiKey?: string;
  modelName?: string;
  maxRequestsPerMinute?: number;
  maxRetries?: number;
  baseRetryDelayMs?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  topK?: number;
  responseMimeType?: string;
}

export class GeminiClient {
  private readonly model: GenerativeModel;
  private readonly rateLimiter: RateLimiter;
  private readonly maxRetries: number;
  private readonly baseRetryDelayMs: number;
  private readonly logger: Logger;

  constructor(config: GeminiClientConfig = {}) {
    const apiKey = config.apiKey ?? configManager.getGeminiKey();

    if (!apiKey) {
      throw new EndovoxError(
        ErrorCode.CONFIG_MISSING_KEYS,
        'GEMINI_API_KEY environment variable is required',
      );
    }

    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
      model: config.modelName ?? configManager.getGeminiModel() ?? 'gemini-flash-latest',
    });

    this.rateLimiter = new RateLimiter({
      maxRequestsPerMinute: config.maxRequestsPerMinute ?? 60,
    });

    this.maxRetries = config.maxRetries ?? 2;
    this.baseRetryDelayMs = config.baseRetryDelayMs ?? 250;
    this.logger = config.logger ?? Logger.getInstance('endovox:GeminiClient');
  }

  /**
   * Generate text content with rate limiting and retry logic
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const generationConfig: GenerationConfig = {
      temperature: options.temperature ?? 0.7,
      maxOutputTokens: options.maxOutputTokens ?? 1024,
      topP: options.topP ?? 0.95,
      topK: options.topK ?? 40,
      ...(options.responseMimeType ? { responseMimeType: options.responseMimeType } : {}),
    };

    return this.rateLimiter.execute(() => this.generateWithRetry(prompt, generationConfig));
  }

  /**
   * Generate a JSON response and parse it. The shape is not checked here.
   */
  async generateJSON(prompt: string, options: GenerateOptions = {}): Promise<unknown> {
    const response = await this.generate(prompt, {
      ...options,
      temperature: options.temperature ?? 0.1,
      responseMimeType: 'application/json',
    });

    return this.parseJSON(response);
  }

  canMakeRequest(): boolean {
    return this.rateLimiter.canMakeRequest();
  }

  /**
   * Reset rate limiter (for testing)
   */
  resetRateLimiter(): void {
    this.rateLimiter.reset();
  }

  private async generateWithRetry(
    prompt: string,
    config: GenerationConfig,
    attempt = 1,
  ): Promise<string> {
    try {
      const result = await this.model.generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: config,
      });

      const text = result.response.text();

      if (!text) {
        throw new EndovoxError(ErrorCode.INVALID_RESPONSE, 'Empty response from Gemini API', {
          attempt,
        });
      }

      return text;
    } catch (error) {
      const classified = classifyError(error, { attempt });

      this.logger.warn(`Gemini request failed: ${classified.message}`, undefined, {
        code: classified.code,
        attempt,
        maxRetries: this.maxRetries,
      });

      if (attempt >= this.maxRetries || !classified.isRetryable) {
        throw classified;
      }

      const delayMs = calculateBackoffDelay(attempt - 1, {
        initialDelayMs: this.baseRetryDelayMs,
        maxDelayMs: 5000,
        multiplier: 2,
        jitter: 0.1,
      });

      await this.sleep(delayMs);

      return this.generateWithRetry(prompt, config, attempt + 1);
    }
  }

  /**
   * Parse JSON from response, handling markdown code blocks
   */
  private parseJSON(response: string): unknown {
    // eslint-disable-next-line functional/no-let
    let jsonStr = response.trim();

    if (jsonStr.startsWith('```json')) {
      jsonStr = jsonStr.slice(7);
    } else if (jsonStr.startsWith('```')) {
      jsonStr = jsonStr.slice(3);
    }

    if (jsonStr.endsWith('```')) {
      jsonStr = jsonStr.slice(0, -3);
    }

    try {
      return JSON.parse(jsonStr.trim());
    } catch (error) {
      throw new EndovoxError(
        ErrorCode.INVALID_RESPONSE,
        `Failed to parse JSON response: ${
          error instanceof Error ? error.message : 'Unknown error'
        }`,
      );
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
