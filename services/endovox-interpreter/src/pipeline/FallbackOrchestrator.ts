/**
 * Fallback Orchestrator
 *
 * Semantic parser first, pattern parser second, safe STOP last.
 * parseWithFallback never rejects.
 *
 * The fallback threshold only picks which tier's result is used. Whether
 * that result is safe to execute is the ConfidenceValidator's call, with
 * its own (higher) threshold.
 */

import { Logger } from '@endovox/shared';
import { RobotCommand } from '../schema/CommandSchema.js';
import { DeterministicParser, FallbackResult, SemanticParser } from '../types/index.js';
import { classifyError, EndovoxError, ErrorCode, toError } from '../utils/ErrorHandler.js';

export const DEFAULT_FALLBACK_THRESHOLD = 0.5;
export const DEFAULT_SEMANTIC_TIMEOUT_MS = 5000;
/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_SEMANTIC_TIMEOUT_MS = 2_147_483_647;

export interface FallbackOrchestratorOptions {
  /** Minimum semantic confidence accepted without consulting the pattern parser */
  fallbackThreshold?: number;
  /** Upper bound on a single semantic parser call */
  semanticTimeoutMs?: number;
  logger?: Logger;
}

export class FallbackOrchestrator {
  readonly fallbackThreshold: number;
  readonly semanticTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly semanticParser: SemanticParser,
    private readonly deterministicParser: DeterministicParser,
    options: FallbackOrchestratorOptions = {},
  ) {
    const fallbackThreshold = options.fallbackThreshold ?? DEFAULT_FALLBACK_THRESHOLD;
    const semanticTimeoutMs = options.semanticTimeoutMs ?? DEFAULT_SEMANTIC_TIMEOUT_MS;

    if (!Number.isFinite(fallbackThreshold) || fallbackThreshold < 0 || fallbackThreshold > 1) {
      throw new EndovoxError(
        ErrorCode.CONFIG_VALIDATION_ERROR,
        `Fallback threshold must be within [0, 1], got ${fallbackThreshold}`,
      );
    }
    if (
      !Number.isFinite(semanticTimeoutMs) ||
      semanticTimeoutMs <= 0 ||
      semanticTimeoutMs > MAX_SEMANTIC_TIMEOUT_MS
    ) {
      throw new EndovoxError(
        ErrorCode.CONFIG_VALIDATION_ERROR,
        `Semantic timeout must be within (0, ${MAX_SEMANTIC_TIMEOUT_MS}] milliseconds, got ${semanticTimeoutMs}`,
      );
    }

    this.fallbackThreshold = fallbackThreshold;
    this.semanticTimeoutMs = semanticTimeoutMs;
    this.logger = options.logger ?? Logger.getInstance('endovox:FallbackOrchestrator');
  }

  async parseWithFallback(text: string): Promise<FallbackResult> {
    const correlationId = Logger.generateCorrelationId();

    const semantic = await this.trySemantic(text, correlationId);
    if (semantic !== null) {
      if (semantic.confidence >= this.fallbackThreshold) {
        this.logger.info(`Semantic parser resolved "${text}" -> ${semantic.action}`, correlationId, {
          confidence: semantic.confidence,
        });
        return { command: semantic, source: 'semantic' };
      }
      this.logger.warn(
        `Semantic confidence ${semantic.confidence.toFixed(2)} < ${this.fallbackThreshold.toFixed(2)} for "${text}", trying pattern parser`,
        correlationId,
      );
    }

    const deterministic = this.tryDeterministic(text, correlationId);
    if (deterministic !== null) {
      this.logger.info(`Pattern parser resolved "${text}" -> ${deterministic.action}`, correlationId);
      return { command: deterministic, source: 'deterministic' };
    }

    this.logger.error(`All parsers failed for "${text}", returning safe STOP`, undefined, correlationId);
    return { command: RobotCommand.createStop(text, 0.0), source: 'failed' };
  }

  private async trySemantic(text: string, correlationId: string): Promise<RobotCommand | null> {
    try {
      const command = await this.withTimeout(this.semanticParser.parse(text));
      if (!(command instanceof RobotCommand)) {
        throw new EndovoxError(ErrorCode.INVALID_RESPONSE, 'Semantic parser returned a non-command value');
      }
      return command;
    } catch (error) {
      const classified = classifyError(error);
      this.logger.warn(`Semantic parser failed for "${text}", trying pattern parser`, correlationId, {
        code: classified.code,
        error: classified.message,
      });
      return null;
    }
  }

  private tryDeterministic(text: string, correlationId: string): RobotCommand | null {
    try {
      const command = this.deterministicParser.parse(text);
      if (command === null) {
        this.logger.warn(`Pattern parser found no match for "${text}"`, correlationId);
      }
      return command;
    } catch (error) {
      this.logger.error(`Pattern parser failed for "${text}"`, toError(error), correlationId);
      return null;
    }
  }

  private withTimeout<T>(promise: Promise<T>): Promise<T> {
    // eslint-disable-next-line functional/no-let
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new EndovoxError(
            ErrorCode.SEMANTIC_TIMEOUT,
            `Semantic parser did not answer within ${this.semanticTimeoutMs}ms`,
            { timeoutMs: this.semanticTimeoutMs },
          ),
        );
      }, this.semanticTimeoutMs);
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }
}
