/**
 * Command Pipeline
 *
 * Entry point for a transcribed utterance: fallback parsing, confidence
 * validation, then hand-off to the execution bridge.
 */

import { Logger } from '@endovox/shared';
import { InterpreterConfig } from '../config/ConfigSchema.js';
import { PatternParser } from '../parser/PatternParser.js';
import { CommandResult, DeterministicParser, ExecutionBridge, SemanticParser } from '../types/index.js';
import { toError } from '../utils/ErrorHandler.js';
import { ConfidenceValidator } from './ConfidenceValidator.js';
import { FallbackOrchestrator } from './FallbackOrchestrator.js';

export interface CommandPipelineDeps {
  semanticParser: SemanticParser;
  deterministicParser?: DeterministicParser;
  bridge?: ExecutionBridge;
  logger?: Logger;
}

export class CommandPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly orchestrator: FallbackOrchestrator,
    private readonly validator: ConfidenceValidator,
    private readonly bridge?: ExecutionBridge,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.getInstance('endovox:CommandPipeline');
  }

  static fromConfig(config: InterpreterConfig, deps: CommandPipelineDeps): CommandPipeline {
    const orchestrator = new FallbackOrchestrator(
      deps.semanticParser,
      deps.deterministicParser ?? new PatternParser(),
      {
        fallbackThreshold: config.pipeline.fallbackThreshold,
        semanticTimeoutMs: config.pipeline.semanticTimeoutMs,
        logger: deps.logger,
      },
    );
    const validator = new ConfidenceValidator(config.pipeline.validationThreshold);
    return new CommandPipeline(orchestrator, validator, deps.bridge, deps.logger);
  }

  async processText(text: string): Promise<CommandResult> {
    const start = performance.now();
    const { command, source } = await this.orchestrator.parseWithFallback(text);
    const latencyParseMs = performance.now() - start;

    const { accepted, reason } = this.validator.validate(command);

    const result: CommandResult = { text, command, source, accepted, reason, latencyParseMs };
    const metadata = {
      source,
      accepted,
      reason,
      latencyParseMs: Math.round(latencyParseMs * 100) / 100,
      command: command.toJSON(),
    };
    if (accepted) {
      this.logger.info(`Command ${command.action} accepted`, undefined, metadata);
    } else {
      this.logger.warn(`Command ${command.action} withheld`, undefined, metadata);
    }

    if (this.bridge) {
      try {
        await this.bridge.dispatch(command, accepted, reason);
      } catch (error) {
        this.logger.error(`Execution bridge failed for ${command.action}`, toError(error));
      }
    }

    return result;
  }
}
