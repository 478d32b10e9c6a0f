/**
 * Confidence Validator
 *
 * Decides whether a command is safe to execute. STOP always passes:
 * refusing a stop is the unsafe failure mode.
 */

import { DEFAULT_VALIDATION_THRESHOLD, RobotCommand } from '../schema/CommandSchema.js';
import { ValidationOutcome } from '../types/index.js';
import { EndovoxError, ErrorCode } from '../utils/ErrorHandler.js';

export class ConfidenceValidator {
  readonly threshold: number;

  constructor(threshold: number = DEFAULT_VALIDATION_THRESHOLD) {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new EndovoxError(
        ErrorCode.CONFIG_VALIDATION_ERROR,
        `Validation threshold must be within [0, 1], got ${threshold}`,
      );
    }
    this.threshold = threshold;
  }

  validate(command: RobotCommand): ValidationOutcome {
    if (command.action === 'STOP') {
      return { accepted: true, reason: 'ok' };
    }

    if (command.confidence < this.threshold) {
      return {
        accepted: false,
        reason: `confidence ${command.confidence.toFixed(2)} < ${this.threshold.toFixed(2)}`,
      };
    }

    return { accepted: true, reason: 'ok' };
  }
}
