/**
 * endovox interpreter - Type Definitions
 */

import type { RobotCommand } from '../schema/CommandSchema.js';

/**
 * Which tier produced a command
 */
export type ParseSource = 'semantic' | 'deterministic' | 'failed';

/**
 * Text-to-command capability backed by a language model.
 * Rejects on any transport or formatting problem.
 */
export interface SemanticParser {
  parse(text: string): Promise<RobotCommand>;
}

/**
 * Offline text-to-command capability. Returns null for "no opinion".
 */
export interface DeterministicParser {
  parse(text: string): RobotCommand | null;
}

export interface FallbackResult {
  command: RobotCommand;
  source: ParseSource;
}

export interface ValidationOutcome {
  accepted: boolean;
  reason: string;
}

/**
 * Downstream consumer that drives the instrument
 */
export interface ExecutionBridge {
  dispatch(command: RobotCommand, accepted: boolean, reason: string): void | Promise<void>;
}

export interface CommandResult {
  text: string;
  command: RobotCommand;
  source: ParseSource;
  accepted: boolean;
  reason: string;
  latencyParseMs: number;
}
