/**
 * Robot Command Schema
 *
 * Canonical command format produced by the semantic parser, the pattern
 * parser and the orchestrator's safe default, and consumed by the
 * confidence validator and the execution bridge.
 *
 * A RobotCommand is immutable. All normalization happens once, inside
 * RobotCommand.create:
 * - confidence must lie in [0, 1]
 * - STOP carries no magnitude and no displacement
 * - any other action without a magnitude moves MID
 * - valueMm is looked up from the magnitude unless supplied
 */

import { z } from 'zod';
import { EndovoxError, ErrorCode } from '../utils/ErrorHandler.js';

export const ACTIONS = [
  'MOVE_FORWARD',
  'RETRACT',
  'MOVE_LEFT',
  'MOVE_RIGHT',
  'MOVE_UP',
  'MOVE_DOWN',
  'ROTATE_LEFT',
  'ROTATE_RIGHT',
  'STOP',
] as const;

export type Action = (typeof ACTIONS)[number];

export const MAGNITUDES = ['SMALL', 'MID', 'BIG'] as const;

export type Magnitude = (typeof MAGNITUDES)[number];

/** Displacement in millimeters for each magnitude */
export const MAGNITUDE_MM: Readonly<Record<Magnitude, number>> = Object.freeze({
  SMALL: 2.0,
  MID: 4.0,
  BIG: 6.0,
});

/** Reserved for coordinate-frame support; every command is camera-relative today */
export const COMMAND_FRAME = 'CAMERA';

export type CommandFrame = typeof COMMAND_FRAME;

export const DEFAULT_MAGNITUDE: Magnitude = 'MID';

/** Confidence at which a non-stop command is considered safe to execute */
export const DEFAULT_VALIDATION_THRESHOLD = 0.7;

export const ActionSchema = z.enum(ACTIONS);
export const MagnitudeSchema = z.enum(MAGNITUDES);
export const ConfidenceSchema = z.number().min(0).max(1);

/**
 * Shape the semantic parser must emit. Extra keys are rejected.
 * `frame` may be omitted and defaults to CAMERA.
 */
export const WireCommandSchema = z
  .object({
    action: ActionSchema,
    magnitude: MagnitudeSchema.nullable().optional(),
    confidence: ConfidenceSchema,
    frame: z.literal(COMMAND_FRAME).default(COMMAND_FRAME),
  })
  .strict();

export type WireCommand = z.infer<typeof WireCommandSchema>;

const CommandInputSchema = z.object({
  action: ActionSchema,
  magnitude: MagnitudeSchema.nullish(),
  frame: z.literal(COMMAND_FRAME).optional(),
  confidence: ConfidenceSchema,
  valueMm: z.number().finite().nonnegative().nullish(),
  rawText: z.string(),
});

export interface RobotCommandInput {
  action: Action;
  magnitude?: Magnitude | null;
  frame?: CommandFrame;
  confidence: number;
  /** Overrides the magnitude lookup when given */
  valueMm?: number | null;
  /** Verbatim utterance, kept for audit */
  rawText: string;
}

export interface RobotCommandSnapshot {
  action: Action;
  magnitude: Magnitude | null;
  frame: CommandFrame;
  confidence: number;
  valueMm: number | null;
  rawText: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class RobotCommand {
  readonly action: Action;
  readonly magnitude: Magnitude | null;
  readonly frame: CommandFrame;
  readonly confidence: number;
  readonly valueMm: number | null;
  readonly rawText: string;

  private constructor(snapshot: RobotCommandSnapshot) {
    this.action = snapshot.action;
    this.magnitude = snapshot.magnitude;
    this.frame = snapshot.frame;
    this.confidence = snapshot.confidence;
    this.valueMm = snapshot.valueMm;
    this.rawText = snapshot.rawText;
    Object.freeze(this);
  }

  /**
   * Validate and normalize a command.
   * @throws EndovoxError with code SCHEMA_VIOLATION
   */
  static create(input: RobotCommandInput): RobotCommand {
    const result = CommandInputSchema.safeParse(input);
    if (!result.success) {
      throw new EndovoxError(
        ErrorCode.SCHEMA_VIOLATION,
        `Invalid robot command: ${describeIssues(result.error)}`,
        { rawText: input.rawText },
      );
    }

    const { action, confidence, rawText } = result.data;

    if (action === 'STOP') {
      return new RobotCommand({
        action,
        magnitude: null,
        frame: COMMAND_FRAME,
        confidence,
        valueMm: null,
        rawText,
      });
    }

    const magnitude = result.data.magnitude ?? DEFAULT_MAGNITUDE;
    return new RobotCommand({
      action,
      magnitude,
      frame: COMMAND_FRAME,
      confidence,
      valueMm: result.data.valueMm ?? MAGNITUDE_MM[magnitude],
      rawText,
    });
  }

  /**
   * Build a command from a semantic parser payload.
   * @throws EndovoxError with code SCHEMA_VIOLATION
   */
  static fromWire(payload: unknown, rawText: string): RobotCommand {
    const result = WireCommandSchema.safeParse(payload);
    if (!result.success) {
      throw new EndovoxError(
        ErrorCode.SCHEMA_VIOLATION,
        `Invalid command payload: ${describeIssues(result.error)}`,
        { rawText },
      );
    }
    return RobotCommand.create({ ...result.data, rawText });
  }

  static createStop(rawText: string, confidence = 1.0): RobotCommand {
    return RobotCommand.create({ action: 'STOP', confidence, rawText });
  }

  isStop(): boolean {
    return this.action === 'STOP';
  }

  /**
   * True if confidence meets the default validation threshold
   */
  isValid(): boolean {
    return this.confidence >= DEFAULT_VALIDATION_THRESHOLD;
  }

  toJSON(): RobotCommandSnapshot {
    return {
      action: this.action,
      magnitude: this.magnitude,
      frame: this.frame,
      confidence: this.confidence,
      valueMm: this.valueMm,
      rawText: this.rawText,
    };
  }
}
