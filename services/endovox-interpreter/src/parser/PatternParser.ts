/**
 * Pattern Parser - Deterministic command parsing
 *
 * Offline, regex-based parsing of spoken instrument commands. Used when the
 * semantic parser is unavailable, too slow, or not confident enough.
 *
 * Cue tiers are checked in a fixed order:
 * 1. STOP (stop intent wins over any direction in the same utterance)
 * 2. Rotation (before plain left/right)
 * 3. Direction, first family in DIRECTION_PATTERNS order wins
 */

import { Action, Magnitude, RobotCommand } from '../schema/CommandSchema.js';

/**
 * Whole-word match where any Unicode letter, digit or underscore counts as
 * part of a word, so "éstop" or "naïup" do not match.
 */
function wordPattern(alternatives: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives})(?![\\p{L}\\p{N}_])`, 'u');
}

const STOP_PATTERN = wordPattern("stop|halt|freeze|hold|don'?t\\s+move");

const ROTATE_LEFT_PATTERN = wordPattern(
  'rotate\\s+left|twist\\s+left|turn\\s+left|counter[- ]?clockwise',
);
const ROTATE_RIGHT_PATTERN = wordPattern(
  'rotate\\s+right|twist\\s+right|turn\\s+right|clockwise',
);

/** Order matters: earlier families win when an utterance names several */
const DIRECTION_PATTERNS: ReadonlyArray<readonly [RegExp, Action]> = [
  [wordPattern('up|raise|higher'), 'MOVE_UP'],
  [wordPattern('down|lower'), 'MOVE_DOWN'],
  [wordPattern('left'), 'MOVE_LEFT'],
  [wordPattern('right'), 'MOVE_RIGHT'],
  [wordPattern('forward|advance|push|deeper'), 'MOVE_FORWARD'],
  [wordPattern('back|retract|pull|withdraw'), 'RETRACT'],
];

const SMALL_PATTERN = wordPattern('a\\s+little|slightly|tiny|nudge|bit|smidge');
const BIG_PATTERN = wordPattern('a\\s+lot|big|far|much|significantly|way');

export class PatternParser {
  /** Below the default validation threshold on purpose */
  static readonly CONFIDENCE = 0.6;

  /**
   * Parse a transcribed command.
   * Returns null when no cue matches.
   */
  parse(text: string): RobotCommand | null {
    const lower = text.toLowerCase();

    const action = this.matchAction(lower);
    if (action === null) {
      return null;
    }

    return RobotCommand.create({
      action,
      magnitude: action === 'STOP' ? null : this.matchMagnitude(lower),
      confidence: PatternParser.CONFIDENCE,
      rawText: text,
    });
  }

  private matchAction(lower: string): Action | null {
    if (STOP_PATTERN.test(lower)) {
      return 'STOP';
    }

    if (ROTATE_LEFT_PATTERN.test(lower)) {
      return 'ROTATE_LEFT';
    }
    if (ROTATE_RIGHT_PATTERN.test(lower)) {
      return 'ROTATE_RIGHT';
    }

    for (const [pattern, action] of DIRECTION_PATTERNS) {
      if (pattern.test(lower)) {
        return action;
      }
    }

    return null;
  }

  private matchMagnitude(lower: string): Magnitude {
    if (SMALL_PATTERN.test(lower)) {
      return 'SMALL';
    }
    if (BIG_PATTERN.test(lower)) {
      return 'BIG';
    }
    return 'MID';
  }
}
