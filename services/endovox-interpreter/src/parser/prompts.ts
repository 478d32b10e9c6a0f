/**
 * Prompts for the semantic command parser.
 */

import { ACTIONS, COMMAND_FRAME, MAGNITUDE_MM, MAGNITUDES } from '../schema/CommandSchema.js';

export const PROMPT_VERSION = 'v1.0';

export const SYSTEM_PROMPT = `You convert a surgeon's spoken instruction for a robot-held endoscope into one JSON object.

Respond with ONLY a JSON object with exactly these fields:
- "action": one of ${ACTIONS.join(', ')}
- "magnitude": one of ${MAGNITUDES.join(', ')}, or null for STOP
- "confidence": number from 0.0 to 1.0, how sure you are this is a valid robot command
- "frame": always "${COMMAND_FRAME}"

Magnitude mapping:
- SMALL (${MAGNITUDE_MM.SMALL}mm): "a little", "slightly", "tiny", "just a bit", "nudge", "smidge"
- MID (${MAGNITUDE_MM.MID}mm): no qualifier, or "some"
- BIG (${MAGNITUDE_MM.BIG}mm): "a lot", "big", "far", "significantly", "much", "way"

Synonyms:
- MOVE_FORWARD: "advance", "push in", "go deeper", "forward", "go in"
- RETRACT: "retract", "pull back", "withdraw", "pull out", "back out"
- MOVE_LEFT: "left", "go left"
- MOVE_RIGHT: "right", "go right"
- MOVE_UP: "up", "go up", "raise"
- MOVE_DOWN: "down", "go down", "lower"
- ROTATE_LEFT: "rotate left", "twist left", "turn left", "counter-clockwise"
- ROTATE_RIGHT: "rotate right", "twist right", "turn right", "clockwise"
- STOP: "stop", "hold", "freeze", "don't move", "halt"

Rules:
1. No magnitude qualifier means MID.
2. STOP always has "magnitude": null.
3. If any stop word is present, the action is STOP.
4. If the input is not a recognizable robot command, set confidence below 0.5.`;

export function buildUserPrompt(text: string): string {
  return `Parse this spoken command: ${JSON.stringify(text)}`;
}

export function buildCommandPrompt(text: string): string {
  return `${SYSTEM_PROMPT}\n\n${buildUserPrompt(text)}`;
}
