import { SPECIAL_BLOCK_END } from './format.js';
import type { LineCursor } from './lineCursor.js';

/**
 * Consumes lines up to and including the next ***End_Special*** line, or to
 * the end of input when there is none. Call after the ***Start_Special***
 * line has been consumed.
 */
export function skipSpecialBlock(lines: LineCursor): void {
  for (let line = lines.next(); line !== undefined; line = lines.next()) {
    if (line.startsWith(SPECIAL_BLOCK_END)) return;
  }
}
