/**
 * Render pipeline - full repaint of a window onto the terminal
 * No diffing: every refresh clears the display and writes all rows
 */

import { clearSequence, LINE_BREAK } from './ansi';
import type { Window } from './Window';
import type { TtyOutput } from '../utils/terminal';

export class Screen {
  constructor(private readonly output: TtyOutput) {}

  /**
   * Clear the display, then write rows 0..height-1, each followed by a line break
   */
  refresh(window: Window): void {
    let output = clearSequence();
    for (const line of window.lines()) {
      output += line + LINE_BREAK;
    }
    this.output.write(output);
  }

  /**
   * Wipe the display without drawing anything
   */
  clear(): void {
    this.output.write(clearSequence());
  }

  write(data: string): void {
    this.output.write(data);
  }
}
