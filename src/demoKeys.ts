/**
 * Key handling for the demo, kept apart so it can be tested without a terminal
 */

import type { KeyEvent } from './renderer/Input';

const ESCAPE_CODE = 0x1b;

export interface Position {
  row: number;
  col: number;
}

export function describeKey(event: KeyEvent): string {
  switch (event.type) {
    case 'key':
      return event.key;
    case 'char':
      return `char ${event.code}`;
    case 'none':
      return 'none';
  }
}

// Byte-stream input has no arrow keys, so w/a/s/d stand in for them
export function step(event: KeyEvent): Position | null {
  const name = event.type === 'key' ? event.key : event.type === 'char' ? event.char : '';
  switch (name) {
    case 'up':
    case 'w':
      return { row: -1, col: 0 };
    case 'down':
    case 's':
      return { row: 1, col: 0 };
    case 'left':
    case 'a':
      return { row: 0, col: -1 };
    case 'right':
    case 'd':
      return { row: 0, col: 1 };
    default:
      return null;
  }
}

/**
 * Escape quits on both back ends: a named key from keypress events,
 * a bare ESC byte from the byte stream
 */
export function isQuit(event: KeyEvent): boolean {
  if (event.type === 'key') return event.key === 'escape';
  if (event.type === 'char') return event.char === 'q' || event.code === ESCAPE_CODE;
  return false;
}
