/**
 * ANSI escape codes used by the render pipeline
 * Only the clear / home / cursor-visibility primitives - no colour model
 */

// Cursor control
export const cursor = {
  hide: '\x1b[?25l',
  show: '\x1b[?25h',
  home: '\x1b[H',
};

// Screen control
export const screen = {
  clear: '\x1b[2J',
};

// Raw mode disables output post-processing, so a bare \n would not return the carriage
export const LINE_BREAK = '\r\n';

/**
 * Sequence that wipes the display and parks the cursor top-left
 */
export function clearSequence(): string {
  return screen.clear + cursor.home;
}

/**
 * Show/hide cursor sequence for a visibility flag
 */
export function cursorVisibility(visible: boolean): string {
  return visible ? cursor.show : cursor.hide;
}
