/**
 * Window - an owned character grid decoupled from the physical screen
 * Writes are bounds-checked; anything outside the grid is dropped
 */

import { format } from 'util';

export const BLANK = ' ';

// Formatted writes are cut to this many characters before copying
export const MAX_FORMATTED_LENGTH = 1023;

export interface WindowSize {
  height: number;
  width: number;
}

// Line breaks never reach the grid; they would break the row-by-row repaint
function toCell(char: string): string {
  return char === '\n' || char === '\r' ? BLANK : char;
}

function toCellCount(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}

export class Window {
  readonly height: number;
  readonly width: number;
  readonly originRow: number;
  readonly originCol: number;
  private cells: string[][];

  constructor(height: number, width: number, originRow = 0, originCol = 0) {
    this.height = toCellCount(height);
    this.width = toCellCount(width);
    this.originRow = originRow;
    this.originCol = originCol;
    this.cells = this.createEmptyGrid();
  }

  private createEmptyGrid(): string[][] {
    const grid: string[][] = [];
    for (let y = 0; y < this.height; y++) {
      grid.push(new Array<string>(this.width).fill(BLANK));
    }
    return grid;
  }

  /**
   * True when (row, col) addresses a cell of the grid
   */
  contains(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.height &&
      col >= 0 &&
      col < this.width
    );
  }

  /**
   * Write one character at (row, col); out-of-range writes are dropped
   */
  writeChar(row: number, col: number, ch: string): void {
    if (!this.contains(row, col)) return;
    const [first] = ch;
    if (!first) return;
    this.cells[row][col] = toCell(first);
  }

  /**
   * Copy text rightwards from (row, col), truncating at the right edge.
   * Line breaks occupy a column as a blank.
   */
  writeText(row: number, col: number, text: string): void {
    if (!this.contains(row, col)) return;

    let x = col;
    for (const char of text) {
      if (x >= this.width) break;
      this.cells[row][x] = toCell(char);
      x++;
    }
  }

  /**
   * printf-style write: `%s`, `%d`, `%i`, `%f`, `%j`, `%o` and `%%`
   */
  writeFormatted(row: number, col: number, template: string, ...args: unknown[]): void {
    if (!this.contains(row, col)) return;
    const text = format(template, ...args);
    this.writeText(row, col, text.slice(0, MAX_FORMATTED_LENGTH));
  }

  /**
   * Reset every cell to blank
   */
  clear(): void {
    this.cells = this.createEmptyGrid();
  }

  cellAt(row: number, col: number): string | undefined {
    if (!this.contains(row, col)) return undefined;
    return this.cells[row][col];
  }

  /**
   * Grid content as one string per row, in row order
   */
  lines(): string[] {
    return this.cells.map(row => row.join(''));
  }

  getSize(): WindowSize {
    return { height: this.height, width: this.width };
  }
}

export function createWindow(height: number, width: number, originRow = 0, originCol = 0): Window {
  return new Window(height, width, originRow, originCol);
}

/**
 * Size of a window, or 0x0 when there is none
 */
export function dimensions(window: Window | null | undefined): WindowSize {
  return window ? window.getSize() : { height: 0, width: 0 };
}
