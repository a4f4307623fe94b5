import { describe, it, expect } from 'vitest';
import { Window, createWindow, dimensions, MAX_FORMATTED_LENGTH } from './Window';

describe('Window', () => {
  describe('createWindow', () => {
    it('should fill every cell with a blank', () => {
      const window = createWindow(3, 4);
      expect(window.lines()).toEqual(['    ', '    ', '    ']);
    });

    it('should keep the origin it was given', () => {
      const window = createWindow(2, 2, 5, 7);
      expect(window.originRow).toBe(5);
      expect(window.originCol).toBe(7);
    });

    it('should clamp negative and non-finite sizes to zero', () => {
      const window = createWindow(-3, Number.NaN);
      expect(dimensions(window)).toEqual({ height: 0, width: 0 });
      expect(window.lines()).toEqual([]);
    });

    it('should truncate fractional sizes', () => {
      expect(dimensions(createWindow(2.9, 3.2))).toEqual({ height: 2, width: 3 });
    });
  });

  describe('dimensions', () => {
    it('should equal the sizes passed to createWindow', () => {
      expect(dimensions(createWindow(24, 80))).toEqual({ height: 24, width: 80 });
      expect(dimensions(createWindow(1, 132))).toEqual({ height: 1, width: 132 });
    });

    it('should report 0x0 for an absent window', () => {
      expect(dimensions(null)).toEqual({ height: 0, width: 0 });
      expect(dimensions(undefined)).toEqual({ height: 0, width: 0 });
    });
  });

  describe('writeChar', () => {
    it('should set the target cell for in-bounds writes', () => {
      const window = createWindow(3, 4);
      window.writeChar(0, 0, 'a');
      window.writeChar(2, 3, 'z');
      window.writeChar(1, 2, 'm');

      expect(window.cellAt(0, 0)).toBe('a');
      expect(window.cellAt(2, 3)).toBe('z');
      expect(window.lines()).toEqual(['a   ', '  m ', '   z']);
    });

    it('should leave the grid unchanged for out-of-bounds writes', () => {
      const window = createWindow(3, 4);
      const before = window.lines();

      window.writeChar(-1, 0, 'x');
      window.writeChar(3, 0, 'x');
      window.writeChar(0, -1, 'x');
      window.writeChar(0, 4, 'x');
      window.writeChar(100, 100, 'x');
      window.writeChar(1.5, 0, 'x');

      expect(window.lines()).toEqual(before);
    });

    it('should store only the first character', () => {
      const window = createWindow(1, 3);
      window.writeChar(0, 1, 'xyz');
      expect(window.lines()).toEqual([' x ']);
    });

    it('should store a line break as a blank', () => {
      const window = createWindow(1, 3);
      window.writeChar(0, 0, 'x');
      window.writeChar(0, 0, '\n');
      window.writeChar(0, 1, '\r');
      expect(window.lines()).toEqual(['   ']);
    });

    it('should ignore an empty string', () => {
      const window = createWindow(1, 3);
      window.writeChar(0, 1, '');
      expect(window.lines()).toEqual(['   ']);
    });
  });

  describe('writeText', () => {
    it('should truncate at the right edge', () => {
      const window = createWindow(2, 80);
      window.writeText(0, 78, 'ABCD');

      expect(window.cellAt(0, 78)).toBe('A');
      expect(window.cellAt(0, 79)).toBe('B');
      expect(window.lines()[0]).toBe(' '.repeat(78) + 'AB');
      expect(window.lines()[1]).toBe(' '.repeat(80));
    });

    it('should do nothing when the start is out of bounds', () => {
      const window = createWindow(2, 5);
      window.writeText(2, 0, 'hello');
      window.writeText(0, 5, 'hello');
      window.writeText(-1, 0, 'hello');
      window.writeText(0, -2, 'hello');

      expect(window.lines()).toEqual(['     ', '     ']);
    });

    it('should write one character per column from the start', () => {
      const window = createWindow(2, 8);
      window.writeText(1, 2, 'abc');
      expect(window.lines()).toEqual(['        ', '  abc   ']);
    });

    it('should keep copying past a line break, blanking its cell', () => {
      const window = createWindow(2, 6);
      window.writeText(1, 0, 'ab\ncd');

      expect(window.cellAt(1, 2)).toBe(' ');
      expect(window.cellAt(1, 3)).toBe('c');
      expect(window.lines()).toEqual(['      ', 'ab cd ']);
    });

    it('should still truncate at the right edge after a line break', () => {
      const window = createWindow(1, 5);
      window.writeText(0, 0, 'ab\r\ncdef');
      expect(window.lines()).toEqual(['ab  c']);
    });
  });

  describe('writeFormatted', () => {
    it('should interpolate arguments before writing', () => {
      const window = createWindow(1, 10);
      window.writeFormatted(0, 0, '%s=%d', 'x', 42);
      expect(window.lines()).toEqual(['x=42      ']);
    });

    it('should cut the formatted text to its maximum length', () => {
      const window = new Window(1, 2000);
      window.writeFormatted(0, 0, '%s', 'y'.repeat(1500));
      expect(window.lines()[0]).toBe('y'.repeat(MAX_FORMATTED_LENGTH) + ' '.repeat(2000 - MAX_FORMATTED_LENGTH));
    });

    it('should do nothing when the start is out of bounds', () => {
      const window = createWindow(1, 4);
      window.writeFormatted(1, 0, '%d', 7);
      expect(window.lines()).toEqual(['    ']);
    });
  });

  describe('clear', () => {
    it('should reset every cell without resizing', () => {
      const window = createWindow(2, 3);
      window.writeText(0, 0, 'abc');
      window.writeText(1, 0, 'def');
      window.clear();

      expect(window.lines()).toEqual(['   ', '   ']);
      expect(dimensions(window)).toEqual({ height: 2, width: 3 });
    });
  });

  it('should return undefined from cellAt outside the grid', () => {
    const window = createWindow(1, 1);
    expect(window.cellAt(0, 1)).toBeUndefined();
    expect(window.cellAt(0, 0)).toBe(' ');
  });
});
