/**
 * Terminal mode service - line discipline and geometry behind one interface
 * The tty-backed implementation is best-effort when the streams are not terminals
 */

import { logger } from './logger';

// Opaque snapshot of the terminal's input mode
export interface TerminalMode {
  readonly raw: boolean;
}

export interface TerminalSize {
  rows: number;
  columns: number;
}

export const RAW_MODE: TerminalMode = { raw: true };

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { rows: 24, columns: 80 };

/**
 * Platform service the session drives: get/set mode and query geometry
 */
export interface TerminalModeService {
  getMode(): TerminalMode;
  setMode(mode: TerminalMode): void;
  getWindowSize(): TerminalSize | null;
}

// Subset of tty.ReadStream the mode service touches
export interface TtyInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

// Subset of tty.WriteStream used for geometry and output
export interface TtyOutput {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
  write(data: string | Uint8Array): boolean;
}

/**
 * Mode service over Node's tty streams
 */
export class TtyModeService implements TerminalModeService {
  constructor(
    private readonly stdin: TtyInput = process.stdin,
    private readonly stdout: TtyOutput = process.stdout,
  ) {}

  getMode(): TerminalMode {
    return { raw: this.stdin.isTTY === true && this.stdin.isRaw === true };
  }

  setMode(mode: TerminalMode): void {
    if (!this.stdin.isTTY || !this.stdin.setRawMode) return;
    try {
      this.stdin.setRawMode(mode.raw);
    } catch (error) {
      logger.warn('Failed to set terminal mode', {
        raw: mode.raw,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  getWindowSize(): TerminalSize | null {
    if (!this.stdout.isTTY) return null;
    return {
      rows: this.stdout.rows ?? 0,
      columns: this.stdout.columns ?? 0,
    };
  }
}

function isUsableDimension(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Replace a missing or non-positive dimension with its fallback
 */
export function resolveTerminalSize(
  detected: TerminalSize | null,
  fallback: TerminalSize = DEFAULT_TERMINAL_SIZE,
): TerminalSize {
  const rows = detected?.rows;
  const columns = detected?.columns;
  return {
    rows: isUsableDimension(rows) ? Math.trunc(rows) : fallback.rows,
    columns: isUsableDimension(columns) ? Math.trunc(columns) : fallback.columns,
  };
}

/**
 * Query geometry, never throwing; falls back to the given size
 */
export function getTerminalSize(
  modes: TerminalModeService,
  fallback: TerminalSize = DEFAULT_TERMINAL_SIZE,
): TerminalSize {
  let detected: TerminalSize | null = null;
  try {
    detected = modes.getWindowSize();
  } catch (error) {
    logger.warn('Terminal size query failed', {
      message: error instanceof Error ? error.message : String(error),
    });
  }
  return resolveTerminalSize(detected, fallback);
}
