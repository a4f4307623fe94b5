/**
 * Terminal session - owns the saved terminal mode and the current window
 *
 * initialize() captures the mode, switches to raw input and allocates a window
 * sized to the terminal; teardown() undoes all of it exactly once. While a
 * session is live a process 'exit' listener restores the mode, and
 * withSession() runs teardown on every exit path of the caller's code.
 */

import { cursorVisibility } from './ansi';
import { createKeyReader, echoPayload, NO_KEY, type InputBackend, type KeyEvent, type KeyReader } from './Input';
import { Screen } from './Screen';
import { Window } from './Window';
import {
  DEFAULT_TERMINAL_SIZE,
  getTerminalSize,
  RAW_MODE,
  TtyModeService,
  type TerminalMode,
  type TerminalModeService,
  type TerminalSize,
  type TtyOutput,
} from '../utils/terminal';
import { logger, logSession } from '../utils/logger';

export interface SessionOptions {
  modes?: TerminalModeService;
  input?: NodeJS.ReadableStream;
  output?: TtyOutput;
  // Overrides inputBackend when given
  keyReader?: KeyReader;
  inputBackend?: InputBackend;
  fallbackSize?: TerminalSize;
  clearOnTeardown?: boolean;
  // Restore the terminal from a process 'exit' listener while the session is live
  restoreOnExit?: boolean;
}

export interface SessionFlags {
  initialized: boolean;
  echo: boolean;
  noDelay: boolean;
  cursorVisible: boolean;
}

export class TerminalSession {
  private readonly modes: TerminalModeService;
  private readonly output: TtyOutput;
  private readonly screen: Screen;
  private readonly keyReader: KeyReader;
  private readonly fallbackSize: TerminalSize;
  private readonly clearOnTeardown: boolean;
  private readonly restoreOnExit: boolean;

  private initialized = false;
  private echo = false;
  private noDelay = false;
  private cursorVisible = true;
  private savedMode: TerminalMode | null = null;
  private window: Window | null = null;

  constructor(options: SessionOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.modes = options.modes ?? new TtyModeService(process.stdin, this.output);
    this.screen = new Screen(this.output);
    this.keyReader = options.keyReader ?? createKeyReader(options.inputBackend ?? 'auto', options.input ?? process.stdin);
    this.fallbackSize = options.fallbackSize ?? DEFAULT_TERMINAL_SIZE;
    this.clearOnTeardown = options.clearOnTeardown ?? true;
    this.restoreOnExit = options.restoreOnExit ?? true;
  }

  private readonly onProcessExit = (): void => {
    this.restoreCursor();
    this.restoreMode();
  };

  /**
   * Enter raw mode and allocate the session window.
   * Calling again while initialized returns the existing window untouched.
   */
  initialize(): Window {
    if (this.initialized && this.window) {
      logger.warn('Session already initialized; keeping the original terminal mode');
      return this.window;
    }

    const size = getTerminalSize(this.modes, this.fallbackSize);
    this.window = new Window(size.rows, size.columns, 0, 0);

    this.savedMode = this.modes.getMode();
    this.modes.setMode(RAW_MODE);

    this.echo = false;
    this.noDelay = false;
    this.cursorVisible = true;
    this.initialized = true;

    this.keyReader.start();
    if (this.restoreOnExit) {
      process.once('exit', this.onProcessExit);
    }

    logSession('initialize', { rows: size.rows, columns: size.columns });
    return this.window;
  }

  /**
   * Restore the terminal and release the window; safe to call repeatedly
   */
  teardown(): void {
    if (!this.initialized) return;

    this.keyReader.stop();
    this.restoreCursor();
    this.restoreMode();
    if (this.clearOnTeardown) {
      this.screen.clear();
    }
    process.removeListener('exit', this.onProcessExit);

    this.window = null;
    this.initialized = false;
    logSession('teardown');
  }

  private restoreCursor(): void {
    if (this.cursorVisible) return;
    this.cursorVisible = true;
    if (this.output.isTTY) {
      this.screen.write(cursorVisibility(true));
    }
  }

  // The snapshot is consumed by the first restore
  private restoreMode(): void {
    if (!this.savedMode) return;
    const mode = this.savedMode;
    this.savedMode = null;
    this.modes.setMode(mode);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getWindow(): Window | null {
    return this.window;
  }

  getFlags(): SessionFlags {
    return {
      initialized: this.initialized,
      echo: this.echo,
      noDelay: this.noDelay,
      cursorVisible: this.cursorVisible,
    };
  }

  /**
   * Echo printable keys back to the output as they are read
   */
  setEcho(enabled: boolean): void {
    this.echo = enabled;
  }

  setNoDelay(enabled: boolean): void {
    this.noDelay = enabled;
  }

  /**
   * Best-effort: only a live session on a TTY gets the escape sequence
   */
  setCursorVisible(visible: boolean): void {
    this.cursorVisible = visible;
    if (this.initialized && this.output.isTTY) {
      this.screen.write(cursorVisibility(visible));
    }
  }

  /**
   * Re-issue raw mode without touching geometry or the window
   */
  reapplyRawMode(): void {
    if (!this.initialized) return;
    this.modes.setMode(RAW_MODE);
    logSession('reapply');
  }

  async readKey(): Promise<KeyEvent> {
    if (!this.initialized) return NO_KEY;
    const event = await this.keyReader.readKey(this.noDelay);
    const echoed = this.echo ? echoPayload(event) : null;
    if (echoed !== null) {
      this.output.write(echoed);
    }
    return event;
  }

  /**
   * Repaint the current window; nothing happens before initialize
   */
  refresh(): void {
    if (!this.window) return;
    this.screen.refresh(this.window);
  }
}

/**
 * Run fn inside an initialized session; teardown runs however fn exits
 */
export async function withSession<T>(
  fn: (session: TerminalSession, window: Window) => T | Promise<T>,
  options: SessionOptions = {},
): Promise<T> {
  const session = new TerminalSession(options);
  const window = session.initialize();
  try {
    return await fn(session, window);
  } finally {
    session.teardown();
  }
}
