/**
 * Key input for a raw-mode terminal
 * Two back ends behind one KeyReader: a raw byte stream and structured keypress events
 */

import { emitKeypressEvents, type Key } from 'readline';

export type NamedKey = 'up' | 'down' | 'left' | 'right' | 'enter' | 'backspace' | 'escape';

export type KeyEvent =
  | { type: 'key'; key: NamedKey }
  // bytes is set by the byte-stream back end: the raw byte the char was read from
  | { type: 'char'; char: string; code: number; bytes?: Uint8Array }
  | { type: 'none' };

export type InputBackend = 'auto' | 'keypress' | 'bytes';

export const INPUT_BACKENDS: readonly InputBackend[] = ['auto', 'keypress', 'bytes'];

export const NO_KEY: KeyEvent = { type: 'none' };

export interface KeyReader {
  start(): void;
  stop(): void;
  /**
   * Next key in arrival order. With noDelay an empty queue resolves to
   * `{ type: 'none' }` at once instead of waiting.
   */
  readKey(noDelay: boolean): Promise<KeyEvent>;
}

export function charEvent(char: string): KeyEvent {
  return { type: 'char', char, code: char.codePointAt(0) ?? 0 };
}

export function byteEvent(byte: number): KeyEvent {
  return { type: 'char', char: String.fromCharCode(byte), code: byte, bytes: Uint8Array.of(byte) };
}

/**
 * Printable characters only - control codes and DEL are not
 */
export function isPrintable(event: KeyEvent): boolean {
  if (event.type !== 'char') return false;
  return (event.code >= 0x20 && event.code < 0x7f) || event.code >= 0xa0;
}

/**
 * What to write back for an echoed key, or null when it is not echoed.
 * Raw bytes go back untouched so multi-byte characters arrive whole;
 * any byte of a UTF-8 sequence (0x80 and up) is echoed.
 */
export function echoPayload(event: KeyEvent): string | Uint8Array | null {
  if (event.type !== 'char') return null;
  if (event.bytes) {
    return isPrintable(event) || event.code >= 0x80 ? event.bytes : null;
  }
  return isPrintable(event) ? event.char : null;
}

/**
 * Queue shared by both back ends: events that arrive with no pending
 * read wait here, reads that arrive with no events wait for the next one.
 */
abstract class QueuedKeyReader implements KeyReader {
  private queue: KeyEvent[] = [];
  private waiters: Array<(event: KeyEvent) => void> = [];
  private running = false;
  private ended = false;

  constructor(protected readonly input: NodeJS.ReadableStream) {}

  protected abstract attach(): void;
  protected abstract detach(): void;

  private readonly onEnd = (): void => {
    this.ended = true;
    this.flushWaiters();
  };

  start(): void {
    if (this.running) return;
    this.running = true;
    this.ended = false;
    this.attach();
    this.input.on('end', this.onEnd);
    this.input.resume();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.detach();
    this.input.removeListener('end', this.onEnd);
    this.input.pause();
    this.queue = [];
    this.flushWaiters();
  }

  readKey(noDelay: boolean): Promise<KeyEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (noDelay || !this.running || this.ended) return Promise.resolve(NO_KEY);
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  protected push(event: KeyEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.queue.push(event);
    }
  }

  private flushWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(NO_KEY);
    }
  }
}

/**
 * One byte per read, returned verbatim. Escape sequences are not parsed,
 * so arrow keys arrive as their individual bytes.
 */
export class ByteStreamKeyReader extends QueuedKeyReader {
  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const byte of bytes) {
      this.push(byteEvent(byte));
    }
  };

  protected attach(): void {
    this.input.on('data', this.onData);
  }

  protected detach(): void {
    this.input.removeListener('data', this.onData);
  }
}

const NAMED_KEYS = new Map<string, NamedKey>([
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['return', 'enter'],
  ['enter', 'enter'],
  ['backspace', 'backspace'],
  ['escape', 'escape'],
]);

/**
 * Map one structured keypress to a KeyEvent, or null when it carries
 * neither a named key nor a usable character
 */
export function decodeKeypress(str: string | undefined, key: Key | undefined): KeyEvent | null {
  const named = key?.name ? NAMED_KEYS.get(key.name) : undefined;
  if (named) return { type: 'key', key: named };

  if (!str) return null;
  const chars = Array.from(str);
  if (chars.length !== 1 || chars[0] === '\0') return null;
  return charEvent(chars[0]);
}

/**
 * Structured key events via readline's keypress decoder
 */
export class KeypressKeyReader extends QueuedKeyReader {
  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    const event = decodeKeypress(str, key);
    if (event) this.push(event);
  };

  protected attach(): void {
    emitKeypressEvents(this.input);
    this.input.on('keypress', this.onKeypress);
  }

  protected detach(): void {
    this.input.removeListener('keypress', this.onKeypress);
  }
}

/**
 * Pick a back end; 'auto' means structured events on Windows, bytes elsewhere
 */
export function resolveBackend(backend: InputBackend, platform: NodeJS.Platform = process.platform): 'keypress' | 'bytes' {
  if (backend !== 'auto') return backend;
  return platform === 'win32' ? 'keypress' : 'bytes';
}

export function createKeyReader(
  backend: InputBackend,
  input: NodeJS.ReadableStream = process.stdin,
  platform: NodeJS.Platform = process.platform,
): KeyReader {
  return resolveBackend(backend, platform) === 'keypress'
    ? new KeypressKeyReader(input)
    : new ByteStreamKeyReader(input);
}
