export { TerminalSession, withSession, type SessionFlags, type SessionOptions } from './renderer/Session';
export { Window, createWindow, dimensions, BLANK, MAX_FORMATTED_LENGTH, type WindowSize } from './renderer/Window';
export { Screen } from './renderer/Screen';
export {
  ByteStreamKeyReader,
  KeypressKeyReader,
  createKeyReader,
  decodeKeypress,
  isPrintable,
  resolveBackend,
  NO_KEY,
  type InputBackend,
  type KeyEvent,
  type KeyReader,
  type NamedKey,
} from './renderer/Input';
export {
  TtyModeService,
  DEFAULT_TERMINAL_SIZE,
  RAW_MODE,
  getTerminalSize,
  resolveTerminalSize,
  type TerminalMode,
  type TerminalModeService,
  type TerminalSize,
  type TtyInput,
  type TtyOutput,
} from './utils/terminal';
export { configureLogger, logger } from './utils/logger';
export { createConfigStore, getConfig, resolveSessionSettings, type ConfigSchema, type SessionSettings } from './config';
