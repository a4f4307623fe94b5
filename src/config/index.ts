import Conf from 'conf';
import { DEFAULT_LOG_DIR } from '../utils/logger';
import { DEFAULT_TERMINAL_SIZE, type TerminalSize } from '../utils/terminal';
import { INPUT_BACKENDS, type InputBackend } from '../renderer/Input';

export interface ConfigSchema {
  fallbackRows: number; // Used when the terminal reports no usable height
  fallbackColumns: number; // Used when the terminal reports no usable width
  inputBackend: InputBackend;
  clearOnTeardown: boolean;
  logDirectory: string; // Empty string disables file logging
}

export const CONFIG_DEFAULTS: ConfigSchema = {
  fallbackRows: DEFAULT_TERMINAL_SIZE.rows,
  fallbackColumns: DEFAULT_TERMINAL_SIZE.columns,
  inputBackend: 'auto',
  clearOnTeardown: true,
  logDirectory: DEFAULT_LOG_DIR,
};

export type ConfigStore = Conf<ConfigSchema>;

export interface ConfigStoreOptions {
  cwd?: string;
  configName?: string;
}

/**
 * Create the persisted config store. Tests pass `cwd` to keep it out of the user's config dir.
 */
export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  return new Conf<ConfigSchema>({
    projectName: 'rawterm',
    defaults: CONFIG_DEFAULTS,
    ...options,
  });
}

let store: ConfigStore | null = null;

/**
 * Shared store, created on first use
 */
export function getConfig(): ConfigStore {
  if (!store) {
    store = createConfigStore();
  }
  return store;
}

export interface SessionSettings {
  fallbackSize: TerminalSize;
  inputBackend: InputBackend;
  clearOnTeardown: boolean;
  logDirectory: string | null;
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function isInputBackend(value: unknown): value is InputBackend {
  return INPUT_BACKENDS.some(backend => backend === value);
}

/**
 * Read settings from the store, replacing anything invalid with its default
 */
export function resolveSessionSettings(config: ConfigStore = getConfig()): SessionSettings {
  const inputBackend: unknown = config.get('inputBackend');
  const clearOnTeardown: unknown = config.get('clearOnTeardown');
  const logDirectory: unknown = config.get('logDirectory');

  return {
    fallbackSize: {
      rows: positiveInteger(config.get('fallbackRows'), CONFIG_DEFAULTS.fallbackRows),
      columns: positiveInteger(config.get('fallbackColumns'), CONFIG_DEFAULTS.fallbackColumns),
    },
    inputBackend: isInputBackend(inputBackend) ? inputBackend : CONFIG_DEFAULTS.inputBackend,
    clearOnTeardown: typeof clearOnTeardown === 'boolean' ? clearOnTeardown : CONFIG_DEFAULTS.clearOnTeardown,
    logDirectory: typeof logDirectory === 'string' && logDirectory.length > 0 ? logDirectory : null,
  };
}
