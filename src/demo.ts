#!/usr/bin/env node
/**
 * Demo for the terminal layer
 * Run with: npm run demo
 */

import chalk from 'chalk';
import { resolveSessionSettings } from './config';
import { withSession, type TerminalSession } from './renderer/Session';
import type { Window } from './renderer/Window';
import { describeKey, isQuit, step, type Position } from './demoKeys';
import { configureLogger, logAppError } from './utils/logger';

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log(`
${chalk.bold('rawterm demo')} - move a marker around a raw-mode window

Usage:
  npm run demo

Keys:
  arrows / w a s d   Move the marker
  q, Escape          Quit
  `);
  process.exit(0);
}

const MARKER = '@';

function draw(session: TerminalSession, window: Window, marker: Position, lastKey: string): void {
  window.clear();
  window.writeFormatted(0, 0, 'rawterm %dx%d  last key: %s  (q to quit)', window.height, window.width, lastKey);
  window.writeChar(marker.row, marker.col, MARKER);
  session.refresh();
}

async function run(session: TerminalSession, window: Window): Promise<void> {
  session.setCursorVisible(false);
  const marker: Position = { row: Math.floor(window.height / 2), col: Math.floor(window.width / 2) };
  let lastKey = 'none';

  for (;;) {
    draw(session, window, marker, lastKey);
    const event = await session.readKey();
    if (event.type === 'none' || isQuit(event)) return;

    lastKey = describeKey(event);
    const delta = step(event);
    if (delta) {
      // Keep the marker below the status line
      marker.row = Math.min(Math.max(marker.row + delta.row, 1), window.height - 1);
      marker.col = Math.min(Math.max(marker.col + delta.col, 0), window.width - 1);
    }
  }
}

async function main(): Promise<void> {
  const settings = resolveSessionSettings();
  configureLogger({ directory: settings.logDirectory });

  await withSession(run, {
    fallbackSize: settings.fallbackSize,
    inputBackend: settings.inputBackend,
    clearOnTeardown: settings.clearOnTeardown,
  });
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logAppError(err, 'demo');
  console.error(chalk.red('Fatal error:'), err.message);
  process.exit(1);
});
