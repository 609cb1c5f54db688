/**
 * CLI Output Factory
 * 
 * Picks the OutputPort for command handlers: Clack for interactive
 * terminals, plain console output for CI and piped sessions.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port singleton for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function getCliOutput(interactive?: boolean): OutputPort {
  if (detectInteractive(interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}

/**
 * Working directory for a command: the global --cwd option, resolved
 * against the process directory.
 */
export function getWorkingDir(command: Command): string {
  const root = command.parent ?? command;
  const cwd: unknown = root.opts().cwd;
  return typeof cwd === 'string' ? resolve(process.cwd(), cwd) : process.cwd();
}
