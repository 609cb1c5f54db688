import { spawn } from 'child_process';

import type { ProcessResult, ProcessRunner, RunOptions } from '../core/ports/process.js';
import { logger } from './logger.js';

/**
 * Spawn-based ProcessRunner. Piped output is collected as UTF-8; a process
 * killed by a signal reports exit code 1.
 */
export const spawnRunner: ProcessRunner = {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const stdio = options.stdio ?? 'pipe';
    logger.debug(`Running ${command} ${args.join(' ')}`, { cwd: options.cwd });

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe']
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', reject);
      child.on('close', code => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
};
