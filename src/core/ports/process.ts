/**
 * Process Port Interface
 *
 * Subprocesses (docker, git, sh) are opaque to the core: it passes a
 * command line and reads back an exit code and, when piped, the output.
 * Tests substitute an in-process fake.
 */

export interface ProcessResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** 'inherit' streams to the terminal; 'pipe' captures stdout/stderr */
  readonly stdio?: 'inherit' | 'pipe';
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}
