/**
 * Container execution of rendered build scripts.
 */

import type { ProcessRunner } from '../ports/process.js';
import { CONTAINER_PATHS } from '../../constants/index.js';
import { spawnRunner } from '../../utils/process.js';
import { logger } from '../../utils/logger.js';

export interface VolumeMount {
  host: string;
  container: string;
}

export interface ContainerRunOptions {
  image: string;
  /** Host work directory, mounted at /ffbuild */
  workDir: string;
  /** Host path of the script, mounted at /build.sh and run with bash */
  script: string;
  mounts?: readonly VolumeMount[];
}

export interface ContainerRunner {
  /** Run a script to completion and return its exit code */
  run(options: ContainerRunOptions): Promise<number>;
}

export interface DockerRunnerOptions {
  processes?: ProcessRunner;
  /** Allocate a pseudo-TTY; defaults to whether stdout is a terminal */
  tty?: boolean;
  /** `uid:gid` to run as; defaults to the invoking user where the platform has one */
  user?: string;
}

function currentUser(): string | undefined {
  if (typeof process.getuid !== 'function' || typeof process.getgid !== 'function') {
    return undefined;
  }
  return `${process.getuid()}:${process.getgid()}`;
}

export class DockerContainerRunner implements ContainerRunner {
  private readonly processes: ProcessRunner;
  private readonly tty: boolean;
  private readonly user: string | undefined;
  private rootless: Promise<boolean> | undefined;

  constructor(options: DockerRunnerOptions = {}) {
    this.processes = options.processes ?? spawnRunner;
    this.tty = options.tty ?? process.stdout.isTTY === true;
    this.user = options.user ?? currentUser();
  }

  /**
   * Rootless Docker maps the container's root to the invoking user, so
   * passing -u there would make the outputs unwritable.
   */
  isRootless(): Promise<boolean> {
    this.rootless ??= this.processes
      .run('docker', ['info', '-f', '{{println .SecurityOptions}}'], { stdio: 'pipe' })
      .then(result => {
        if (result.exitCode !== 0) {
          logger.debug('docker info failed, assuming rootful daemon', { stderr: result.stderr.trim() });
          return false;
        }
        return result.stdout.includes('rootless');
      });
    return this.rootless;
  }

  async buildArgs(options: ContainerRunOptions): Promise<string[]> {
    const args = ['run', '--rm', '-i'];
    if (this.tty) {
      args.push('-t');
    }
    if (this.user && !(await this.isRootless())) {
      args.push('-u', this.user);
    }
    args.push('-v', `${options.workDir}:${CONTAINER_PATHS.ROOT}`);
    for (const mount of options.mounts ?? []) {
      args.push('-v', `${mount.host}:${mount.container}`);
    }
    args.push('-v', `${options.script}:${CONTAINER_PATHS.SCRIPT}`);
    args.push(options.image, 'bash', CONTAINER_PATHS.SCRIPT);
    return args;
  }

  async run(options: ContainerRunOptions): Promise<number> {
    const args = await this.buildArgs(options);
    const result = await this.processes.run('docker', args, { stdio: 'inherit' });
    return result.exitCode;
  }
}
