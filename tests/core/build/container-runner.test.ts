import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DockerContainerRunner } from '../../../src/core/build/container-runner.js';
import { FakeProcessRunner, type RecordedCall } from '../../test-helpers.js';

function dockerFake(securityOptions: string, runExit = 0, infoExit = 0): FakeProcessRunner {
  return new FakeProcessRunner((call: RecordedCall) => {
    if (call.args[0] === 'info') {
      return { exitCode: infoExit, stdout: securityOptions };
    }
    return { exitCode: runExit };
  });
}

const stageRun = { image: 'base:test', workDir: '/work', script: '/work/stages/stage-01.sh' };

describe('DockerContainerRunner', () => {
  it('runs the script as the invoking user on a rootful daemon', async () => {
    const processes = dockerFake('[name=seccomp,profile=builtin]\n', 7);
    const runner = new DockerContainerRunner({ processes, tty: false, user: '1000:1000' });

    assert.equal(await runner.run(stageRun), 7);

    const run = processes.calls[1];
    assert.equal(run.command, 'docker');
    assert.deepEqual(run.args, [
      'run', '--rm', '-i',
      '-u', '1000:1000',
      '-v', '/work:/ffbuild',
      '-v', '/work/stages/stage-01.sh:/build.sh',
      'base:test', 'bash', '/build.sh'
    ]);
    assert.equal(run.options.stdio, 'inherit');
  });

  it('keeps the container user on a rootless daemon', async () => {
    const processes = dockerFake('[name=seccomp,profile=builtin name=rootless]\n');
    const runner = new DockerContainerRunner({ processes, tty: true, user: '1000:1000' });

    assert.deepEqual(await runner.buildArgs(stageRun), [
      'run', '--rm', '-i', '-t',
      '-v', '/work:/ffbuild',
      '-v', '/work/stages/stage-01.sh:/build.sh',
      'base:test', 'bash', '/build.sh'
    ]);
  });

  it('asks the daemon once and treats a failing query as rootful', async () => {
    const processes = dockerFake('', 0, 1);
    const runner = new DockerContainerRunner({ processes, tty: false, user: '1000:1000' });

    assert.equal(await runner.isRootless(), false);
    await runner.run(stageRun);
    await runner.run(stageRun);

    const infoCalls = processes.calls.filter(call => call.args[0] === 'info');
    assert.equal(infoCalls.length, 1);
    assert.deepEqual(infoCalls[0].args, ['info', '-f', '{{println .SecurityOptions}}']);
    assert.equal(infoCalls[0].options.stdio, 'pipe');
  });

  it('adds extra mounts before the script', async () => {
    const processes = dockerFake('');
    const runner = new DockerContainerRunner({ processes, tty: false, user: '1000:1000' });

    const args = await runner.buildArgs({
      ...stageRun,
      script: '/work/package.sh',
      mounts: [{ host: '/artifacts', container: '/out' }]
    });

    assert.deepEqual(args.slice(-9), [
      '-v', '/work:/ffbuild',
      '-v', '/artifacts:/out',
      '-v', '/work/package.sh:/build.sh',
      'base:test', 'bash', '/build.sh'
    ]);
  });
});
