import { FakeCommandRunner } from '../../test/fake-command-runner';
import type { Lane } from '../matrix/matrix.types';
import type { StageDefinition } from '../queue/dto/pipeline.dto';
import type { LaneOutputEvent, StageResult } from './executor.types';
import { StageExecutorService } from './stage-executor.service';

const lane: Lane = {
  id: 'linux-stable',
  labels: { 'platform-toolchain': 'linux-stable' },
  variables: { imageName: 'ubuntu-latest', toolchainChannel: 'stable' },
  image: 'ubuntu-latest',
};

function stage(name: string, commands: string[], extra: Partial<StageDefinition> = {}): StageDefinition {
  return { name, commands, env: {}, continueOnFailure: false, ...extra };
}

const STAGES: StageDefinition[] = [
  stage('build', ['cargo build --all']),
  stage('lint', ['cargo clippy --all']),
  stage('test', ['cargo test --all']),
  stage('docs', ['cargo doc --no-deps']),
];

const statuses = (stages: StageResult[]) => stages.map((s) => [s.name, s.status]);

describe('StageExecutorService.runLane', () => {
  it('stops after a failing build: lint, test and docs never run', async () => {
    const runner = new FakeCommandRunner((command) =>
      command === 'cargo build --all' ? { exitCode: 1 } : undefined,
    );

    const result = await new StageExecutorService(runner).runLane(lane, STAGES);

    expect(result.status).toBe('failed');
    expect(result.failureKind).toBe('stage');
    expect(statuses(result.stages)).toEqual([['build', 'failed']]);
    expect(result.stages[0]).toMatchObject({ stageIndex: 0, exitCode: 1, failureKind: 'stage' });
    expect(runner.commands).toEqual(['cargo build --all']);
  });

  it('returns one success per stage when everything passes', async () => {
    const runner = new FakeCommandRunner();

    const result = await new StageExecutorService(runner).runLane(lane, STAGES);

    expect(result.status).toBe('success');
    expect(result.failureKind).toBeUndefined();
    expect(statuses(result.stages)).toEqual([
      ['build', 'success'],
      ['lint', 'success'],
      ['test', 'success'],
      ['docs', 'success'],
    ]);
    expect(result.stages.map((s) => s.exitCode)).toEqual([0, 0, 0, 0]);
    expect(runner.commands).toEqual([
      'cargo build --all',
      'cargo clippy --all',
      'cargo test --all',
      'cargo doc --no-deps',
    ]);
  });

  it.each([0, 1, 2, 3])('reports stages up to and including a failure at index %i only', async (failing) => {
    const failingCommand = STAGES[failing].commands[0];
    const runner = new FakeCommandRunner((command) =>
      command === failingCommand ? { exitCode: 101 } : undefined,
    );

    const result = await new StageExecutorService(runner).runLane(lane, STAGES);

    expect(result.status).toBe('failed');
    expect(result.stages).toHaveLength(failing + 1);
    expect(result.stages.slice(0, failing).every((s) => s.status === 'success')).toBe(true);
    expect(result.stages[failing]).toMatchObject({ name: STAGES[failing].name, status: 'failed', exitCode: 101 });
  });

  it('gives the same outcome pattern when re-run against the same collaborators', async () => {
    const runner = new FakeCommandRunner((command) =>
      command === 'cargo test --all' ? { exitCode: 1 } : undefined,
    );
    const executor = new StageExecutorService(runner);

    const first = await executor.runLane(lane, STAGES);
    const second = await executor.runLane(lane, STAGES);

    expect(statuses(second.stages)).toEqual(statuses(first.stages));
    expect(second.status).toBe(first.status);
  });

  it('stops a stage at its first failing command', async () => {
    const runner = new FakeCommandRunner((command) => (command === 'two' ? { exitCode: 2 } : undefined));

    const result = await new StageExecutorService(runner).runLane(lane, [
      stage('build', ['one', 'two', 'three']),
    ]);

    expect(runner.commands).toEqual(['one', 'two']);
    expect(result.stages[0]).toMatchObject({ status: 'failed', exitCode: 2 });
  });

  it('captures command output into the stage result and streams it line by line', async () => {
    const runner = new FakeCommandRunner((command) =>
      command === 'cargo build --all'
        ? { exitCode: 1, output: 'error[E0308]: mismatched types\n' }
        : undefined,
    );
    const events: LaneOutputEvent[] = [];

    const result = await new StageExecutorService(runner).runLane(lane, STAGES, {
      onOutput: (event) => events.push(event),
    });

    expect(result.stages[0].output).toBe('error[E0308]: mismatched types\n');
    expect(events).toEqual([
      { laneId: 'linux-stable', step: 'build', line: '$ cargo build --all', level: 'info' },
      { laneId: 'linux-stable', step: 'build', line: 'error[E0308]: mismatched types', level: 'info' },
      { laneId: 'linux-stable', step: 'build', line: 'Command exited with code 1', level: 'error' },
    ]);
  });

  it('exposes lane variables as env and as command macros', async () => {
    const runner = new FakeCommandRunner();

    await new StageExecutorService(runner).runLane(
      lane,
      [stage('build', ['cargo +$(toolchainChannel) build'], { env: { TARGET_DIR: 'target/$(toolchainChannel)' } })],
      { env: { CARGO_TERM_COLOR: 'never' } },
    );

    expect(runner.commands).toEqual(['cargo +stable build']);
    expect(runner.calls[0].env).toEqual({
      CARGO_TERM_COLOR: 'never',
      imageName: 'ubuntu-latest',
      IMAGENAME: 'ubuntu-latest',
      toolchainChannel: 'stable',
      TOOLCHAINCHANNEL: 'stable',
      LANE_ID: 'linux-stable',
      LANE_IMAGE: 'ubuntu-latest',
      TARGET_DIR: 'target/stable',
    });
  });

  it('keeps the worker and pipeline environment when a variable alias would collide', () => {
    const pathLane: Lane = { ...lane, variables: { path: 'crates/core', cargo_home: '/tmp/cargo' } };

    const env = StageExecutorService.laneEnv(pathLane, { CARGO_HOME: '/opt/cargo' }, { PATH: '/usr/bin' });

    expect(env).toEqual({
      CARGO_HOME: '/opt/cargo',
      path: 'crates/core',
      cargo_home: '/tmp/cargo',
      LANE_ID: 'linux-stable',
      LANE_IMAGE: 'ubuntu-latest',
    });
  });

  it('reports a command that cannot be spawned as an infrastructure failure', async () => {
    const runner = new FakeCommandRunner((command) =>
      command === 'cargo clippy --all' ? { spawnError: 'spawn /bin/sh ENOENT' } : undefined,
    );

    const result = await new StageExecutorService(runner).runLane(lane, STAGES);

    expect(result.status).toBe('failed');
    expect(result.failureKind).toBe('infrastructure');
    expect(result.stages[1]).toMatchObject({ name: 'lint', status: 'failed', exitCode: null, failureKind: 'infrastructure' });
    expect(result.stages).toHaveLength(2);
  });

  it('keeps going past a stage that tolerates failure, but the lane still fails', async () => {
    const stages = [STAGES[0], { ...STAGES[1], continueOnFailure: true }, STAGES[2], STAGES[3]];
    const runner = new FakeCommandRunner((command) =>
      command === 'cargo clippy --all' ? { exitCode: 3 } : undefined,
    );

    const result = await new StageExecutorService(runner).runLane(lane, stages);

    expect(statuses(result.stages)).toEqual([
      ['build', 'success'],
      ['lint', 'failed'],
      ['test', 'success'],
      ['docs', 'success'],
    ]);
    expect(result.status).toBe('failed');
    expect(result.failureKind).toBe('stage');
  });

  it('stops even a tolerant stage when the failure is infrastructure', async () => {
    const stages = [{ ...STAGES[0], continueOnFailure: true }, STAGES[1]];
    const runner = new FakeCommandRunner(() => ({ spawnError: 'EAGAIN' }));

    const result = await new StageExecutorService(runner).runLane(lane, stages);

    expect(statuses(result.stages)).toEqual([['build', 'failed']]);
    expect(result.failureKind).toBe('infrastructure');
  });

  it('reports the interrupted stage cancelled and the rest skipped', async () => {
    const controller = new AbortController();
    const runner = new FakeCommandRunner((command) => {
      if (command !== 'cargo test --all') return undefined;
      controller.abort();
      return { hang: true };
    });

    const result = await new StageExecutorService(runner).runLane(lane, STAGES, { signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.failureKind).toBeUndefined();
    expect(statuses(result.stages)).toEqual([
      ['build', 'success'],
      ['lint', 'success'],
      ['test', 'cancelled'],
      ['docs', 'skipped'],
    ]);
    expect(result.stages[2].exitCode).toBeNull();
    expect(result.stages[3]).toMatchObject({ stageIndex: 3, startedAt: null, completedAt: null, output: '' });
  });

  it('skips every stage when cancelled before the lane starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new FakeCommandRunner();

    const result = await new StageExecutorService(runner).runLane(lane, STAGES, { signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.stages.map((s) => s.status)).toEqual(['skipped', 'skipped', 'skipped', 'skipped']);
    expect(runner.calls).toHaveLength(0);
  });

  it('hands every result to onStageFinished in order, skipped ones included', async () => {
    const controller = new AbortController();
    const runner = new FakeCommandRunner((command) => {
      if (command !== 'cargo clippy --all') return undefined;
      controller.abort();
      return { hang: true };
    });
    const finished: string[] = [];

    await new StageExecutorService(runner).runLane(lane, STAGES, {
      signal: controller.signal,
      onStageFinished: (result) => {
        finished.push(`${result.stageIndex}:${result.status}`);
      },
    });

    expect(finished).toEqual(['0:success', '1:cancelled', '2:skipped', '3:skipped']);
  });
});
