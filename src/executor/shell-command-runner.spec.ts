import type { OutputStream } from './command-runner';
import { MAX_CAPTURED_OUTPUT, ShellCommandRunner } from './shell-command-runner';

/** Shell command running a node script; the script must not contain single quotes */
function node(script: string): string {
  return `"${process.execPath}" -e '${script}'`;
}

function recorder() {
  const lines: Array<[string, OutputStream]> = [];
  return {
    lines,
    onLine: (line: string, stream: OutputStream) => lines.push([line, stream]),
    of: (stream: OutputStream) => lines.filter(([, s]) => s === stream).map(([line]) => line),
  };
}

const describePosix = process.platform === 'win32' ? describe.skip : describe;

describePosix('ShellCommandRunner', () => {
  jest.setTimeout(15_000);

  const runner = new ShellCommandRunner(200);

  it('reports the exit code and streams each stream line by line', async () => {
    const out = recorder();

    const outcome = await runner.run({
      command: node('process.stdout.write("one\\ntwo\\n"); process.stderr.write("oops\\n"); process.exitCode = 3'),
      env: {},
      onLine: out.onLine,
    });

    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 3 });
    expect(outcome.output).toContain('one\ntwo\n');
    expect(outcome.output).toContain('oops\n');
    expect(out.of('stdout')).toEqual(['one', 'two']);
    expect(out.of('stderr')).toEqual(['oops']);
  });

  it('passes the lane environment and emits an unterminated last line', async () => {
    const out = recorder();

    const outcome = await runner.run({
      command: node('process.stdout.write(process.env.LANE_ID)'),
      env: { LANE_ID: 'linux/stable' },
      onLine: out.onLine,
    });

    expect(outcome).toEqual({ kind: 'exited', exitCode: 0, output: 'linux/stable' });
    expect(out.lines).toEqual([['linux/stable', 'stdout']]);
  });

  it('decodes a character whose bytes arrive in separate writes', async () => {
    const out = recorder();

    const outcome = await runner.run({
      command: node(
        'process.stdout.write(Buffer.from([0xe2, 0x82])); setTimeout(() => process.stdout.write(Buffer.from([0xac, 0x0a])), 50)',
      ),
      env: {},
      onLine: out.onLine,
    });

    expect(outcome).toEqual({ kind: 'exited', exitCode: 0, output: '€\n' });
    expect(out.lines).toEqual([['€', 'stdout']]);
  });

  it('keeps only the tail of oversized output', async () => {
    const outcome = await runner.run({
      command: node('process.stdout.write("a".repeat(524288) + "b".repeat(1048576))'),
      env: {},
    });

    expect(outcome.kind).toBe('exited');
    expect(outcome.output.length).toBe(MAX_CAPTURED_OUTPUT);
    expect(outcome.output).toBe('b'.repeat(MAX_CAPTURED_OUTPUT));
  });

  it('reports a missing working directory as a spawn error', async () => {
    const outcome = await runner.run({
      command: 'echo unreachable',
      env: {},
      cwd: '/nonexistent/lanes-ci-workdir',
    });

    expect(outcome.kind).toBe('spawn-error');
  });

  it('does not start a command whose signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const out = recorder();

    const outcome = await runner.run({ command: 'echo started', env: {}, signal: controller.signal, onLine: out.onLine });

    expect(outcome).toEqual({ kind: 'aborted', output: '' });
    expect(out.lines).toEqual([]);
  });

  it('terminates background processes the command started when aborted', async () => {
    const controller = new AbortController();

    const outcome = await runner.run({
      command: `${node('process.stdout.write("ready\\n"); setInterval(() => {}, 1000)')} & wait`,
      env: {},
      signal: controller.signal,
      onLine: (line) => {
        if (line === 'ready') controller.abort();
      },
    });

    expect(outcome).toEqual({ kind: 'aborted', output: 'ready\n' });
  });

  it('kills a command that ignores SIGTERM once the grace period ends', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const outcome = await runner.run({
      command: node('process.on("SIGTERM", () => {}); process.stdout.write("ready\\n"); setInterval(() => {}, 1000)'),
      env: {},
      signal: controller.signal,
      onLine: (line) => {
        if (line === 'ready') controller.abort();
      },
    });

    expect(outcome).toEqual({ kind: 'aborted', output: 'ready\n' });
    expect(Date.now() - startedAt).toBeLessThan(10_000);
  });
});
