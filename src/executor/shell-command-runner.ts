import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { spawn, type ChildProcess } from 'node:child_process';
import type { CommandOutcome, CommandRequest, CommandRunner } from './command-runner';
import { OutputLineSplitter } from './output-lines';

/** Captured output keeps only the tail beyond this many characters */
export const MAX_CAPTURED_OUTPUT = 1024 * 1024;

/** How long an aborted command gets between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = Symbol('KILL_GRACE_MS');
const DEFAULT_KILL_GRACE_MS = 5000;

const IS_WINDOWS = process.platform === 'win32';

/**
 * Runs each command through the platform shell in its own process group, so an
 * abort reaches whatever the command started.
 */
@Injectable()
export class ShellCommandRunner implements CommandRunner {
  private readonly logger = new Logger(ShellCommandRunner.name);

  constructor(
    @Optional()
    @Inject(KILL_GRACE_MS)
    private readonly killGraceMs: number = DEFAULT_KILL_GRACE_MS,
  ) {}

  async run(request: CommandRequest): Promise<CommandOutcome> {
    const { command, env, cwd, signal, onLine } = request;
    if (signal?.aborted) return { kind: 'aborted', output: '' };

    let output = '';
    const capture = (text: string) => {
      output += text;
      if (output.length > MAX_CAPTURED_OUTPUT) output = output.slice(-MAX_CAPTURED_OUTPUT);
    };

    return new Promise<CommandOutcome>((resolve) => {
      const child = spawn(command, {
        shell: true,
        cwd,
        env: { ...process.env, ...env },
        detached: !IS_WINDOWS,
      });

      const emit = (line: string, stream: 'stdout' | 'stderr') => onLine?.(line, stream);
      const stdout = new OutputLineSplitter('stdout', emit);
      const stderr = new OutputLineSplitter('stderr', emit);

      let killTimer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        this.signalGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => {
          this.logger.warn(`Command still running ${this.killGraceMs}ms after SIGTERM, sending SIGKILL`);
          this.signalGroup(child, 'SIGKILL');
        }, this.killGraceMs);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (chunk: Buffer) => capture(stdout.push(chunk)));
      child.stderr?.on('data', (chunk: Buffer) => capture(stderr.push(chunk)));

      let settled = false;
      const settle = (outcome: (captured: string) => CommandOutcome) => {
        if (settled) return;
        settled = true;
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        capture(stdout.end());
        capture(stderr.end());
        resolve(outcome(output));
      };

      child.on('close', (code) => {
        if (signal?.aborted) {
          settle((captured) => ({ kind: 'aborted', output: captured }));
          return;
        }
        settle((captured) => ({ kind: 'exited', exitCode: code ?? 1, output: captured }));
      });

      child.on('error', (error) => {
        settle((captured) => ({ kind: 'spawn-error', error, output: captured }));
      });
    });
  }

  private signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
    if (!IS_WINDOWS && child.pid !== undefined) {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (err) {
        this.logger.warn(
          `Could not send ${signal} to process group ${child.pid}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
    child.kill(signal);
  }
}
