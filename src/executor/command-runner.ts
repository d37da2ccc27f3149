/**
 * Port for "run a shell command, observe exit status and captured output".
 * The stage executor only ever talks to collaborator tools through this.
 */
export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

export type OutputStream = 'stdout' | 'stderr';

export interface CommandRequest {
  command: string;
  /** Added on top of the worker's own environment */
  env: Record<string, string>;
  cwd?: string;
  signal?: AbortSignal;
  onLine?: (line: string, stream: OutputStream) => void;
}

export type CommandOutcome =
  | { kind: 'exited'; exitCode: number; output: string }
  | { kind: 'aborted'; output: string }
  | { kind: 'spawn-error'; error: Error; output: string };

export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandOutcome>;
}
