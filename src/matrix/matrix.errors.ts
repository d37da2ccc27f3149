/**
 * Configuration errors. All of them are raised before any lane exists,
 * so a run that hits one is rejected with nothing enqueued.
 */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyMatrixError extends PipelineConfigError {
  constructor(detail = 'matrix declares no axes') {
    super(`Nothing to run: ${detail}`);
  }
}

export class DuplicateLaneError extends PipelineConfigError {
  constructor(
    readonly axis: string,
    readonly label: string,
  ) {
    super(`Axis '${axis}' declares entry '${label}' more than once`);
  }
}

export class DuplicateVariableError extends PipelineConfigError {
  constructor(
    readonly variable: string,
    readonly axes: [string, string],
  ) {
    super(`Variable '${variable}' is bound by both axis '${axes[0]}' and axis '${axes[1]}'`);
  }
}

export class InvalidPipelineConfigError extends PipelineConfigError {
  constructor(readonly issues: string[]) {
    super(`Invalid pipeline config: ${issues.join('; ')}`);
  }
}
