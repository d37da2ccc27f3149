import { z } from 'zod';
import { InvalidPipelineConfigError } from '../../matrix/matrix.errors';

/**
 * Pipeline config
 * Matrix axes, worker pool, toolchain provisioning, and the ordered stage list.
 * Stored in pipelines.config and snapshotted into pipeline_runs.config_snapshot.
 */

const LABEL_PATTERN = /^[A-Za-z0-9_.-]+$/;

// YAML turns `1.70` or `true` into numbers/booleans; bindings are always strings.
const VariableValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const EnvSchema = z.record(z.string().min(1), VariableValueSchema);

export const AxisEntrySchema = z
  .object({
    label: z.string().regex(LABEL_PATTERN, 'labels may only use letters, digits, "_", "." and "-"'),
    variables: z.record(z.string().min(1), VariableValueSchema),
  })
  .strict();

export const AxisSchema = z
  .object({
    name: z.string().min(1),
    entries: z.array(AxisEntrySchema),
  })
  .strict();

const CommandListSchema = z.array(z.string().trim().min(1)).min(1);

/** Node timers cannot wait longer than 2^31-1 ms */
export const MAX_TIMEOUT_SECONDS = Math.floor(2_147_483_647 / 1000);

const TimeoutSecondsSchema = z
  .number()
  .int()
  .positive()
  .max(MAX_TIMEOUT_SECONDS, `timeouts may not exceed ${MAX_TIMEOUT_SECONDS} seconds`)
  .optional();

export const StageSchema = z
  .object({
    name: z.string().min(1),
    /** One command per entry, run in order; all must exit 0 */
    commands: CommandListSchema.optional(),
    /** Alternative to commands: one command per non-empty line */
    script: z.string().optional(),
    env: EnvSchema.optional(),
    continueOnFailure: z.boolean().default(false),
  })
  .strict()
  .transform((stage, ctx) => {
    if (stage.commands !== undefined && stage.script !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `stage '${stage.name}' declares both commands and script`,
      });
      return z.NEVER;
    }

    const commands =
      stage.commands ??
      (stage.script ?? '')
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    if (commands.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `stage '${stage.name}' needs commands or a non-empty script`,
      });
      return z.NEVER;
    }

    return {
      name: stage.name,
      commands,
      env: stage.env ?? {},
      continueOnFailure: stage.continueOnFailure,
    };
  });

export const PipelineConfigSchema = z
  .object({
    matrix: z.array(AxisSchema),
    pool: z
      .object({ image: z.string().min(1) })
      .strict()
      .optional(),
    provision: z
      .object({
        name: z.string().min(1).default('provision toolchain'),
        commands: CommandListSchema,
      })
      .strict()
      .optional(),
    stages: z.array(StageSchema).min(1),
    env: EnvSchema.default({}),
    timeouts: z
      .object({
        laneSeconds: TimeoutSecondsSchema,
        runSeconds: TimeoutSecondsSchema,
      })
      .strict()
      .default({}),
    maxParallelLanes: z.number().int().positive().optional(),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type StageDefinition = z.infer<typeof StageSchema>;
export type ProvisionDefinition = NonNullable<PipelineConfig['provision']>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate a raw config (json body, jsonb column, parsed YAML).
 * @throws InvalidPipelineConfigError listing every schema issue
 */
export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidPipelineConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
