import { readFileSync, readdirSync, existsSync } from 'fs';
import { join, extname, basename } from 'path';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import { InvalidPipelineConfigError } from '../../matrix/matrix.errors';
import { parsePipelineConfig, type PipelineConfig } from '../../queue/dto/pipeline.dto';

/**
 * Pipeline definition file (YAML).
 *
 * ```yaml
 * name: build-verification
 * repository: example/app        # matched against git webhook payloads
 * pipeline:
 *   matrix: [...]
 *   stages: [...]
 * ```
 */
export interface PipelineDefinition {
  name: string;
  repository: string;
  config: PipelineConfig;
  source: string;
}

const DefinitionFileSchema = z.object({
  name: z.string().min(1).optional(),
  repository: z.string().min(1),
  pipeline: z.unknown(),
});

const DEFINITION_EXTENSIONS = new Set(['.yml', '.yaml']);

export function parsePipelineDefinition(text: string, source: string): PipelineDefinition {
  const file = DefinitionFileSchema.safeParse(parseYAML(text));
  if (!file.success) {
    throw new InvalidPipelineConfigError(
      file.error.issues.map((issue) => `${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return {
    name: file.data.name ?? basename(source, extname(source)),
    repository: file.data.repository,
    config: parsePipelineConfig(file.data.pipeline),
    source,
  };
}

export function loadPipelineDefinition(path: string): PipelineDefinition {
  return parsePipelineDefinition(readFileSync(path, 'utf-8'), path);
}

/**
 * Every *.yml / *.yaml in dir, sorted by file name. Missing dir -> none.
 */
export function loadPipelineDefinitions(dir: string): PipelineDefinition[] {
  if (!existsSync(dir)) return [];

  return readdirSync(dir)
    .filter((file) => DEFINITION_EXTENSIONS.has(extname(file)))
    .sort()
    .map((file) => loadPipelineDefinition(join(dir, file)));
}
