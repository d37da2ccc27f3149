import { Controller, Post, Body, BadRequestException, NotFoundException } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from '../runs/runs.service';
import { withConfigErrorsAsBadRequest } from '../http-errors';

const PushPayloadSchema = z.object({
  repo: z.string().optional(),
  // GitHub
  repository: z
    .object({ full_name: z.string().optional(), clone_url: z.string().optional() })
    .passthrough()
    .optional(),
  // GitLab
  project: z
    .object({ path_with_namespace: z.string().optional(), web_url: z.string().optional() })
    .passthrough()
    .optional(),
});

/**
 * Extract repo identifier from GitHub/GitLab-style webhook payloads.
 * Pipelines are matched by pipelines.repository (e.g. full URL or "owner/repo").
 */
export function getRepoFromPayload(body: unknown): string | null {
  const parsed = PushPayloadSchema.safeParse(body);
  if (!parsed.success) return null;
  const { repo, repository, project } = parsed.data;
  return (
    repo ??
    repository?.full_name ??
    repository?.clone_url ??
    project?.path_with_namespace ??
    project?.web_url ??
    null
  );
}

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly runsService: RunsService,
  ) {}

  /**
   * Receive Git push webhook (GitHub, GitLab, or any POST with repo/repository).
   * Resolves pipeline by repository and triggers a run over the full matrix.
   */
  @Post('push')
  @ApiOperation({ summary: 'Receive a git push webhook and trigger a run' })
  @ApiBody({
    description:
      'GitHub/GitLab push payload. We derive repo from repo/repository/project fields and store the full body in trigger_metadata.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(@Body() body: Record<string, unknown>) {
    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }

    const pipeline = await this.pipelinesService.findByRepository(repo);
    if (!pipeline) {
      throw new NotFoundException(`No pipeline found for repository: ${repo}`);
    }

    const run = await withConfigErrorsAsBadRequest(() =>
      this.runsService.triggerRun(pipeline.id, { triggerType: 'git_push', triggerMetadata: body }),
    );
    return { runId: run.runId, pipelineId: pipeline.id, status: run.status, lanes: run.lanes.length };
  }
}
