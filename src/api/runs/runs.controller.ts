import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  NotFoundException,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RunsService } from './runs.service';
import { TriggerRunDto } from '../../dto/trigger-run.dto';
import { withConfigErrorsAsBadRequest } from '../http-errors';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  // Logs for a lane (must be before :id routes)
  @Get(':runId/lanes/:laneId/logs')
  @ApiOperation({ summary: 'Get log lines for a lane' })
  async getLaneLogs(
    @Param('runId', ParseUUIDPipe) runId: string,
    @Param('laneId', ParseUUIDPipe) laneId: string,
  ) {
    return this.runsService.getLaneLogs(runId, laneId);
  }

  @Post(':runId/lanes/:laneId/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Cancel one lane; remaining stages are reported skipped' })
  async cancelLane(
    @Param('runId', ParseUUIDPipe) runId: string,
    @Param('laneId', ParseUUIDPipe) laneId: string,
  ) {
    return this.runsService.cancelLane(runId, laneId);
  }

  // Run with its lanes and stage results (status view)
  @Get(':id/lanes')
  @ApiOperation({ summary: 'Get a run with its lanes and stage results' })
  async findOneWithLanes(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.runsService.findOneWithLanes(id);
    if (!result) throw new NotFoundException('Run not found');
    return result;
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Cancel every unfinished lane of a run' })
  async cancel(@Param('id', ParseUUIDPipe) id: string) {
    return this.runsService.cancelRun(id);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  // trigger a pipeline run
  @Post()
  @ApiOperation({ summary: 'Trigger a pipeline run (manual); expands the matrix into lanes' })
  async trigger(@Body() body: TriggerRunDto) {
    return withConfigErrorsAsBadRequest(() =>
      this.runsService.triggerRun(body.pipelineId, {
        triggerType: body.triggerType ?? 'manual',
        triggerMetadata: body.trigger_metadata ?? null,
        lanes: body.lanes,
      }),
    );
  }
}
