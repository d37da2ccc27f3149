import { Module } from '@nestjs/common';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { ExecutorModule } from '../../executor/executor.module';
import { LaneQueueService } from '../../queue/lane-queue.service';

@Module({
  imports: [PipelinesModule, ExecutorModule],
  controllers: [RunsController],
  providers: [RunsService, LaneQueueService],
  exports: [RunsService],
})
export class RunsModule {}
