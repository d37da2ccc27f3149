import { Module } from '@nestjs/common';
import { HeartbeatService } from './heartbeat.service';
import { LaneQueueService } from '../queue/lane-queue.service';
import { LaneRunnerService } from './lane-runner.service';
import { LaneClaimerService } from './lane-claimer.service';
import { WorkerService } from './worker.service';
import { ExecutorModule } from '../executor/executor.module';
import { StreamingModule } from '../streaming/streaming.module';

@Module({
  imports: [ExecutorModule, StreamingModule],
  providers: [HeartbeatService, LaneQueueService, LaneRunnerService, LaneClaimerService, WorkerService],
  exports: [HeartbeatService, LaneQueueService, LaneRunnerService, LaneClaimerService],
})
export class WorkerModule {}
