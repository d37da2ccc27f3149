import { Module } from '@nestjs/common';
import { LogStreamService } from './log-stream.service';
import { SSEController } from './sse.controller';

/** Lane log persistence (workers) and the SSE feed over it (API). */
@Module({
  controllers: [SSEController],
  providers: [LogStreamService],
  exports: [LogStreamService],
})
export class StreamingModule {}
