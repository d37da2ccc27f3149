import { Controller, Param, ParseUUIDPipe, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogStreamService, type LogStreamEvent } from './log-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly logStream: LogStreamService) {}

  /**
   * SSE endpoint for real-time logs of a lane.
   * GET /stream/logs/:laneId - clients receive log lines as they are appended.
   */
  @Sse('logs/:laneId')
  @ApiOperation({ summary: 'SSE: real-time logs for a lane' })
  streamLaneLogs(
    @Param('laneId', ParseUUIDPipe) laneId: string,
  ): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStreamForLane(laneId).pipe(map((ev) => ({ data: ev })));
  }

  /**
   * SSE endpoint for all log events (every lane of every run).
   */
  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time logs for all lanes' })
  streamAllLogs(): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStream().pipe(map((ev) => ({ data: ev })));
  }
}
