import { summarizeRun, type LaneResult, type LaneStatus } from './executor.types';

const lane = (laneId: string, status: LaneStatus): LaneResult => ({ laneId, status, stages: [], durationMs: 0 });

describe('summarizeRun', () => {
  it('succeeds only when every lane succeeded', () => {
    expect(summarizeRun([lane('a', 'success'), lane('b', 'success')])).toBe('success');
  });

  it('fails when any lane failed, even alongside cancelled lanes', () => {
    expect(summarizeRun([lane('a', 'cancelled'), lane('b', 'failed'), lane('c', 'success')])).toBe('failed');
  });

  it('is cancelled when nothing failed but a lane was cancelled', () => {
    expect(summarizeRun([lane('a', 'success'), lane('b', 'cancelled')])).toBe('cancelled');
  });
});
