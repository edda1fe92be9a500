import type { RunReport, RunStatus, StepResult, StepStatus } from '../sequencer/types.js';

export function countResults(results: readonly StepResult[]): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = { succeeded: 0, failed: 0, skipped: 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}

/** A run fails iff a step that is not best-effort failed, or the run was interrupted */
export function deriveRunStatus(results: readonly StepResult[], interrupted = false): RunStatus {
  if (interrupted) return 'failed';
  return results.some((r) => r.status === 'failed' && !r.continue_on_error) ? 'failed' : 'succeeded';
}

export function buildRunReport(input: {
  pipeline: string;
  results: StepResult[];
  startedAt: Date;
  endedAt: Date;
  interrupted?: boolean;
}): RunReport {
  const interrupted = input.interrupted ?? false;
  return {
    pipeline: input.pipeline,
    status: deriveRunStatus(input.results, interrupted),
    interrupted,
    started_at: input.startedAt.toISOString(),
    ended_at: input.endedAt.toISOString(),
    duration_ms: input.endedAt.getTime() - input.startedAt.getTime(),
    counts: countResults(input.results),
    results: input.results,
  };
}

/** Failed steps that did not halt the run */
export function bestEffortFailures(report: RunReport): StepResult[] {
  return report.results.filter((r) => r.status === 'failed' && r.continue_on_error);
}
