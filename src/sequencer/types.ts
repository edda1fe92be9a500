import type { Step } from '../pipeline/types.js';
import type { ActionExecutor, StepSignal } from '../actions/types.js';

export type StepStatus = 'succeeded' | 'failed' | 'skipped';
export type RunStatus = 'succeeded' | 'failed';

export interface StepResult {
  id: string;
  status: StepStatus;
  continue_on_error: boolean;
  signal: StepSignal;
  started_at: string;
  ended_at: string;
  duration_ms: number;
  output?: string;
  skip_reason?: string;
}

export interface RunReport {
  pipeline: string;
  status: RunStatus;
  interrupted: boolean;
  started_at: string;
  ended_at: string;
  duration_ms: number;
  counts: Record<StepStatus, number>;
  results: StepResult[];
}

export interface RunOptions {
  executor: ActionExecutor;
  /** Name recorded in the report */
  pipeline?: string;
  /** Base directory for step `cwd` values */
  cwd?: string;
  /** Base environment; step `env` is merged over it */
  env?: Readonly<Record<string, string | undefined>>;
  /** Applied to steps without their own `timeout_sec` */
  defaultTimeoutSec?: number;
  /** Extra values to mask in captured output */
  secrets?: readonly string[];
  /** Aborting kills the running step */
  signal?: AbortSignal;
  /** Checked between steps; true skips the remaining steps */
  shouldStop?: () => boolean;
  onStepStart?: (step: Step) => void;
  onStepFinish?: (step: Step, result: StepResult) => void;
  now?: () => Date;
}
