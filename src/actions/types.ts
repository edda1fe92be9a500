import type { StepAction } from '../pipeline/types.js';

/** Terminal signal of an action that ran to completion */
export interface ExitSignal {
  type: 'exit';
  code: number;
}

/** Failure signals captured per step. None of these aborts the process. */
export type FailureSignal =
  | { type: 'non_zero_exit'; code: number | null; message: string }
  | { type: 'timeout'; timeout_sec: number; message: string }
  | { type: 'execution_error'; message: string };

export interface NotRunSignal {
  type: 'not_run';
  reason: string;
}

export type StepSignal = ExitSignal | FailureSignal | NotRunSignal;

export type ActionOutcome =
  | { ok: true; signal: ExitSignal; output: string }
  | { ok: false; signal: FailureSignal; output: string };

export interface ActionContext {
  cwd: string;
  env: Record<string, string>;
  timeoutSec?: number;
  /** Aborting kills the running action */
  signal?: AbortSignal;
  /** Values masked in captured output */
  secrets: readonly string[];
}

/** Invokes one step action and reports how it ended. Never throws for action failures. */
export type ActionExecutor = (action: StepAction, ctx: ActionContext) => Promise<ActionOutcome>;
