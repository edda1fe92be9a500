import { resolve } from 'node:path';
import type { Step, StepCondition } from '../pipeline/types.js';
import { expandVariables } from '../pipeline/variables.js';
import type { ActionOutcome } from '../actions/types.js';
import { ConfigurationError } from '../lib/errors.js';
import { maskSecrets } from '../lib/utils/mask.js';
import { debug } from '../lib/utils/debug.js';
import { buildRunReport } from '../report/build.js';
import type { RunOptions, RunReport, StepResult } from './types.js';

// ── Validation ──

/** Reject step lists that cannot be run. Throws ConfigurationError. */
export function validateSteps(steps: readonly Step[]): void {
  if (steps.length === 0) {
    throw new ConfigurationError('step list is empty', 'Add at least one step to the pipeline');
  }

  const ids = new Set<string>();
  const orders = new Map<number, string>();
  for (const step of steps) {
    if (ids.has(step.id)) {
      throw new ConfigurationError(`duplicate step id: "${step.id}"`);
    }
    ids.add(step.id);

    if (!Number.isFinite(step.order)) {
      throw new ConfigurationError(`step "${step.id}": order must be a finite number`);
    }
    const other = orders.get(step.order);
    if (other !== undefined) {
      throw new ConfigurationError(
        `step "${step.id}": order ${step.order} is already used by "${other}"`,
        'Ordering indices must be distinct',
      );
    }
    orders.set(step.order, step.id);
  }
}

// ── Environment ──

/**
 * Merge step env over the base env. Step values may reference the base env;
 * values substituted for `secrets.*` markers are pushed onto `secrets`.
 */
export function stepEnvironment(
  base: Readonly<Record<string, string | undefined>>,
  step: Pick<Step, 'env'>,
  secrets?: string[],
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  for (const [key, value] of Object.entries(step.env)) {
    env[key] = expandVariables(value, base, secrets);
  }
  return env;
}

/** A condition holds when the variable is set, non-empty and (optionally) equal */
export function conditionHolds(
  condition: StepCondition | undefined,
  env: Readonly<Record<string, string>>,
): boolean {
  if (!condition) return true;
  const value = env[condition.env];
  if (value === undefined || value === '') return false;
  return condition.equals === undefined || value === condition.equals;
}

// ── Run ──

/**
 * Execute steps one at a time in ascending `order`.
 *
 * A failing step halts the run and marks every later step `skipped`, unless
 * it is best-effort (`continue_on_error`). The report holds exactly one
 * result per input step, in input order.
 */
export async function runSteps(steps: readonly Step[], options: RunOptions): Promise<RunReport> {
  validateSteps(steps);

  const now = options.now ?? (() => new Date());
  const baseEnv = options.env ?? process.env;
  const baseCwd = options.cwd ?? process.cwd();
  const secrets = options.secrets ?? [];
  const ordered = [...steps].sort((a, b) => a.order - b.order);
  const resultsById = new Map<string, StepResult>();
  const runStartedAt = now();

  let haltReason: string | null = null;
  let interrupted = false;

  const record = (step: Step, result: StepResult): void => {
    resultsById.set(step.id, result);
    options.onStepFinish?.(step, result);
  };

  const skip = (step: Step, reason: string): StepResult => {
    const at = now().toISOString();
    return {
      id: step.id,
      status: 'skipped',
      continue_on_error: step.continue_on_error,
      signal: { type: 'not_run', reason },
      started_at: at,
      ended_at: at,
      duration_ms: 0,
      skip_reason: reason,
    };
  };

  for (const step of ordered) {
    if (haltReason === null && options.shouldStop?.()) {
      haltReason = 'run interrupted';
      interrupted = true;
    }

    if (haltReason !== null) {
      record(step, skip(step, haltReason));
      continue;
    }

    const stepSecrets = [...secrets];
    const env = stepEnvironment(baseEnv, step, stepSecrets);
    if (!conditionHolds(step.when, env)) {
      debug('sequencer', `step "${step.id}" condition not met`);
      record(step, skip(step, 'condition not met'));
      continue;
    }

    options.onStepStart?.(step);
    const startedAt = now();
    const outcome = await invoke(step, env, resolve(baseCwd, step.cwd ?? '.'), options, stepSecrets);
    const endedAt = now();

    const result: StepResult = {
      id: step.id,
      status: outcome.ok ? 'succeeded' : 'failed',
      continue_on_error: step.continue_on_error,
      signal: outcome.signal,
      started_at: startedAt.toISOString(),
      ended_at: endedAt.toISOString(),
      duration_ms: endedAt.getTime() - startedAt.getTime(),
    };
    if (outcome.output) result.output = outcome.output;
    record(step, result);

    if (!outcome.ok) {
      debug('sequencer', `step "${step.id}" failed: ${outcome.signal.type}`);
      if (!step.continue_on_error) {
        haltReason = `skipped after "${step.id}" failed`;
      }
    }
  }

  const results = steps.map(
    (step) => resultsById.get(step.id) ?? skip(step, haltReason ?? 'not reached'),
  );

  return buildRunReport({
    pipeline: options.pipeline ?? 'pipeline',
    results,
    startedAt: runStartedAt,
    endedAt: now(),
    interrupted,
  });
}

async function invoke(
  step: Step,
  env: Record<string, string>,
  cwd: string,
  options: RunOptions,
  secrets: readonly string[],
): Promise<ActionOutcome> {
  try {
    return await options.executor(step.action, {
      cwd,
      env,
      timeoutSec: step.timeout_sec ?? options.defaultTimeoutSec,
      signal: options.signal,
      secrets,
    });
  } catch (err) {
    // Executors report failures through the outcome; a throw means the action never started
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      signal: { type: 'execution_error', message: maskSecrets(message, secrets) },
      output: '',
    };
  }
}
