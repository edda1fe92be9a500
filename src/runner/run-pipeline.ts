import { resolve } from 'node:path';
import { loadPipelineFile, pipelineCwd, toSteps } from '../pipeline/parser.js';
import type { Pipeline, Step } from '../pipeline/types.js';
import { expandVariables } from '../pipeline/variables.js';
import { createActionExecutor } from '../actions/executor.js';
import type { ActionExecutor } from '../actions/types.js';
import { runSteps } from '../sequencer/sequencer.js';
import type { RunReport, StepResult } from '../sequencer/types.js';
import { saveRunReport, reportPath, eventsPath } from '../report/store.js';
import { recordEvent, formatEventMessage, type EventWriterOptions, type SequencerEventInput } from '../report/ledger.js';
import { ConfigurationError } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';

export interface RunPipelineOptions {
  configFile: string;
  /** Restrict the run to these step ids */
  only?: string[];
  /** Default per-step timeout, overriding the file's `timeout_sec` */
  timeoutSec?: number;
  /** Directory holding `.stepseq/` state; defaults to the process cwd */
  stateCwd?: string;
  /** Persist the report and event log */
  persist?: boolean;
  /** Additional report destination */
  reportFile?: string;
  env?: Readonly<Record<string, string | undefined>>;
  executor?: ActionExecutor;
  signal?: AbortSignal;
  shouldStop?: () => boolean;
  onStepStart?: (step: Step) => void;
  onStepFinish?: (step: Step, result: StepResult) => void;
}

export interface RunPipelineResult {
  pipeline: Pipeline;
  steps: Step[];
  report: RunReport;
}

/** Apply `--only` filtering. Unknown ids are a configuration error. */
export function selectSteps(steps: Step[], only: string[] | undefined): Step[] {
  if (!only || only.length === 0) return steps;

  const known = new Set(steps.map((s) => s.id));
  const unknown = only.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `unknown step id${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`,
      `Available steps: ${[...known].join(', ')}`,
    );
  }

  const wanted = new Set(only);
  return steps.filter((s) => wanted.has(s.id));
}

/** Load a pipeline file, run its steps and persist the outcome */
export async function runPipeline(options: RunPipelineOptions): Promise<RunPipelineResult> {
  const configFile = resolve(options.configFile);
  const pipeline = loadPipelineFile(configFile);
  const steps = selectSteps(toSteps(pipeline), options.only);
  const persist = options.persist ?? true;
  const processEnv = options.env ?? process.env;
  const secrets: string[] = [];
  const pipelineEnv = Object.fromEntries(
    Object.entries(pipeline.env).map(([key, value]) => [key, expandVariables(value, processEnv, secrets)]),
  );
  const baseEnv = { ...processEnv, ...pipelineEnv };

  const eventOpts: EventWriterOptions = {
    jsonLogPath: eventsPath(pipeline.name, options.stateCwd),
  };
  const log = (event: SequencerEventInput): void => {
    if (!persist) return;
    // The event log is advisory; a failed append must not cut the run short
    try {
      const full = recordEvent(eventOpts, event);
      debug('events', `#${full.seq} ${formatEventMessage(full)}`);
    } catch (err) {
      debug('events', `could not record ${event.type}: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  log({
    type: 'run:start',
    pipeline: pipeline.name,
    step_count: steps.length,
    config_file: configFile,
  });

  const report = await runSteps(steps, {
    executor: options.executor ?? createActionExecutor(),
    pipeline: pipeline.name,
    cwd: pipelineCwd(pipeline, configFile),
    env: baseEnv,
    secrets,
    defaultTimeoutSec: options.timeoutSec ?? pipeline.timeout_sec,
    signal: options.signal,
    shouldStop: options.shouldStop,
    onStepStart: options.onStepStart,
    onStepFinish: (step, result) => {
      if (result.status === 'succeeded') {
        log({
          type: 'step:succeeded',
          pipeline: pipeline.name,
          step_id: step.id,
          duration_ms: result.duration_ms,
        });
      } else if (result.status === 'failed') {
        log({
          type: 'step:failed',
          pipeline: pipeline.name,
          step_id: step.id,
          duration_ms: result.duration_ms,
          error_type: result.signal.type,
          continue_on_error: step.continue_on_error,
        });
      } else {
        log({
          type: 'step:skipped',
          pipeline: pipeline.name,
          step_id: step.id,
          skip_reason: result.skip_reason ?? 'skipped',
        });
      }
      options.onStepFinish?.(step, result);
    },
  });

  log({
    type: 'run:finished',
    pipeline: pipeline.name,
    status: report.status,
    duration_ms: report.duration_ms,
    steps_succeeded: report.counts.succeeded,
    steps_failed: report.counts.failed,
    steps_skipped: report.counts.skipped,
  });

  if (persist) {
    saveRunReport(report, reportPath(pipeline.name, options.stateCwd));
  }
  if (options.reportFile) {
    saveRunReport(report, resolve(options.reportFile));
  }

  return { pipeline, steps, report };
}
