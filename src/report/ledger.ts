import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatDuration } from '../lib/utils/format.js';
import type { RunStatus } from '../sequencer/types.js';

// ── Event types ──

export type SequencerEvent =
  | {
      type: 'run:start';
      pipeline: string;
      step_count: number;
      config_file: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:succeeded';
      pipeline: string;
      step_id: string;
      duration_ms: number;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:failed';
      pipeline: string;
      step_id: string;
      duration_ms: number;
      error_type: string;
      continue_on_error: boolean;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:skipped';
      pipeline: string;
      step_id: string;
      skip_reason: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'run:finished';
      pipeline: string;
      status: RunStatus;
      duration_ms: number;
      steps_succeeded: number;
      steps_failed: number;
      steps_skipped: number;
      seq: number;
      ts: string;
    };

// ── Event writer ──

export interface EventWriterOptions {
  jsonLogPath: string;
}

let eventSequence = 0;

/** Reset sequence counter (for testing) */
export function resetEventSequence(): void {
  eventSequence = 0;
}

/** Distributive Omit for union types */
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type SequencerEventInput = DistributiveOmit<SequencerEvent, 'seq' | 'ts'>;

/** Append an event to the JSONL log */
export function recordEvent(options: EventWriterOptions, event: SequencerEventInput): SequencerEvent {
  const fullEvent = {
    ...event,
    seq: eventSequence++,
    ts: new Date().toISOString(),
  } as SequencerEvent;

  mkdirSync(dirname(options.jsonLogPath), { recursive: true });
  appendFileSync(options.jsonLogPath, JSON.stringify(fullEvent) + '\n');
  return fullEvent;
}

// ── Message formatting ──

export function formatEventMessage(event: SequencerEvent): string {
  switch (event.type) {
    case 'run:start':
      return `run:start ${event.pipeline} (${event.step_count} steps)`;

    case 'step:succeeded':
      return `step:succeeded ${event.pipeline}/${event.step_id} (${formatDuration(event.duration_ms)})`;

    case 'step:failed': {
      const note = event.continue_on_error ? ', best-effort' : '';
      return `step:failed ${event.pipeline}/${event.step_id} — ${event.error_type}${note}`;
    }

    case 'step:skipped':
      return `step:skipped ${event.pipeline}/${event.step_id} — ${event.skip_reason}`;

    case 'run:finished': {
      const parts = [`${event.steps_succeeded} succeeded`];
      if (event.steps_failed > 0) parts.push(`${event.steps_failed} failed`);
      if (event.steps_skipped > 0) parts.push(`${event.steps_skipped} skipped`);
      return `run:finished ${event.pipeline} ${event.status} (${formatDuration(event.duration_ms)}, ${parts.join(', ')})`;
    }
  }
}
