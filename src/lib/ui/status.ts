import chalk from 'chalk';
import type { StepResult } from '../../sequencer/types.js';
import type { StepSignal } from '../../actions/types.js';
import { formatDuration } from '../utils/format.js';

export function statusIcon(status: string): string {
  switch (status) {
    case 'succeeded': return chalk.green('✓');
    case 'running': return chalk.yellow('●');
    case 'failed': return chalk.red('✗');
    case 'skipped': return chalk.dim('⏭');
    default: return chalk.dim('?');
  }
}

/** Short description of how a step ended */
export function describeSignal(signal: StepSignal): string {
  switch (signal.type) {
    case 'exit': return `exit ${signal.code}`;
    case 'non_zero_exit': return signal.message;
    case 'timeout': return signal.message;
    case 'execution_error': return `could not run: ${signal.message}`;
    case 'not_run': return signal.reason;
  }
}

/** One line per step result: icon, id, status, duration and detail */
export function formatResultLine(result: StepResult, idWidth = result.id.length): string {
  const id = result.id.padEnd(idWidth);
  if (result.status === 'skipped') {
    return `  ${statusIcon(result.status)} ${id}  ${chalk.dim(`skipped (${result.skip_reason ?? describeSignal(result.signal)})`)}`;
  }

  const duration = chalk.dim(`(${formatDuration(result.duration_ms)})`);
  if (result.status === 'succeeded') {
    return `  ${statusIcon(result.status)} ${id}  succeeded ${duration}`;
  }

  const bestEffort = result.continue_on_error ? chalk.yellow(' [best-effort]') : '';
  return `  ${statusIcon(result.status)} ${id}  ${chalk.red('failed')} ${duration}${bestEffort}  ${describeSignal(result.signal)}`;
}
