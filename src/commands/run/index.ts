import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadPipelineFile, toSteps, executionOrder } from '../../pipeline/parser.js';
import type { Step, StepAction } from '../../pipeline/types.js';
import { runPipeline, selectSteps } from '../../runner/run-pipeline.js';
import { installShutdownHandlers, isShuttingDown, setCurrentAbort } from '../../sequencer/shutdown.js';
import type { RunReport } from '../../sequencer/types.js';
import { bestEffortFailures } from '../../report/build.js';
import { formatResultLine } from '../../lib/ui/status.js';
import { formatDuration } from '../../lib/utils/format.js';

interface RunCommandOptions {
  config: string;
  dryRun?: boolean;
  json?: boolean;
  only?: string[];
  timeout?: number;
  report?: string;
  state: boolean;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive number of seconds');
  }
  return parsed;
}

export function describeAction(action: StepAction): string {
  switch (action.kind) {
    case 'shell': return action.script;
    case 'command': return action.argv.join(' ');
    case 'request': return `${action.method} ${action.url}`;
  }
}

function printDryRun(name: string, steps: Step[], json: boolean): void {
  const order = executionOrder(steps);
  const byId = new Map(steps.map((s) => [s.id, s]));

  if (json) {
    console.log(JSON.stringify({
      pipeline: name,
      steps: order.flatMap((id) => {
        const step = byId.get(id);
        return step ? [{
          id: step.id,
          order: step.order,
          kind: step.action.kind,
          continue_on_error: step.continue_on_error,
          timeout_sec: step.timeout_sec,
        }] : [];
      }),
      order,
      valid: true,
    }));
    return;
  }

  console.log(chalk.green(`✓ Pipeline "${name}" is valid`));
  console.log(`  ${steps.length} steps, execution order:`);
  order.forEach((id, i) => {
    const step = byId.get(id);
    if (!step) return;
    const flags = [
      step.continue_on_error ? 'best-effort' : null,
      step.timeout_sec !== undefined ? `timeout ${step.timeout_sec}s` : null,
      step.when ? `when ${step.when.env}${step.when.equals !== undefined ? `=${step.when.equals}` : ''}` : null,
    ].filter(Boolean);
    const suffix = flags.length > 0 ? chalk.dim(` (${flags.join(', ')})`) : '';
    console.log(`  ${chalk.cyan(`${i + 1}.`)} ${id.padEnd(20)} ${step.description ?? describeAction(step.action)}${suffix}`);
  });
}

function printSummary(report: RunReport): void {
  console.log('');
  console.log(chalk.dim('─'.repeat(50)));

  const { succeeded, failed, skipped } = report.counts;
  const duration = formatDuration(report.duration_ms);

  if (report.status === 'succeeded') {
    const ignored = bestEffortFailures(report).length;
    const note = ignored > 0 ? chalk.yellow(` (${ignored} best-effort failure${ignored > 1 ? 's' : ''})`) : '';
    console.log(chalk.green(`✓ Pipeline "${report.pipeline}" succeeded in ${duration}`) + note);
  } else {
    const reason = report.interrupted ? ' (interrupted)' : '';
    console.log(chalk.red(`✗ Pipeline "${report.pipeline}" failed${reason} after ${duration}`));
  }
  console.log(
    `  ${chalk.green(`${succeeded} succeeded`)} | ${chalk.red(`${failed} failed`)} | ${chalk.dim(`${skipped} skipped`)}`,
  );

  const failures = report.results.filter((r) => r.status === 'failed');
  if (failures.length > 0) {
    console.log('');
    console.log(chalk.red('Failed steps:'));
    const width = Math.max(...failures.map((r) => r.id.length));
    for (const r of failures) {
      console.log(formatResultLine(r, width));
      if (r.output) {
        const lastLines = r.output.trimEnd().split('\n').slice(-5);
        for (const line of lastLines) console.log(chalk.dim(`      ${line}`));
      }
    }
  }
}

export const runCommand = new Command('run')
  .description('Run the steps of a pipeline in order')
  .requiredOption('-c, --config <path>', 'Path to pipeline YAML file')
  .option('--dry-run', 'Parse and validate only, do not execute')
  .option('--json', 'Output the run report as JSON')
  .option('--only <ids...>', 'Run only these steps')
  .option('--timeout <sec>', 'Default per-step timeout in seconds', parseSeconds)
  .option('--report <path>', 'Also write the run report to this file')
  .option('--no-state', 'Do not record the report and event log under .stepseq/')
  .action(
    withErrorHandler(async (options: RunCommandOptions) => {
      const configFile = resolve(options.config);

      // --dry-run: validate only
      if (options.dryRun) {
        const pipeline = loadPipelineFile(configFile);
        const steps = selectSteps(toSteps(pipeline), options.only);
        printDryRun(pipeline.name, steps, options.json ?? false);
        return;
      }

      installShutdownHandlers();
      const abortController = new AbortController();
      setCurrentAbort(abortController);

      const json = options.json ?? false;
      const { report } = await runPipeline({
        configFile,
        only: options.only,
        timeoutSec: options.timeout,
        persist: options.state,
        reportFile: options.report,
        signal: abortController.signal,
        shouldStop: isShuttingDown,
        onStepStart: (step) => {
          if (!json) console.log(`${chalk.yellow('▶')} ${chalk.bold(step.id)}`);
        },
        onStepFinish: (_step, result) => {
          if (!json) console.log(formatResultLine(result));
        },
      });

      setCurrentAbort(null);

      if (json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printSummary(report);
      }

      process.exit(report.status === 'succeeded' ? 0 : 1);
    }),
  );
