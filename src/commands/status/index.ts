import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { listRunReports, loadRunReport, reportPath } from '../../report/store.js';
import { SequencerError, ErrorCode } from '../../lib/errors.js';
import { formatResultLine, statusIcon } from '../../lib/ui/status.js';
import { formatDuration } from '../../lib/utils/format.js';
import type { RunReport } from '../../sequencer/types.js';

function printReportSummary(reports: RunReport[]): void {
  if (reports.length === 0) {
    console.log(chalk.dim('No runs recorded.'));
    console.log(chalk.dim('  Run: stepseq run --config pipeline.yaml'));
    return;
  }

  console.log('Pipelines:');
  const nameWidth = Math.max(8, ...reports.map((r) => r.pipeline.length));
  for (const r of reports) {
    const finished = new Date(r.ended_at).toLocaleString();
    console.log(
      `  ${r.pipeline.padEnd(nameWidth)}  ${statusIcon(r.status)} ${r.status.padEnd(10)}  ${r.counts.succeeded}/${r.results.length} steps  ${formatDuration(r.duration_ms).padStart(7)}  ${chalk.dim(finished)}`,
    );
  }
}

function printReportDetail(report: RunReport): void {
  console.log(`Pipeline: ${chalk.bold(report.pipeline)} (${report.status}${report.interrupted ? ', interrupted' : ''})`);
  console.log(`Started: ${new Date(report.started_at).toLocaleString()}`);
  console.log('');

  const idWidth = Math.max(4, ...report.results.map((r) => r.id.length));
  for (const r of report.results) {
    console.log(formatResultLine(r, idWidth));
  }
}

export const statusCommand = new Command('status')
  .description('Show the last run report of each pipeline')
  .argument('[pipeline]', 'Pipeline name to show details for')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (pipeline: string | undefined, options: { json?: boolean }) => {
      if (pipeline) {
        const report = loadRunReport(reportPath(pipeline));
        if (!report) {
          throw new SequencerError(
            ErrorCode.REPORT_NOT_FOUND,
            `No run recorded for pipeline "${pipeline}"`,
            'Run: stepseq status (to list all pipelines)',
          );
        }

        if (options.json) {
          console.log(JSON.stringify(report));
          return;
        }

        printReportDetail(report);
        return;
      }

      const reports = listRunReports();

      if (options.json) {
        console.log(JSON.stringify(
          reports.map((r) => ({
            pipeline: r.pipeline,
            status: r.status,
            steps_succeeded: r.counts.succeeded,
            steps_total: r.results.length,
            ended_at: r.ended_at,
          })),
        ));
        return;
      }

      printReportSummary(reports);
    }),
  );
