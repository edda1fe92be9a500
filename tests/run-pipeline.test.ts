import { describe, it, expect, beforeEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { testContext } from './helpers/test-context.js';
import { runPipeline, selectSteps } from '../src/runner/run-pipeline.js';
import { resetEventSequence } from '../src/report/ledger.js';
import { loadRunReport, reportPath, eventsPath } from '../src/report/store.js';
import { ConfigurationError } from '../src/lib/errors.js';
import type { ActionExecutor } from '../src/actions/types.js';
import type { Step } from '../src/pipeline/types.js';

const ctx = testContext();

const PIPELINE = `
name: helpdesk-test
env:
  APP_ENV: test
steps:
  - id: install
    run: install
  - id: migrate
    run: migrate
  - id: load-fixtures
    run: load-fixtures
  - id: build-image
    run: build-image
`;

function writePipeline(content: string): { dir: string; file: string } {
  const dir = ctx.createTempDir();
  const file = join(dir, 'pipeline.yaml');
  writeFileSync(file, content);
  return { dir, file };
}

/** Fails the steps named in `failing`, succeeds everything else */
function scriptedExecutor(failing: string[] = []): { executor: ActionExecutor; seenEnv: Record<string, string>[] } {
  const seenEnv: Record<string, string>[] = [];
  const executor: ActionExecutor = async (action, actionCtx) => {
    seenEnv.push(actionCtx.env);
    const id = action.kind === 'shell' ? action.script : '';
    return failing.includes(id)
      ? { ok: false, signal: { type: 'non_zero_exit', code: 2, message: 'exited with code 2' }, output: '' }
      : { ok: true, signal: { type: 'exit', code: 0 }, output: '' };
  };
  return { executor, seenEnv };
}

beforeEach(() => {
  resetEventSequence();
});

describe('runPipeline', () => {
  it('runs a pipeline file and persists report and events', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    const { executor } = scriptedExecutor(['load-fixtures']);

    const { report, pipeline } = await runPipeline({ configFile: file, executor, stateCwd: dir });

    expect(pipeline.name).toBe('helpdesk-test');
    expect(report.results.map((r) => r.status)).toEqual(['succeeded', 'succeeded', 'failed', 'skipped']);
    expect(report.status).toBe('failed');

    expect(loadRunReport(reportPath('helpdesk-test', dir))).toEqual(report);

    const events = readFileSync(eventsPath('helpdesk-test', dir), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => (JSON.parse(line) as { type: string }).type);
    expect(events).toEqual([
      'run:start',
      'step:succeeded',
      'step:succeeded',
      'step:failed',
      'step:skipped',
      'run:finished',
    ]);
  });

  it('merges pipeline env over the given env', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    const { executor, seenEnv } = scriptedExecutor();

    await runPipeline({ configFile: file, executor, stateCwd: dir, env: { APP_ENV: 'prod', HOME: '/home/ci' } });

    expect(seenEnv[0]).toEqual({ APP_ENV: 'test', HOME: '/home/ci' });
  });

  it('writes nothing under .stepseq when persistence is off', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    const { executor } = scriptedExecutor();

    const { report } = await runPipeline({ configFile: file, executor, stateCwd: dir, persist: false });

    expect(report.status).toBe('succeeded');
    expect(existsSync(join(dir, '.stepseq'))).toBe(false);
  });

  it('writes an extra report file on request', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    const { executor } = scriptedExecutor();
    const extra = join(dir, 'out', 'report.json');

    const { report } = await runPipeline({ configFile: file, executor, stateCwd: dir, persist: false, reportFile: extra });

    expect(loadRunReport(extra)).toEqual(report);
  });

  it('restricts the run to selected steps', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    const { executor } = scriptedExecutor();

    const { report } = await runPipeline({ configFile: file, executor, stateCwd: dir, only: ['migrate', 'build-image'] });

    expect(report.results.map((r) => r.id)).toEqual(['migrate', 'build-image']);
  });

  it('applies the timeout override to every step without its own', async () => {
    const { dir, file } = writePipeline(
      'name: timed\ntimeout_sec: 100\nsteps:\n  - id: a\n    run: a\n  - id: b\n    run: b\n    timeout_sec: 7',
    );
    const seen: Array<number | undefined> = [];
    const executor: ActionExecutor = async (_action, actionCtx) => {
      seen.push(actionCtx.timeoutSec);
      return { ok: true, signal: { type: 'exit', code: 0 }, output: '' };
    };

    await runPipeline({ configFile: file, executor, stateCwd: dir, persist: false });
    await runPipeline({ configFile: file, executor, stateCwd: dir, persist: false, timeoutSec: 20 });

    expect(seen).toEqual([100, 7, 20, 7]);
  });

  it('runs real commands end to end', async () => {
    const { dir, file } = writePipeline(`
name: node-steps
steps:
  - id: greet
    command: ["\${{ env.NODE_BIN }}", "-e", "process.stdout.write('hi')"]
  - id: flaky
    command: ["\${{ env.NODE_BIN }}", "-e", "process.exit(5)"]
    continue_on_error: true
  - id: finish
    command: ["\${{ env.NODE_BIN }}", "-e", "process.exit(0)"]
`);

    const { report } = await runPipeline({
      configFile: file,
      stateCwd: dir,
      persist: false,
      env: { NODE_BIN: process.execPath },
    });

    expect(report.results.map((r) => r.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(report.results[0]?.output).toBe('hi');
    expect(report.results[1]?.signal).toEqual({ type: 'non_zero_exit', code: 5, message: 'exited with code 5' });
    expect(report.status).toBe('succeeded');
  });

  it('masks secrets substituted into pipeline and step env', async () => {
    const { dir, file } = writePipeline(`
name: secret-env
env:
  TOKEN: "\${{ secrets.API_TOKEN }}"
steps:
  - id: login
    command: ["\${{ env.NODE_BIN }}", "-e", "process.stdout.write(process.env.PW + ' ' + process.env.TOKEN)"]
    env:
      PW: "\${{ secrets.REGISTRY_PASSWORD }}"
`);

    const { report } = await runPipeline({
      configFile: file,
      stateCwd: dir,
      persist: false,
      env: { NODE_BIN: process.execPath, API_TOKEN: 'test-token', REGISTRY_PASSWORD: 'test-password' },
    });

    expect(report.results[0]?.status).toBe('succeeded');
    expect(report.results[0]?.output).toBe('*** ***');
  });

  it('finishes the run when the event log cannot be written', async () => {
    const { dir, file } = writePipeline(PIPELINE);
    mkdirSync(eventsPath('helpdesk-test', dir), { recursive: true });
    const { executor } = scriptedExecutor();

    const { report } = await runPipeline({ configFile: file, executor, stateCwd: dir });

    expect(report.results.map((r) => r.status)).toEqual(['succeeded', 'succeeded', 'succeeded', 'succeeded']);
    expect(loadRunReport(reportPath('helpdesk-test', dir))).toEqual(report);
  });
});

describe('selectSteps', () => {
  const steps: Step[] = ['a', 'b', 'c'].map((id, order) => ({
    id,
    order,
    action: { kind: 'shell', script: id },
    continue_on_error: false,
    env: {},
  }));

  it('returns every step without a filter', () => {
    expect(selectSteps(steps, undefined)).toBe(steps);
    expect(selectSteps(steps, [])).toBe(steps);
  });

  it('keeps file order of the selected steps', () => {
    expect(selectSteps(steps, ['c', 'a']).map((s) => s.id)).toEqual(['a', 'c']);
  });

  it('rejects unknown step ids', () => {
    expect(() => selectSteps(steps, ['a', 'zz'])).toThrow(ConfigurationError);
    expect(() => selectSteps(steps, ['zz', 'yy'])).toThrow('unknown step ids: zz, yy');
  });
});
