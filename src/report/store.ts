import { writeFileSync, readFileSync, renameSync, mkdirSync, existsSync, readdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { RunReport } from '../sequencer/types.js';

// ── State directory ──

export function stateDir(pipeline: string, cwd = '.'): string {
  return resolve(cwd, '.stepseq', pipeline);
}

export function reportPath(pipeline: string, cwd?: string): string {
  return resolve(stateDir(pipeline, cwd), 'last-report.json');
}

export function eventsPath(pipeline: string, cwd?: string): string {
  return resolve(stateDir(pipeline, cwd), 'events.jsonl');
}

// ── Persistence (atomic write) ──

export function saveRunReport(report: RunReport, path?: string): string {
  const target = path ?? reportPath(report.pipeline);
  mkdirSync(dirname(target), { recursive: true });
  const json = JSON.stringify(report, null, 2) + '\n';
  const tmp = `${target}.tmp`;
  writeFileSync(tmp, json);
  renameSync(tmp, target);
  return target;
}

function isRunReport(value: unknown): value is RunReport {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pipeline' in value &&
    typeof value.pipeline === 'string' &&
    'results' in value &&
    Array.isArray(value.results)
  );
}

export function loadRunReport(path: string): RunReport | null {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRunReport(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// ── Report scanning ──

/** List the last report of every pipeline under the state directory */
export function listRunReports(cwd?: string): RunReport[] {
  const baseDir = resolve(cwd ?? '.', '.stepseq');
  if (!existsSync(baseDir)) return [];

  const reports: RunReport[] = [];
  for (const entry of readdirSync(baseDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const report = loadRunReport(resolve(baseDir, entry.name, 'last-report.json'));
    if (report) reports.push(report);
  }

  return reports.sort((a, b) => a.pipeline.localeCompare(b.pipeline));
}
